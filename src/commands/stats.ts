import { Command } from 'commander';
import { createTracker, parseCount, type CommonOptions } from './context.js';
import { formatTimestamp } from '../utils/format.js';
import { toErrorMessage } from '../utils/error.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats')
    .description('記録済みのフォロワー統計を表示')
    .argument('<username>', 'GitHub ユーザー名')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .option('-d, --data-dir <dir>', 'データ保存先ディレクトリ')
    .option('-n, --recent <number>', '直近の増減の表示件数', '5')
    .addHelpText('after', `
Examples:
  $ follower-watch stats octocat          統計を表示
  $ follower-watch stats octocat -n 10    直近10件まで表示
`)
    .action((username: string, options: CommonOptions & { recent: string }) => {
      try {
        const { tracker } = createTracker(username, options);
        const stats = tracker.getStats(parseCount(options.recent, '--recent'));

        console.log(`\n📊 ${username} のフォロワー統計:`);
        console.log(`  • フォロワー合計: ${stats.totalFollowers}`);
        console.log(`  • 累計新規フォロワー: ${stats.totalGained}`);
        console.log(`  • 累計フォロー解除: ${stats.totalLost}`);
        if (stats.lastCheckedAt) {
          console.log(`  • 最終確認: ${formatTimestamp(stats.lastCheckedAt)}`);
        }

        if (stats.recentGained.length > 0) {
          console.log('\n🆕 最近の新規フォロワー:');
          for (const { follower, timestamp } of stats.recentGained) {
            console.log(`  • ${follower.login} - ${formatTimestamp(timestamp)}`);
          }
        }

        if (stats.recentLost.length > 0) {
          console.log('\n🔄 最近のフォロー解除:');
          for (const { follower, timestamp } of stats.recentLost) {
            console.log(`  • ${follower.login} - ${formatTimestamp(timestamp)}`);
          }
        }
      } catch (error) {
        console.error('stats でエラーが発生しました:', toErrorMessage(error));
        process.exit(1);
      }
    });
}
