import { Command } from 'commander';
import { createTracker, parseCount, type CommonOptions } from './context.js';
import { formatTimestamp } from '../utils/format.js';
import { toErrorMessage } from '../utils/error.js';

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('実行ごとの増減履歴を表示')
    .argument('<username>', 'GitHub ユーザー名')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .option('-d, --data-dir <dir>', 'データ保存先ディレクトリ')
    .option('-n, --limit <number>', '表示件数', '10')
    .action((username: string, options: CommonOptions & { limit: string }) => {
      try {
        const { tracker } = createTracker(username, options);
        const entries = tracker.getHistory(parseCount(options.limit, '--limit'));

        if (entries.length === 0) {
          console.log('履歴がありません。先に check を実行してください。');
          return;
        }

        for (const entry of entries) {
          const label = entry.initial ? ' (ベースライン)' : '';
          console.log(`\n[${formatTimestamp(entry.timestamp)}]${label} 合計 ${entry.totalFollowers} 人 / +${entry.gained.length} -${entry.lost.length}`);
          if (entry.initial) {
            continue;
          }
          for (const follower of entry.gained) {
            console.log(`  + ${follower.login}`);
          }
          for (const follower of entry.lost) {
            console.log(`  - ${follower.login}`);
          }
        }
      } catch (error) {
        console.error('history でエラーが発生しました:', toErrorMessage(error));
        process.exit(1);
      }
    });
}
