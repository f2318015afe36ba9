import { Command } from 'commander';
import { createTracker, type CommonOptions } from './context.js';
import { formatFollower } from '../utils/format.js';
import { toErrorMessage } from '../utils/error.js';
import type { CheckResult } from '../tracker/tracker.js';

export function printCheckResult(result: CheckResult): void {
  if (result.initial) {
    console.log(`\n初回実行のため、現在の ${result.totalFollowers} 人をベースラインとして記録しました。`);
    return;
  }

  if (result.gained.length > 0) {
    console.log(`\n🎉 新しいフォロワー (${result.gained.length}):`);
    for (const follower of result.gained) {
      console.log(`  • ${formatFollower(follower)}`);
    }
  } else {
    console.log('\n新しいフォロワーはいません。');
  }

  if (result.lost.length > 0) {
    console.log(`\n👋 フォロー解除 (${result.lost.length}):`);
    for (const follower of result.lost) {
      console.log(`  • ${formatFollower(follower)}`);
    }
  } else {
    console.log('\nフォロー解除はありません。');
  }

  console.log(`\nフォロワー合計: ${result.totalFollowers} 人`);
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('フォロワーを取得し、前回からの増減を記録')
    .argument('<username>', 'GitHub ユーザー名')
    .option('-c, --config <path>', '設定ファイルパス', 'config.yaml')
    .option('-t, --token <token>', 'GitHub トークン（未指定なら環境変数）')
    .option('-d, --data-dir <dir>', 'データ保存先ディレクトリ')
    .addHelpText('after', `
Examples:
  $ follower-watch check octocat                 増減を確認して記録
  $ follower-watch check octocat -t <token>      トークンを指定
  $ follower-watch check octocat -d ./snapshots  保存先を指定
`)
    .action(async (username: string, options: CommonOptions) => {
      try {
        const { tracker } = createTracker(username, options);
        const result = await tracker.checkChanges();
        printCheckResult(result);
      } catch (error) {
        console.error('check でエラーが発生しました:', toErrorMessage(error));
        process.exit(1);
      }
    });
}
