#!/usr/bin/env -S node --import tsx/esm
import { config } from 'dotenv';
config({ path: '.env.local' });
config({ path: '.env' });

import { Command } from 'commander';
import { registerCheckCommand } from './commands/check.js';
import { registerStatsCommand } from './commands/stats.js';
import { registerHistoryCommand } from './commands/history.js';

const program = new Command();

program
  .name('follower-watch')
  .description('GitHub フォロワーの増減を記録するCLIツール')
  .version('0.1.0');

registerCheckCommand(program);
registerStatsCommand(program);
registerHistoryCommand(program);

program.addHelpText('after', `
Examples:
  $ follower-watch check octocat      フォロワーの増減を確認・記録
  $ follower-watch stats octocat      統計を表示
  $ follower-watch history octocat    履歴を表示
`);

await program.parseAsync();
