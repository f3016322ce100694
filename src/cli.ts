import { Command } from 'commander';
import { authCommand } from './commands/auth.js';
import { requestCommand } from './commands/request.js';
import { configCommand } from './commands/config.js';
import { setGlobalLogLevel } from './lib/logger.js';
import { VERSION } from './version.js';

export const cli = new Command();

cli
  .name('amocrm')
  .description('OAuth2 token lifecycle helper for the amoCRM REST API')
  .version(VERSION);

// 全域選項
cli
  .option('-f, --format <format>', 'output format: json | table')
  .option('-v, --verbose', 'log debug output to stderr')
  .hook('preAction', (thisCommand) => {
    if (thisCommand.opts().verbose) {
      setGlobalLogLevel('debug');
    }
  });

// 註冊指令
cli.addCommand(authCommand);
cli.addCommand(requestCommand);
cli.addCommand(configCommand);
