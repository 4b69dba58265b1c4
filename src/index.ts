import { Command } from 'commander';
import chalk from 'chalk';
import {
  encryptCommand,
  decryptCommand,
  passphraseCommand,
  strengthCommand,
  menuCommand,
  runMenu,
} from './commands/index.js';
import { handleError } from './errors.js';
import { VERSION, DESCRIPTION, APP_NAME } from './constants.js';
import { customHelp } from './ui/banner.js';
import type { MenuOptions } from './types.js';

const program = new Command();

program
  .name(APP_NAME)
  .description(DESCRIPTION)
  .version(VERSION, '-v, --version', 'Display version number')
  .configureOutput({
    outputError: (str, write) => write(chalk.red(str)),
  })
  .addHelpText('beforeAll', customHelp(VERSION))
  .helpOption('-h, --help', 'Display this help message')
  .showHelpAfterError(false)
  // Options before a subcommand belong to the menu; options after it to the subcommand
  .enablePositionalOptions();

// Override default help to use our custom version
program.configureHelp({
  formatHelp: () => '',
});

// Register commands
program.addCommand(encryptCommand);
program.addCommand(decryptCommand);
program.addCommand(passphraseCommand);
program.addCommand(strengthCommand);
program.addCommand(menuCommand);

// No command: interactive menu
program
  .option('-i, --iterations <n>', 'PBKDF2 iteration count')
  .option('-w, --wordlist <path>', 'Word list for generated passphrases')
  .option('-c, --config <path>', 'Path to a config file')
  .action((options: MenuOptions) => runMenu(options));

// Global error handling
process.on('uncaughtException', handleError);
process.on('unhandledRejection', (reason) => {
  handleError(reason instanceof Error ? reason : new Error(String(reason)));
});

// Parse and execute
program.parseAsync(process.argv).catch(handleError);
