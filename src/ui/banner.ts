import chalk from 'chalk';
import boxen from 'boxen';
import { icons } from './theme.js';

export const customHelp = (version: string): string => {
  const title = boxen(`${icons.lock} ` + chalk.cyan.bold('wordseal') + chalk.dim(` v${version}`), {
    padding: { top: 0, bottom: 0, left: 1, right: 1 },
    borderStyle: 'round',
    borderColor: 'cyan',
  });

  const quickStart = `
${chalk.bold.cyan('Quick Start:')}
  ${chalk.cyan('wordseal')}                    Interactive menu
  ${chalk.cyan('wordseal encrypt "text"')}     Encrypt a sentence into a token
  ${chalk.cyan('wordseal decrypt <token>')}    Recover the sentence
`;

  const commands = `
${chalk.bold.cyan('Commands:')}
  ${chalk.cyan('Tokens')}
    encrypt [text]      Encrypt text with a password or generated passphrase
    decrypt [token]     Decrypt a token

  ${chalk.cyan('Secrets')}
    passphrase          Generate a random multi-word passphrase
    strength [secret]   Estimate the strength of a password or passphrase
`;

  const footer = `
${chalk.dim('Run')} ${chalk.cyan('wordseal <command> --help')} ${chalk.dim('for detailed command info')}
${chalk.dim('Set')} ${chalk.cyan('WORDSEAL_PASSWORD')} ${chalk.dim('to skip the password prompt in scripts')}
`;

  return `${title}\n${quickStart}${commands}${footer}`;
};
