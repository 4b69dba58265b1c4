import { Command } from 'commander';
import { WordsealError, printError } from '../errors.js';
import { createContext } from '../lib/context.js';
import { prompts } from '../ui/index.js';
import type { MenuOptions } from '../types.js';
import { decryptToken } from './decrypt.js';
import { encryptText } from './encrypt.js';

/**
 * Encrypt/decrypt loop. Failures are reported and the menu comes back;
 * only "Exit" (or cancelling a prompt) leaves.
 */
export const runMenu = async (options: MenuOptions = {}): Promise<void> => {
  const ctx = await createContext(options);

  prompts.intro('wordseal');

  while (true) {
    const choice = await prompts.select('What would you like to do?', [
      { value: 'encrypt', label: 'Encrypt a sentence' },
      { value: 'decrypt', label: 'Decrypt a sentence' },
      { value: 'exit', label: 'Exit' },
    ]);

    if (choice === 'exit') {
      prompts.outro('Goodbye!');
      return;
    }

    try {
      if (choice === 'encrypt') {
        await encryptText(ctx, undefined);
      } else {
        await decryptToken(ctx, undefined);
      }
    } catch (error) {
      if (!(error instanceof WordsealError)) {
        throw error;
      }
      printError(error);
    }
  }
};

export const menuCommand = new Command('menu')
  .description('Interactive encrypt/decrypt menu')
  .option('-i, --iterations <n>', 'PBKDF2 iteration count')
  .option('-w, --wordlist <path>', 'Word list for generated passphrases')
  .option('-c, --config <path>', 'Path to a config file')
  .action(runMenu);
