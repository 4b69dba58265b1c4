import { Command } from 'commander';
import { PASSPHRASE_SEPARATOR } from '../constants.js';
import { InvalidParameterError } from '../errors.js';
import { createContext } from '../lib/context.js';
import { passwordFromEnv } from '../lib/secretPrompt.js';
import { estimateStrength, type StrengthReport } from '../lib/strength.js';
import { logger, printStrength, prompts } from '../ui/index.js';
import type { StrengthOptions } from '../types.js';

const runStrength = async (secret: string | undefined, options: StrengthOptions): Promise<void> => {
  const ctx = await createContext(options);

  const value = (
    secret ??
    passwordFromEnv() ??
    (await prompts.password('Enter the password or passphrase to rate:'))
  ).trim();

  if (!value) {
    logger.warning('Nothing to rate (empty input).');
    return;
  }

  let report: StrengthReport;

  if (options.generated) {
    // Only passphrases drawn from the list get the word-based estimate
    const wordList = await ctx.getWordList();
    const words = value.split(PASSPHRASE_SEPARATOR);
    const unknown = words.filter((word) => !wordList.includes(word)).length;
    if (unknown > 0) {
      throw new InvalidParameterError(
        'passphrase',
        `${unknown} of ${words.length} words are not in ${ctx.wordListPath}`
      );
    }
    report = estimateStrength(value, {
      kind: 'generated',
      wordCount: words.length,
      wordListSize: wordList.size,
    });
  } else {
    report = estimateStrength(value);
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
    return;
  }

  printStrength(report);
};

export const strengthCommand = new Command('strength')
  .description('Estimate the strength of a password or passphrase')
  .argument('[secret]', 'Secret to rate (prompted when omitted)')
  .option('--generated', 'Rate as a passphrase generated from the word list')
  .option('-w, --wordlist <path>', 'Word list the passphrase was drawn from')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Path to a config file')
  .action(runStrength);
