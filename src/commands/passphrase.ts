import { Command } from 'commander';
import { createContext } from '../lib/context.js';
import { clampWordCount, generatePassphrase } from '../lib/passphrase.js';
import { describeAdjustment } from '../lib/secretPrompt.js';
import { estimateStrength } from '../lib/strength.js';
import { logger, printStrength } from '../ui/index.js';
import type { PassphraseOptions } from '../types.js';

const runPassphrase = async (options: PassphraseOptions): Promise<void> => {
  const ctx = await createContext(options);

  const result = clampWordCount(options.words ?? ctx.config.passphrase.words, ctx.wordCountPolicy);
  const wordList = await ctx.getWordList();
  const passphrase = generatePassphrase(wordList, result.count);
  const report = estimateStrength(passphrase, {
    kind: 'generated',
    wordCount: result.count,
    wordListSize: wordList.size,
  });

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          passphrase,
          words: result.count,
          wordListSize: wordList.size,
          ...report,
          ...(result.adjustment ? { adjustment: result.adjustment } : {}),
        },
        null,
        2
      )
    );
    return;
  }

  const adjustment = describeAdjustment(result);
  if (adjustment) {
    logger.warning(adjustment);
  }

  console.log(passphrase);
  printStrength(report);
};

export const passphraseCommand = new Command('passphrase')
  .description('Generate a random multi-word passphrase')
  .option('-n, --words <count>', 'Number of words')
  .option('-w, --wordlist <path>', 'Word list to draw from')
  .option('--json', 'Output as JSON')
  .option('-c, --config <path>', 'Path to a config file')
  .action(runPassphrase);
