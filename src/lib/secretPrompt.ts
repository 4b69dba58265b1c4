/**
 * Interactive choice between a typed password and a generated passphrase
 */

import { PASSWORD_ENV } from '../constants.js';
import { logger, printStrength, prompts } from '../ui/index.js';
import type { RuntimeContext } from './context.js';
import {
  clampWordCount,
  generatePassphrase,
  type WordCountResult,
} from './passphrase.js';
import { estimateStrength } from './strength.js';

export const describeAdjustment = (result: WordCountResult): string | null => {
  switch (result.adjustment) {
    case 'invalid':
      return `Invalid number, using ${result.count} words by default.`;
    case 'too-short':
      return `Too short, using ${result.count} words for better security.`;
    case 'too-long':
      return `That's quite long. Limiting to ${result.count} words.`;
    default:
      return null;
  }
};

export const passwordFromEnv = (): string | undefined => {
  const value = process.env[PASSWORD_ENV];
  return value ? value : undefined;
};

/**
 * Generate a passphrase, show it with its strength and a reminder to keep it
 */
export const generateAndShowPassphrase = async (
  ctx: RuntimeContext,
  requested: string | number
): Promise<string> => {
  const result = clampWordCount(requested, ctx.wordCountPolicy);
  const adjustment = describeAdjustment(result);
  if (adjustment) {
    prompts.log.warning(adjustment);
  }

  const wordList = await ctx.getWordList();
  const passphrase = generatePassphrase(wordList, result.count);

  prompts.note(passphrase, 'Generated passphrase');
  printStrength(
    estimateStrength(passphrase, {
      kind: 'generated',
      wordCount: result.count,
      wordListSize: wordList.size,
    })
  );
  prompts.log.warning('IMPORTANT: Save this passphrase. You need it to decrypt later.');

  return passphrase;
};

/**
 * Secret for a new token. `generate` skips the menu and takes precedence over
 * the password environment variable: `true` uses the configured word count, a
 * string is the count as typed on the command line.
 */
export const askForSecret = async (
  ctx: RuntimeContext,
  options: { generate?: boolean | string } = {}
): Promise<string> => {
  if (typeof options.generate === 'string') {
    return generateAndShowPassphrase(ctx, options.generate);
  }
  if (options.generate === true) {
    return generateAndShowPassphrase(ctx, ctx.config.passphrase.words);
  }

  const fromEnv = passwordFromEnv();
  if (fromEnv) {
    logger.debug(`Using password from ${PASSWORD_ENV}`);
    return fromEnv;
  }

  const choice = await prompts.select('Choose password option:', [
    { value: 'type', label: 'Type my own password' },
    { value: 'generate', label: 'Generate a random passphrase for me' },
  ]);

  if (choice === 'generate') {
    const fallback = String(ctx.config.passphrase.words);
    const requested = await prompts.text(
      `How many words in the passphrase? (recommended: 6-12)`,
      { placeholder: fallback, defaultValue: fallback }
    );
    return generateAndShowPassphrase(ctx, requested);
  }

  const password = (await prompts.password('Enter your password:')).trim();
  if (!password) {
    return prompts.cancel('No password provided');
  }

  printStrength(estimateStrength(password));
  return password;
};

export const askForDecryptionPassword = async (): Promise<string> => {
  const fromEnv = passwordFromEnv();
  if (fromEnv) {
    logger.debug(`Using password from ${PASSWORD_ENV}`);
    return fromEnv;
  }

  const password = (await prompts.password('Enter the password or passphrase used for encryption:')).trim();
  if (!password) {
    return prompts.cancel('No password provided');
  }
  return password;
};
