import { Command } from 'commander';
import { DEFAULT_ITERATIONS } from '../constants.js';
import { createContext, type RuntimeContext } from '../lib/context.js';
import { encryptAsync } from '../lib/crypto/index.js';
import { askForSecret } from '../lib/secretPrompt.js';
import { logger, prompts, withSpinner } from '../ui/index.js';
import type { EncryptOptions } from '../types.js';

/**
 * Encrypt `text` (prompted when undefined) and print the token.
 * Returns null when there was nothing to encrypt.
 */
export const encryptText = async (
  ctx: RuntimeContext,
  text: string | undefined,
  options: { generate?: boolean | string } = {}
): Promise<string | null> => {
  const plaintext = (text ?? (await prompts.text('Enter the sentence you want to ENCRYPT:'))).trim();

  if (!plaintext) {
    logger.warning('Nothing to encrypt (empty input).');
    return null;
  }

  const password = await askForSecret(ctx, options);

  const token = await withSpinner(
    'Deriving key and encrypting...',
    () => encryptAsync(plaintext, password, { iterations: ctx.iterations }),
    { successText: 'Encrypted' }
  );

  logger.blank();
  logger.heading('Encrypted token (save this somewhere safe):');
  console.log(token);
  if (ctx.iterations !== DEFAULT_ITERATIONS) {
    logger.dim(`Decrypt with --iterations ${ctx.iterations}`);
  }
  logger.blank();

  return token;
};

const runEncrypt = async (text: string | undefined, options: EncryptOptions): Promise<void> => {
  const ctx = await createContext(options);
  await encryptText(ctx, text, { generate: options.generate });
};

export const encryptCommand = new Command('encrypt')
  .description('Encrypt text into a token')
  .argument('[text]', 'Text to encrypt (prompted when omitted)')
  .option('-g, --generate [words]', 'Generate a passphrase instead of asking for a password')
  .option('-i, --iterations <n>', 'PBKDF2 iteration count')
  .option('-w, --wordlist <path>', 'Word list for generated passphrases')
  .option('-c, --config <path>', 'Path to a config file')
  .action(runEncrypt);
