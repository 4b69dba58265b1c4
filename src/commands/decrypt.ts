import { Command } from 'commander';
import { createContext, type RuntimeContext } from '../lib/context.js';
import { decryptAsync } from '../lib/crypto/index.js';
import { askForDecryptionPassword } from '../lib/secretPrompt.js';
import { logger, prompts, withSpinner } from '../ui/index.js';
import type { DecryptOptions } from '../types.js';

/**
 * Decrypt `token` (prompted when undefined) and print the plaintext.
 * Returns null when no token was given; throws DecryptionError on any failure.
 */
export const decryptToken = async (
  ctx: RuntimeContext,
  token: string | undefined
): Promise<string | null> => {
  const input = (token ?? (await prompts.text('Enter the encrypted token:'))).trim();

  if (!input) {
    logger.warning('No token provided.');
    return null;
  }

  const password = await askForDecryptionPassword();

  const plaintext = await withSpinner(
    'Deriving key and decrypting...',
    () => decryptAsync(input, password, { iterations: ctx.iterations }),
    { successText: 'Decrypted', failText: 'Decryption failed' }
  );

  logger.blank();
  logger.heading('Decrypted sentence:');
  console.log(plaintext);
  logger.blank();

  return plaintext;
};

const runDecrypt = async (token: string | undefined, options: DecryptOptions): Promise<void> => {
  const ctx = await createContext(options);
  await decryptToken(ctx, token);
};

export const decryptCommand = new Command('decrypt')
  .description('Decrypt a token')
  .argument('[token]', 'Token to decrypt (prompted when omitted)')
  .option('-i, --iterations <n>', 'PBKDF2 iteration count used when encrypting')
  .option('-c, --config <path>', 'Path to a config file')
  .action(runDecrypt);
