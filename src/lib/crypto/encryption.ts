/**
 * Text encryption into a single portable token.
 *
 * Every call draws a fresh salt, so every call derives a fresh key; that is
 * what keeps the random 96-bit nonce from ever repeating under one key.
 * Do not cache derived keys across calls without adding a nonce counter.
 */

import { DEFAULT_ITERATIONS, NONCE_LENGTH, SALT_LENGTH, AUTH_TAG_LENGTH } from '../../constants.js';
import { AuthenticationError, DecryptionError, FormatError } from '../../errors.js';
import { open, seal } from './cipher.js';
import { deriveKey, deriveKeyAsync } from './kdf.js';
import { secureRandom, wipe, type RandomSource } from './random.js';
import { utf8Bytes } from './text.js';
import { packToken, unpackToken, type TokenParts } from './token.js';

export interface EncryptionOptions {
  /** PBKDF2 iteration count; must match between encrypt and decrypt */
  iterations?: number;
  random?: RandomSource;
}

// Stand-in salt for malformed tokens, so they cost one derivation like any other
const DECOY_SALT = Buffer.alloc(SALT_LENGTH);

const sealWithKey = (plaintext: Buffer, key: Buffer, salt: Buffer, random: RandomSource): string => {
  try {
    const nonce = random.bytes(NONCE_LENGTH);
    const sealed = seal(key, nonce, plaintext);
    return packToken({ salt, nonce, sealed });
  } finally {
    wipe(key);
  }
};

const openWithKey = ({ nonce, sealed }: TokenParts, key: Buffer): string => {
  try {
    return open(key, nonce, sealed).toString('utf-8');
  } finally {
    wipe(key);
  }
};

const isTokenFailure = (error: unknown): boolean =>
  error instanceof FormatError || error instanceof AuthenticationError;

const tryUnpack = (token: string): TokenParts | null => {
  try {
    return unpackToken(token);
  } catch (error) {
    if (error instanceof FormatError) return null;
    throw error;
  }
};

/**
 * Encrypt a UTF-8 string. Plaintexts and passwords with unpaired surrogates
 * throw InvalidParameterError before any randomness or derivation is used.
 * Returns base64url(SALT ‖ NONCE ‖ CIPHERTEXT ‖ TAG)
 */
export const encrypt = (plaintext: string, password: string, options: EncryptionOptions = {}): string => {
  const data = utf8Bytes(plaintext, 'plaintext');
  utf8Bytes(password, 'password');
  const random = options.random ?? secureRandom;
  const salt = random.bytes(SALT_LENGTH);
  const key = deriveKey(password, salt, options.iterations ?? DEFAULT_ITERATIONS);
  return sealWithKey(data, key, salt, random);
};

/**
 * Decrypt a token produced by encrypt.
 * Malformed tokens, wrong passwords and tampered data all throw the same DecryptionError.
 */
export const decrypt = (token: string, password: string, options: EncryptionOptions = {}): string => {
  const iterations = options.iterations ?? DEFAULT_ITERATIONS;
  const parts = tryUnpack(token);

  if (!parts) {
    wipe(deriveKey(password, DECOY_SALT, iterations));
    throw new DecryptionError();
  }

  const key = deriveKey(password, parts.salt, iterations);
  try {
    return openWithKey(parts, key);
  } catch (error) {
    if (isTokenFailure(error)) throw new DecryptionError();
    throw error;
  }
};

export const encryptAsync = async (
  plaintext: string,
  password: string,
  options: EncryptionOptions = {}
): Promise<string> => {
  const data = utf8Bytes(plaintext, 'plaintext');
  utf8Bytes(password, 'password');
  const random = options.random ?? secureRandom;
  const salt = random.bytes(SALT_LENGTH);
  const key = await deriveKeyAsync(password, salt, options.iterations ?? DEFAULT_ITERATIONS);
  return sealWithKey(data, key, salt, random);
};

export const decryptAsync = async (
  token: string,
  password: string,
  options: EncryptionOptions = {}
): Promise<string> => {
  const iterations = options.iterations ?? DEFAULT_ITERATIONS;
  const parts = tryUnpack(token);

  if (!parts) {
    wipe(await deriveKeyAsync(password, DECOY_SALT, iterations));
    throw new DecryptionError();
  }

  const key = await deriveKeyAsync(password, parts.salt, iterations);
  try {
    return openWithKey(parts, key);
  } catch (error) {
    if (isTokenFailure(error)) throw new DecryptionError();
    throw error;
  }
};

/**
 * Bytes a token adds on top of the plaintext, before base64
 */
export const getTokenOverhead = (): number => {
  return SALT_LENGTH + NONCE_LENGTH + AUTH_TAG_LENGTH;
};
