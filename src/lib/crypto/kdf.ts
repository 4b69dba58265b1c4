/**
 * Password-based key derivation (PBKDF2-HMAC-SHA256)
 */

import { pbkdf2, pbkdf2Sync } from 'crypto';
import { promisify } from 'util';
import { DEFAULT_ITERATIONS, KEY_LENGTH, SALT_LENGTH } from '../../constants.js';
import { InvalidParameterError } from '../../errors.js';
import { utf8Bytes } from './text.js';

const DIGEST = 'sha256';
const pbkdf2Async = promisify(pbkdf2);

const assertParams = (salt: Buffer, iterations: number): void => {
  if (!Number.isSafeInteger(iterations) || iterations <= 0) {
    throw new InvalidParameterError('iterations', `expected a positive integer, got ${iterations}`);
  }
  if (salt.length !== SALT_LENGTH) {
    throw new InvalidParameterError('salt', `expected ${SALT_LENGTH} bytes, got ${salt.length}`);
  }
};

/**
 * Derive a 256-bit key from a password.
 * Identical (password, salt, iterations) always yield the identical key.
 * Cost grows linearly with `iterations`. A password holding an unpaired
 * surrogate throws InvalidParameterError.
 */
export const deriveKey = (
  password: string,
  salt: Buffer,
  iterations: number = DEFAULT_ITERATIONS
): Buffer => {
  assertParams(salt, iterations);
  return pbkdf2Sync(utf8Bytes(password, 'password'), salt, iterations, KEY_LENGTH, DIGEST);
};

/**
 * Same as deriveKey, computed on the libuv thread pool so the event loop stays free
 */
export const deriveKeyAsync = async (
  password: string,
  salt: Buffer,
  iterations: number = DEFAULT_ITERATIONS
): Promise<Buffer> => {
  assertParams(salt, iterations);
  return pbkdf2Async(utf8Bytes(password, 'password'), salt, iterations, KEY_LENGTH, DIGEST);
};
