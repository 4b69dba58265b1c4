/**
 * AES-256-GCM seal/open. No associated data is bound.
 * The tag is appended to the ciphertext: seal() returns CIPHERTEXT ‖ TAG.
 */

import { createCipheriv, createDecipheriv } from 'crypto';
import { AUTH_TAG_LENGTH, KEY_LENGTH, NONCE_LENGTH } from '../../constants.js';
import { AuthenticationError, InvalidParameterError } from '../../errors.js';

const ALGORITHM = 'aes-256-gcm';

const assertKeyAndNonce = (key: Buffer, nonce: Buffer): void => {
  if (key.length !== KEY_LENGTH) {
    throw new InvalidParameterError('key', `expected ${KEY_LENGTH} bytes, got ${key.length}`);
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new InvalidParameterError('nonce', `expected ${NONCE_LENGTH} bytes, got ${nonce.length}`);
  }
};

export const seal = (key: Buffer, nonce: Buffer, plaintext: Buffer): Buffer => {
  assertKeyAndNonce(key, nonce);

  const cipher = createCipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);

  return Buffer.concat([ciphertext, cipher.getAuthTag()]);
};

/**
 * Verify and decrypt CIPHERTEXT ‖ TAG.
 * Throws AuthenticationError on a wrong key or nonce, or any altered bit.
 * The tag comparison inside OpenSSL is constant-time.
 */
export const open = (key: Buffer, nonce: Buffer, sealed: Buffer): Buffer => {
  assertKeyAndNonce(key, nonce);

  if (sealed.length < AUTH_TAG_LENGTH) {
    throw new AuthenticationError();
  }

  const ciphertext = sealed.subarray(0, sealed.length - AUTH_TAG_LENGTH);
  const authTag = sealed.subarray(sealed.length - AUTH_TAG_LENGTH);

  const decipher = createDecipheriv(ALGORITHM, key, nonce, { authTagLength: AUTH_TAG_LENGTH });
  decipher.setAuthTag(authTag);

  try {
    return Buffer.concat([decipher.update(ciphertext), decipher.final()]);
  } catch {
    throw new AuthenticationError();
  }
};
