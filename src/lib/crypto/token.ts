/**
 * Token wire format: base64url(SALT ‖ NONCE ‖ CIPHERTEXT ‖ TAG), padded.
 *
 * Split points are fixed offsets and the token carries no version or algorithm
 * byte, so any change to salt or nonce sizes breaks existing tokens.
 */

import { AUTH_TAG_LENGTH, NONCE_LENGTH, SALT_LENGTH } from '../../constants.js';
import { FormatError, InvalidParameterError } from '../../errors.js';

export interface TokenParts {
  salt: Buffer;
  nonce: Buffer;
  /** Ciphertext with the authentication tag appended */
  sealed: Buffer;
}

export const MIN_TOKEN_BYTES = SALT_LENGTH + NONCE_LENGTH + AUTH_TAG_LENGTH;

// Padded URL-safe base64: groups of four, optional final padded group
const URL_SAFE_BASE64 = /^(?:[A-Za-z0-9_-]{4})*(?:[A-Za-z0-9_-]{2}==|[A-Za-z0-9_-]{3}=)?$/;

export const encodeUrlSafeBase64 = (data: Buffer): string => {
  return data.toString('base64').replace(/\+/g, '-').replace(/\//g, '_');
};

export const decodeUrlSafeBase64 = (text: string): Buffer => {
  if (!URL_SAFE_BASE64.test(text)) {
    throw new FormatError('not URL-safe base64');
  }
  return Buffer.from(text.replace(/-/g, '+').replace(/_/g, '/'), 'base64');
};

export const packToken = ({ salt, nonce, sealed }: TokenParts): string => {
  if (salt.length !== SALT_LENGTH) {
    throw new InvalidParameterError('salt', `expected ${SALT_LENGTH} bytes, got ${salt.length}`);
  }
  if (nonce.length !== NONCE_LENGTH) {
    throw new InvalidParameterError('nonce', `expected ${NONCE_LENGTH} bytes, got ${nonce.length}`);
  }
  return encodeUrlSafeBase64(Buffer.concat([salt, nonce, sealed]));
};

export const unpackToken = (token: string): TokenParts => {
  const packed = decodeUrlSafeBase64(token);

  if (packed.length < MIN_TOKEN_BYTES) {
    throw new FormatError(`expected at least ${MIN_TOKEN_BYTES} bytes, got ${packed.length}`);
  }

  let offset = 0;

  const salt = packed.subarray(offset, offset + SALT_LENGTH);
  offset += SALT_LENGTH;

  const nonce = packed.subarray(offset, offset + NONCE_LENGTH);
  offset += NONCE_LENGTH;

  const sealed = packed.subarray(offset);

  return { salt, nonce, sealed };
};
