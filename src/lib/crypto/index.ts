/**
 * Crypto module - key derivation, AEAD and token encoding
 */

export { deriveKey, deriveKeyAsync } from './kdf.js';

export { seal, open } from './cipher.js';

export {
  packToken,
  unpackToken,
  encodeUrlSafeBase64,
  decodeUrlSafeBase64,
  MIN_TOKEN_BYTES,
} from './token.js';

export type { TokenParts } from './token.js';

export { secureRandom, wipe } from './random.js';

export type { RandomSource } from './random.js';

export { encrypt, decrypt, encryptAsync, decryptAsync, getTokenOverhead } from './encryption.js';

export type { EncryptionOptions } from './encryption.js';
