/**
 * Library entry point: token encryption, passphrases and strength estimates
 * without the CLI.
 */

export {
  encrypt,
  decrypt,
  encryptAsync,
  decryptAsync,
  deriveKey,
  deriveKeyAsync,
  seal,
  open,
  packToken,
  unpackToken,
  secureRandom,
  getTokenOverhead,
  MIN_TOKEN_BYTES,
} from './crypto/index.js';

export type { EncryptionOptions, RandomSource, TokenParts } from './crypto/index.js';

export { WordList, parseWordList, loadWordList } from './wordlist.js';

export { generatePassphrase, clampWordCount, defaultWordCountPolicy } from './passphrase.js';

export type { WordCountPolicy, WordCountResult, WordCountAdjustment } from './passphrase.js';

export { entropyOfGenerated, entropyOfTyped, rate, estimateStrength } from './strength.js';

export type { StrengthLabel, StrengthRating, StrengthReport, StrengthSource } from './strength.js';

export {
  WordsealError,
  InvalidParameterError,
  EmptyWordListError,
  WordListNotFoundError,
  FormatError,
  AuthenticationError,
  DecryptionError,
} from '../errors.js';
