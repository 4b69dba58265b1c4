/**
 * Random multi-word passphrases
 */

import {
  DEFAULT_WORD_COUNT,
  MAX_WORD_COUNT,
  MIN_WORD_COUNT,
  PASSPHRASE_SEPARATOR,
} from '../constants.js';
import { InvalidParameterError } from '../errors.js';
import { secureRandom, type RandomSource } from './crypto/random.js';
import type { WordList } from './wordlist.js';

/**
 * Draw `count` words uniformly and independently (with replacement), so a
 * word may repeat. Entropy estimates for generated passphrases assume this.
 */
export const generatePassphrase = (
  wordList: WordList,
  count: number,
  random: RandomSource = secureRandom
): string => {
  if (!Number.isInteger(count) || count <= 0) {
    throw new InvalidParameterError('word count', `expected a positive integer, got ${count}`);
  }

  const words: string[] = [];
  for (let i = 0; i < count; i++) {
    words.push(wordList.at(random.int(wordList.size)));
  }
  return words.join(PASSPHRASE_SEPARATOR);
};

export interface WordCountPolicy {
  min: number;
  max: number;
  fallback: number;
}

export type WordCountAdjustment = 'invalid' | 'too-short' | 'too-long';

export interface WordCountResult {
  count: number;
  adjustment?: WordCountAdjustment;
}

export const defaultWordCountPolicy: WordCountPolicy = {
  min: MIN_WORD_COUNT,
  max: MAX_WORD_COUNT,
  fallback: DEFAULT_WORD_COUNT,
};

// Plain decimal integers only; hex, binary and exponent forms are invalid
const DECIMAL_INTEGER = /^[+-]?\d+$/;

const parseDecimal = (text: string): number => {
  const trimmed = text.trim();
  return DECIMAL_INTEGER.test(trimmed) ? Number(trimmed) : NaN;
};

/**
 * Turn a requested word count (as typed) into one the generator accepts.
 * Unparseable input and counts below `min` use `fallback`; counts above `max` are capped.
 */
export const clampWordCount = (
  requested: string | number,
  policy: WordCountPolicy = defaultWordCountPolicy
): WordCountResult => {
  const count = typeof requested === 'number' ? requested : parseDecimal(requested);

  if (!Number.isInteger(count)) {
    return { count: policy.fallback, adjustment: 'invalid' };
  }
  if (count < policy.min) {
    return { count: policy.fallback, adjustment: 'too-short' };
  }
  if (count > policy.max) {
    return { count: policy.max, adjustment: 'too-long' };
  }
  return { count };
};
