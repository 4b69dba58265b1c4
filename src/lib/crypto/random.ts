/**
 * Randomness used for salts, nonces and word draws.
 * Production code always goes through `secureRandom`; tests pass their own source.
 */

import { randomBytes, randomInt } from 'crypto';

export interface RandomSource {
  /** `length` random bytes */
  bytes: (length: number) => Buffer;
  /** Uniform integer in [0, maxExclusive) */
  int: (maxExclusive: number) => number;
}

export const secureRandom: RandomSource = {
  bytes: (length: number) => randomBytes(length),
  int: (maxExclusive: number) => randomInt(maxExclusive),
};

/**
 * Overwrite key material once it is no longer needed.
 * Best effort: V8 may still hold copies elsewhere.
 */
export const wipe = (...buffers: Buffer[]): void => {
  for (const buffer of buffers) {
    buffer.fill(0);
  }
};
