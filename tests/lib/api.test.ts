import { describe, it, expect } from 'vitest';
import {
  decrypt,
  encrypt,
  estimateStrength,
  generatePassphrase,
  getTokenOverhead,
  DecryptionError,
  WordList,
} from '../../src/lib/index.js';

describe('library entry', () => {
  it('should encrypt with a generated passphrase end to end', () => {
    const words = WordList.from(['north', 'south', 'east', 'west']);
    const passphrase = generatePassphrase(words, 5);
    const token = encrypt('hello from the api', passphrase, { iterations: 1000 });

    expect(decrypt(token, passphrase, { iterations: 1000 })).toBe('hello from the api');
    expect(() => decrypt(token, 'test-secret', { iterations: 1000 })).toThrow(DecryptionError);
  });

  it('should expose the estimator and token overhead', () => {
    expect(getTokenOverhead()).toBe(44);
    expect(estimateStrength('x', { kind: 'generated', wordCount: 4, wordListSize: 4 })).toEqual({
      label: 'VERY WEAK',
      score: 10,
      bits: 8,
    });
  });
});
