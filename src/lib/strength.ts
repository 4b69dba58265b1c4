/**
 * Entropy-based strength estimates.
 *
 * These numbers are a rough signal for the person choosing a secret. Nothing
 * in wordseal accepts or rejects a secret based on them.
 */

export type StrengthLabel = 'VERY WEAK' | 'Weak' | 'Okay' | 'Moderate' | 'Strong' | 'VERY STRONG';

export interface StrengthRating {
  label: StrengthLabel;
  /** 0-100 */
  score: number;
}

export interface StrengthReport extends StrengthRating {
  bits: number;
}

export type StrengthSource =
  | { kind: 'typed' }
  | { kind: 'generated'; wordCount: number; wordListSize: number };

// Alphabet size credited for each character class present
const CHARACTER_CLASSES = [
  { name: 'lowercase', pattern: /\p{Ll}/u, size: 26 },
  { name: 'uppercase', pattern: /\p{Lu}/u, size: 26 },
  { name: 'digit', pattern: /\p{Nd}/u, size: 10 },
] as const;
const SYMBOL_CLASS_SIZE = 32;

// Checked in order; the first threshold the estimate falls under wins
const RATINGS: ReadonlyArray<{ below: number } & StrengthRating> = [
  { below: 30, label: 'VERY WEAK', score: 10 },
  { below: 40, label: 'Weak', score: 25 },
  { below: 60, label: 'Okay', score: 40 },
  { below: 80, label: 'Moderate', score: 60 },
  { below: 100, label: 'Strong', score: 80 },
];
const TOP_RATING: StrengthRating = { label: 'VERY STRONG', score: 95 };

/**
 * Bits for `wordCount` independent uniform draws from `wordListSize` words
 */
export const entropyOfGenerated = (wordCount: number, wordListSize: number): number => {
  if (!Number.isFinite(wordCount) || !Number.isFinite(wordListSize)) {
    return 0;
  }
  if (wordCount <= 0 || wordListSize <= 1) {
    return 0;
  }
  return wordCount * Math.log2(wordListSize);
};

/**
 * Charset-size estimate for a typed password: length × log2(sum of the class
 * sizes in use). Length counts code points.
 */
export const entropyOfTyped = (password: string): number => {
  const chars = [...password];
  if (chars.length === 0) {
    return 0;
  }

  const seen = new Set<string>();
  for (const char of chars) {
    const charClass = CHARACTER_CLASSES.find((c) => c.pattern.test(char));
    seen.add(charClass ? charClass.name : 'symbol');
  }

  let charsetSize = 0;
  for (const charClass of CHARACTER_CLASSES) {
    if (seen.has(charClass.name)) charsetSize += charClass.size;
  }
  if (seen.has('symbol')) charsetSize += SYMBOL_CLASS_SIZE;

  if (charsetSize === 0) {
    return 0;
  }
  return chars.length * Math.log2(charsetSize);
};

export const rate = (bits: number): StrengthRating => {
  // Non-finite and negative estimates rate as the weakest band
  if (!Number.isFinite(bits) || bits < 0) {
    return { label: 'VERY WEAK', score: 10 };
  }
  const match = RATINGS.find((r) => bits < r.below);
  return match ? { label: match.label, score: match.score } : { ...TOP_RATING };
};

export const estimateStrength = (
  secret: string,
  source: StrengthSource = { kind: 'typed' }
): StrengthReport => {
  const bits =
    source.kind === 'generated'
      ? entropyOfGenerated(source.wordCount, source.wordListSize)
      : entropyOfTyped(secret);

  return { ...rate(bits), bits };
};
