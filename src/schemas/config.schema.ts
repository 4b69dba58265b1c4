import { z } from 'zod';
import {
  DEFAULT_ITERATIONS,
  DEFAULT_WORD_COUNT,
  MAX_WORD_COUNT,
  MIN_WORD_COUNT,
} from '../constants.js';

export const kdfConfigSchema = z
  .object({
    /** PBKDF2 iterations; tokens only decrypt with the count they were made with */
    iterations: z.number().int().positive().default(DEFAULT_ITERATIONS),
  })
  .default({});

export const passphraseConfigSchema = z
  .object({
    /** Words in a generated passphrase */
    words: z.number().int().positive().default(DEFAULT_WORD_COUNT),
    /** Requests below this fall back to `words` */
    minWords: z.number().int().positive().default(MIN_WORD_COUNT),
    /** Requests above this are capped */
    maxWords: z.number().int().positive().default(MAX_WORD_COUNT),
    /** Custom word list file; the bundled list is used when unset */
    wordList: z.string().min(1).optional(),
  })
  .refine((p) => p.minWords <= p.maxWords, {
    message: 'minWords must not exceed maxWords',
    path: ['minWords'],
  })
  .refine((p) => p.words >= p.minWords && p.words <= p.maxWords, {
    message: 'words must lie between minWords and maxWords',
    path: ['words'],
  })
  .default({});

export const wordsealConfigSchema = z.object({
  kdf: kdfConfigSchema,
  passphrase: passphraseConfigSchema,
  ui: z
    .object({
      colors: z.boolean().default(true),
    })
    .default({}),
});

export type WordsealConfigInput = z.input<typeof wordsealConfigSchema>;
export type WordsealConfigOutput = z.output<typeof wordsealConfigSchema>;

export const defaultConfig: WordsealConfigOutput = wordsealConfigSchema.parse({});
