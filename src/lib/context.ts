import { InvalidParameterError } from '../errors.js';
import type { WordsealConfigOutput } from '../schemas/config.schema.js';
import { applyUiConfig, loadConfig } from './config.js';
import type { WordCountPolicy } from './passphrase.js';
import { resolveWordListPath } from './paths.js';
import { loadWordList, type WordList } from './wordlist.js';

/**
 * Everything a command needs besides its own arguments. The word list is read
 * once, on first use, and shared by every later call.
 */
export interface RuntimeContext {
  config: WordsealConfigOutput;
  iterations: number;
  wordListPath: string;
  wordCountPolicy: WordCountPolicy;
  getWordList: () => Promise<WordList>;
}

export interface ContextOverrides {
  config?: string;
  iterations?: string;
  wordlist?: string;
}

export const parsePositiveInt = (value: string, name: string): number => {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidParameterError(name, `expected a positive integer, got "${value}"`);
  }
  return parsed;
};

export const createContext = async (overrides: ContextOverrides = {}): Promise<RuntimeContext> => {
  const { config } = await loadConfig(overrides.config);
  applyUiConfig(config);

  const wordListPath = resolveWordListPath(overrides.wordlist, config.passphrase.wordList);
  let wordList: Promise<WordList> | null = null;

  return {
    config,
    iterations: overrides.iterations
      ? parsePositiveInt(overrides.iterations, 'iterations')
      : config.kdf.iterations,
    wordListPath,
    wordCountPolicy: {
      min: config.passphrase.minWords,
      max: config.passphrase.maxWords,
      fallback: config.passphrase.words,
    },
    getWordList: () => {
      if (!wordList) {
        wordList = loadWordList(wordListPath);
      }
      return wordList;
    },
  };
};
