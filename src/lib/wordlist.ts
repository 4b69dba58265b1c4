import { readFile } from 'fs/promises';
import { EmptyWordListError, WordListNotFoundError } from '../errors.js';

/**
 * Ordered, de-duplicated, non-empty list of words. Immutable once built.
 */
export class WordList {
  private readonly words: readonly string[];

  private constructor(words: readonly string[]) {
    this.words = Object.freeze([...words]);
  }

  /**
   * Build a list from raw entries: trims, drops empty entries and repeated
   * words (the first occurrence keeps its position).
   */
  static from(entries: Iterable<string>, source?: string): WordList {
    const seen = new Set<string>();
    for (const entry of entries) {
      const word = entry.trim();
      if (word) seen.add(word);
    }
    if (seen.size === 0) {
      throw new EmptyWordListError(source);
    }
    return new WordList([...seen]);
  }

  get size(): number {
    return this.words.length;
  }

  at(index: number): string {
    const word = this.words[index];
    if (word === undefined) {
      throw new RangeError(`Word index ${index} out of range (size ${this.words.length})`);
    }
    return word;
  }

  includes(word: string): boolean {
    return this.words.includes(word);
  }

  toArray(): readonly string[] {
    return this.words;
  }
}

/**
 * One word per line; blank lines and lines starting with `#` are skipped
 */
export const parseWordList = (text: string, source?: string): WordList => {
  const words = text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('#'));

  return WordList.from(words, source);
};

export const loadWordList = async (path: string): Promise<WordList> => {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new WordListNotFoundError(path);
    }
    throw error;
  }
  return parseWordList(content, path);
};
