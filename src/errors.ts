import chalk from 'chalk';

export class WordsealError extends Error {
  constructor(
    message: string,
    public code: string,
    public suggestions?: string[]
  ) {
    super(message);
    this.name = 'WordsealError';
  }
}

export class InvalidParameterError extends WordsealError {
  constructor(name: string, reason: string) {
    super(`Invalid ${name}: ${reason}`, 'INVALID_PARAMETER');
  }
}

export class EmptyWordListError extends WordsealError {
  constructor(source?: string) {
    super(
      source ? `Word list is empty: ${source}` : 'Word list is empty',
      'EMPTY_WORD_LIST',
      [
        'Put one word per line in the word list file',
        'Lines starting with # are treated as comments',
      ]
    );
  }
}

export class WordListNotFoundError extends WordsealError {
  constructor(path: string) {
    super(`Word list not found: ${path}`, 'WORD_LIST_NOT_FOUND', [
      'Check that the path is correct',
      'Omit --wordlist to use the bundled word list',
    ]);
  }
}

/**
 * Token is not padded URL-safe base64, or is too short to hold salt, nonce and tag.
 * Never surfaced past `decrypt`, which reports every failure as DecryptionError.
 */
export class FormatError extends WordsealError {
  constructor(message: string) {
    super(`Malformed token: ${message}`, 'FORMAT_ERROR');
  }
}

/**
 * Tag verification failed. Never surfaced past `decrypt`.
 */
export class AuthenticationError extends WordsealError {
  constructor() {
    super('Authentication failed', 'AUTHENTICATION_ERROR');
  }
}

export class DecryptionError extends WordsealError {
  constructor() {
    super('Decryption failed', 'DECRYPTION_FAILED', [
      'Wrong password or passphrase',
      'Corrupted or incomplete token',
      'Token was not created by wordseal',
    ]);
  }
}

export class ConfigError extends WordsealError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR', [
      'Check your .wordsealrc file',
      'Delete it to fall back to the defaults',
    ]);
  }
}

/**
 * Print an error with its suggestions without exiting
 */
export const printError = (error: unknown): void => {
  if (error instanceof WordsealError) {
    console.error(chalk.red('x'), error.message);
    if (error.suggestions && error.suggestions.length > 0) {
      console.error();
      console.error(chalk.dim(error instanceof DecryptionError ? 'Possible reasons:' : 'Suggestions:'));
      error.suggestions.forEach((s) => console.error(chalk.dim(`  → ${s}`)));
    }
    return;
  }

  if (error instanceof Error) {
    console.error(chalk.red('x'), 'An unexpected error occurred:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
    return;
  }

  console.error(chalk.red('x'), 'An unknown error occurred');
};

export const handleError = (error: unknown): never => {
  printError(error);
  process.exit(1);
};
