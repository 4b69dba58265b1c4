export interface GlobalOptions {
  config?: string;
}

export interface EncryptOptions extends GlobalOptions {
  /** `true` for the configured word count, or the requested count as typed */
  generate?: boolean | string;
  iterations?: string;
  wordlist?: string;
}

export interface DecryptOptions extends GlobalOptions {
  iterations?: string;
}

export interface PassphraseOptions extends GlobalOptions {
  words?: string;
  wordlist?: string;
  json?: boolean;
}

export interface StrengthOptions extends GlobalOptions {
  generated?: boolean;
  wordlist?: string;
  json?: boolean;
}

export interface MenuOptions extends GlobalOptions {
  iterations?: string;
  wordlist?: string;
}
