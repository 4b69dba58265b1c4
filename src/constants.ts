import { homedir } from 'os';
import { join, dirname } from 'path';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));
const packageRoot = join(__dirname, '..');
let VERSION_VALUE = '1.0.0'; // fallback
try {
  const pkg: unknown = JSON.parse(readFileSync(join(packageRoot, 'package.json'), 'utf-8'));
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    VERSION_VALUE = pkg.version;
  }
} catch {
  // Bundled without package.json next to it; keep the fallback
}
export const VERSION = VERSION_VALUE;
export const DESCRIPTION = 'Encrypt short text with a password or a generated passphrase';
export const APP_NAME = 'wordseal';

export const HOME_DIR = homedir();
export const DEFAULT_WORDLIST_PATH = join(packageRoot, 'data', 'wordlist.txt');
export const PASSWORD_ENV = 'WORDSEAL_PASSWORD';

// Token layout: SALT ‖ NONCE ‖ CIPHERTEXT ‖ TAG
export const SALT_LENGTH = 16;
export const NONCE_LENGTH = 12; // GCM standard
export const AUTH_TAG_LENGTH = 16;
export const KEY_LENGTH = 32; // 256 bits

export const DEFAULT_ITERATIONS = 200_000;

export const PASSPHRASE_SEPARATOR = '-';
export const DEFAULT_WORD_COUNT = 6;
export const MIN_WORD_COUNT = 4;
export const MAX_WORD_COUNT = 20;
