import { homedir } from 'os';
import { join, isAbsolute, resolve } from 'path';
import { DEFAULT_WORDLIST_PATH } from '../constants.js';

export const expandPath = (path: string): string => {
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  if (path.startsWith('$HOME/')) {
    return join(homedir(), path.slice(6));
  }
  return isAbsolute(path) ? path : resolve(path);
};

/**
 * Word list to use: the CLI flag wins over the config file, which wins over the bundled list
 */
export const resolveWordListPath = (flag?: string, configured?: string): string => {
  const chosen = flag || configured;
  return chosen ? expandPath(chosen) : DEFAULT_WORDLIST_PATH;
};
