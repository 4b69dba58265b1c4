import chalk from 'chalk';
import { cosmiconfig } from 'cosmiconfig';
import { APP_NAME, HOME_DIR } from '../constants.js';
import { ConfigError } from '../errors.js';
import { wordsealConfigSchema, defaultConfig, type WordsealConfigOutput } from '../schemas/config.schema.js';
import { expandPath } from './paths.js';

export interface LoadedConfig {
  config: WordsealConfigOutput;
  /** File the config came from; null when defaults are in use */
  filepath: string | null;
}

let cached: LoadedConfig | null = null;
let cachedKey: string | null = null;

const explorer = () =>
  cosmiconfig(APP_NAME, {
    searchPlaces: [
      '.wordsealrc',
      '.wordsealrc.json',
      '.wordsealrc.yaml',
      '.wordsealrc.yml',
      'wordseal.config.json',
    ],
  });

const validate = (raw: unknown, filepath: string): WordsealConfigOutput => {
  const result = wordsealConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${filepath}: ${issues}`);
  }
  return result.data;
};

/**
 * Load configuration from an explicit file, or search the working directory
 * and then the home directory. Falls back to defaults when nothing is found.
 */
export const loadConfig = async (configPath?: string): Promise<LoadedConfig> => {
  const key = configPath ?? '';
  if (cached && cachedKey === key) {
    return cached;
  }

  let loaded: LoadedConfig;
  try {
    const result = configPath
      ? await explorer().load(expandPath(configPath))
      : ((await explorer().search(process.cwd())) ?? (await explorer().search(HOME_DIR)));

    loaded = result
      ? { config: validate(result.config, result.filepath), filepath: result.filepath }
      : { config: defaultConfig, filepath: null };
  } catch (error) {
    if (error instanceof ConfigError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to load configuration: ${message}`);
  }

  cached = loaded;
  cachedKey = key;
  return loaded;
};

/**
 * Apply settings that take effect process-wide
 */
export const applyUiConfig = (config: WordsealConfigOutput): void => {
  if (!config.ui.colors) {
    chalk.level = 0;
  }
};

export const clearConfigCache = (): void => {
  cached = null;
  cachedKey = null;
};
