/**
 * Config module unit tests
 *
 * cosmiconfig is mocked; each test decides what the search finds.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { join } from 'path';
import { homedir } from 'os';

const { searchMock, loadMock } = vi.hoisted(() => ({
  searchMock: vi.fn(),
  loadMock: vi.fn(),
}));

vi.mock('cosmiconfig', () => ({
  cosmiconfig: () => ({
    search: searchMock,
    load: loadMock,
  }),
}));

// Import after mocking
import { loadConfig, clearConfigCache } from '../../src/lib/config.js';
import { defaultConfig } from '../../src/schemas/config.schema.js';
import { ConfigError } from '../../src/errors.js';

describe('config', () => {
  beforeEach(() => {
    clearConfigCache();
    searchMock.mockReset();
    loadMock.mockReset();
  });

  afterEach(() => {
    clearConfigCache();
  });

  // ============================================================================
  // Default Config Tests
  // ============================================================================

  describe('defaultConfig', () => {
    it('should derive keys with 200000 iterations', () => {
      expect(defaultConfig.kdf.iterations).toBe(200_000);
    });

    it('should generate 6-word passphrases within 4..20', () => {
      expect(defaultConfig.passphrase.words).toBe(6);
      expect(defaultConfig.passphrase.minWords).toBe(4);
      expect(defaultConfig.passphrase.maxWords).toBe(20);
      expect(defaultConfig.passphrase.wordList).toBeUndefined();
    });

    it('should enable colors', () => {
      expect(defaultConfig.ui.colors).toBe(true);
    });
  });

  // ============================================================================
  // loadConfig Tests
  // ============================================================================

  describe('loadConfig', () => {
    it('should return defaults when no config file is found', async () => {
      searchMock.mockResolvedValue(null);

      const loaded = await loadConfig();

      expect(loaded).toEqual({ config: defaultConfig, filepath: null });
      expect(searchMock).toHaveBeenCalledTimes(2);
      expect(searchMock).toHaveBeenNthCalledWith(1, process.cwd());
      expect(searchMock).toHaveBeenNthCalledWith(2, homedir());
    });

    it('should merge a found config with defaults', async () => {
      searchMock.mockResolvedValue({
        config: { kdf: { iterations: 600000 }, passphrase: { words: 8 } },
        filepath: '/project/.wordsealrc.json',
      });

      const loaded = await loadConfig();

      expect(loaded.filepath).toBe('/project/.wordsealrc.json');
      expect(loaded.config.kdf.iterations).toBe(600000);
      expect(loaded.config.passphrase.words).toBe(8);
      expect(loaded.config.passphrase.maxWords).toBe(20);
      expect(loaded.config.ui.colors).toBe(true);
      expect(searchMock).toHaveBeenCalledTimes(1);
    });

    it('should treat an empty config file as defaults', async () => {
      searchMock.mockResolvedValue({ config: null, filepath: '/project/.wordsealrc' });

      const loaded = await loadConfig();
      expect(loaded.config).toEqual(defaultConfig);
    });

    it('should load an explicit config path', async () => {
      loadMock.mockResolvedValue({
        config: { ui: { colors: false } },
        filepath: '/etc/wordseal.json',
      });

      const loaded = await loadConfig('/etc/wordseal.json');

      expect(loadMock).toHaveBeenCalledWith('/etc/wordseal.json');
      expect(searchMock).not.toHaveBeenCalled();
      expect(loaded.config.ui.colors).toBe(false);
    });

    it('should expand ~ in an explicit path', async () => {
      loadMock.mockResolvedValue({ config: {}, filepath: 'x' });

      await loadConfig('~/.wordsealrc.json');

      expect(loadMock).toHaveBeenCalledWith(join(homedir(), '.wordsealrc.json'));
    });

    it('should reject an invalid iteration count', async () => {
      searchMock.mockResolvedValue({
        config: { kdf: { iterations: 0 } },
        filepath: '/project/.wordsealrc.json',
      });

      await expect(loadConfig()).rejects.toThrow(ConfigError);
      await expect(loadConfig()).rejects.toThrow(/kdf\.iterations/);
    });

    it('should reject minWords above maxWords', async () => {
      searchMock.mockResolvedValue({
        config: { passphrase: { minWords: 10, maxWords: 5 } },
        filepath: '/project/.wordsealrc.json',
      });

      await expect(loadConfig()).rejects.toThrow('minWords must not exceed maxWords');
    });

    it('should reject a default word count outside minWords..maxWords', async () => {
      searchMock.mockResolvedValue({
        config: { passphrase: { words: 2 } },
        filepath: '/project/.wordsealrc.json',
      });

      await expect(loadConfig()).rejects.toThrow(
        'Configuration error: Invalid configuration in /project/.wordsealrc.json: passphrase.words: words must lie between minWords and maxWords'
      );
    });

    it('should accept a word count on the policy bounds', async () => {
      searchMock.mockResolvedValue({
        config: { passphrase: { words: 8, minWords: 8, maxWords: 8 } },
        filepath: '/project/.wordsealrc.json',
      });

      const { config } = await loadConfig();

      expect(config.passphrase).toEqual({ words: 8, minWords: 8, maxWords: 8 });
    });

    it('should wrap loader failures in ConfigError', async () => {
      searchMock.mockRejectedValue(new Error('unexpected token'));

      await expect(loadConfig()).rejects.toThrow(
        'Configuration error: Failed to load configuration: unexpected token'
      );
    });

    it('should cache the loaded config', async () => {
      searchMock.mockResolvedValue(null);

      const first = await loadConfig();
      const second = await loadConfig();

      expect(second).toBe(first);
      expect(searchMock).toHaveBeenCalledTimes(2);
    });

    it('should not reuse the cache for a different path', async () => {
      searchMock.mockResolvedValue(null);
      loadMock.mockResolvedValue({ config: { kdf: { iterations: 5 } }, filepath: '/a.json' });

      await loadConfig();
      const explicit = await loadConfig('/a.json');

      expect(explicit.config.kdf.iterations).toBe(5);
    });
  });
});
