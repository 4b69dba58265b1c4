import { describe, it, expect, vi, beforeEach } from 'vitest';

const ui = await vi.hoisted(async () => {
  const { createUiMock } = await import('../utils/uiMock.js');
  return createUiMock();
});

vi.mock('../../src/ui/index.js', () => ui);

vi.mock('cosmiconfig', () => ({
  cosmiconfig: () => ({
    search: async () => null,
    load: async () => null,
  }),
}));

const WORD_PATTERN = /^[a-z]+$/;

const jsonOutput = (logSpy: { mock: { calls: unknown[][] } }): Record<string, unknown> => {
  const [first] = logSpy.mock.calls;
  const parsed: unknown = JSON.parse(String(first?.[0]));
  if (typeof parsed !== 'object' || parsed === null) throw new Error('expected a JSON object');
  return Object.fromEntries(Object.entries(parsed));
};

describe('passphrase command', () => {
  beforeEach(() => {
    vi.resetModules();
    ui.reset();
  });

  it('prints six words from the bundled list by default', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await passphraseCommand.parseAsync([], { from: 'user' });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const words = String(logSpy.mock.calls[0]?.[0]).split('-');
    expect(words).toHaveLength(6);
    words.forEach((word) => expect(word).toMatch(WORD_PATTERN));
    expect(ui.printStrength).toHaveBeenCalledWith({ label: 'Okay', score: 40, bits: 48 });
    expect(ui.logger.warning).not.toHaveBeenCalled();

    logSpy.mockRestore();
  });

  it('prints a JSON report with --json', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await passphraseCommand.parseAsync(['--words', '5', '--json'], { from: 'user' });

    const output = jsonOutput(logSpy);
    expect(String(output.passphrase).split('-')).toHaveLength(5);
    expect(output).toMatchObject({
      words: 5,
      wordListSize: 256,
      label: 'Okay',
      score: 40,
      bits: 40,
    });
    expect(output).not.toHaveProperty('adjustment');
    expect(ui.printStrength).not.toHaveBeenCalled();

    logSpy.mockRestore();
  });

  it('falls back to the default count for short requests', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await passphraseCommand.parseAsync(['-n', '2'], { from: 'user' });

    expect(ui.logger.warning).toHaveBeenCalledWith('Too short, using 6 words for better security.');
    expect(String(logSpy.mock.calls[0]?.[0]).split('-')).toHaveLength(6);
    expect(ui.printStrength).toHaveBeenCalledWith({ label: 'Okay', score: 40, bits: 48 });

    logSpy.mockRestore();
  });

  it('caps long requests and reports the adjustment in JSON', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await passphraseCommand.parseAsync(['--words', '50', '--json'], { from: 'user' });

    const output = jsonOutput(logSpy);
    expect(String(output.passphrase).split('-')).toHaveLength(20);
    expect(output).toMatchObject({
      words: 20,
      label: 'VERY STRONG',
      score: 95,
      bits: 160,
      adjustment: 'too-long',
    });
    expect(ui.logger.warning).not.toHaveBeenCalled();

    logSpy.mockRestore();
  });

  it('treats a non-numeric count as invalid', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await passphraseCommand.parseAsync(['--words', 'many'], { from: 'user' });

    expect(ui.logger.warning).toHaveBeenCalledWith('Invalid number, using 6 words by default.');
    expect(String(logSpy.mock.calls[0]?.[0]).split('-')).toHaveLength(6);

    logSpy.mockRestore();
  });

  it('fails on a missing word list', async () => {
    const { passphraseCommand } = await import('../../src/commands/passphrase.js');

    await expect(
      passphraseCommand.parseAsync(['--wordlist', '/nonexistent/wordseal-words.txt'], { from: 'user' })
    ).rejects.toMatchObject({
      code: 'WORD_LIST_NOT_FOUND',
      message: 'Word list not found: /nonexistent/wordseal-words.txt',
    });
  });
});
