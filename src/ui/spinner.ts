import ora from 'ora';
import chalk from 'chalk';

export interface SpinnerTexts {
  successText?: string;
  failText?: string;
}

/**
 * Run `fn` behind a spinner, e.g. while a key is being derived.
 * ora draws on stderr, so stdout only carries results such as tokens.
 */
export const withSpinner = async <T>(
  text: string,
  fn: () => Promise<T>,
  options: SpinnerTexts = {}
): Promise<T> => {
  const spinner = ora({ text, color: 'cyan', spinner: 'dots' }).start();

  try {
    const result = await fn();
    spinner.succeed(chalk.green(options.successText || text));
    return result;
  } catch (error) {
    spinner.fail(chalk.red(options.failText || text));
    throw error;
  }
};
