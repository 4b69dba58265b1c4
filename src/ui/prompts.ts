import * as p from '@clack/prompts';
import chalk from 'chalk';

export interface SelectOption {
  value: string;
  label: string;
}

export const prompts = {
  intro: (title: string): void => {
    p.intro(chalk.bgCyan(chalk.black(` ${title} `)));
  },

  outro: (message: string): void => {
    p.outro(chalk.green(message));
  },

  select: async (message: string, options: SelectOption[]): Promise<string> => {
    const result = await p.select<SelectOption[], string>({
      message,
      options: options.map((opt) => ({
        value: opt.value,
        label: opt.label,
      })),
    });
    if (p.isCancel(result)) {
      return prompts.cancel();
    }
    return result;
  },

  text: async (
    message: string,
    options?: {
      placeholder?: string;
      defaultValue?: string;
    }
  ): Promise<string> => {
    const result = await p.text({
      message,
      placeholder: options?.placeholder,
      defaultValue: options?.defaultValue,
    });
    if (p.isCancel(result)) {
      return prompts.cancel();
    }
    return result;
  },

  password: async (message: string): Promise<string> => {
    const result = await p.password({ message });
    if (p.isCancel(result)) {
      return prompts.cancel();
    }
    return result;
  },

  note: (message: string, title?: string): void => {
    p.note(message, title);
  },

  cancel: (message = 'Operation cancelled'): never => {
    p.cancel(message);
    process.exit(0);
  },

  log: {
    warning: (message: string): void => {
      p.log.warning(message);
    },
  },
};
