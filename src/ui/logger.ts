import chalk from 'chalk';
import { icons } from './theme.js';

export interface Logger {
  info: (msg: string) => void;
  warning: (msg: string) => void;
  debug: (msg: string) => void;
  blank: () => void;
  dim: (msg: string) => void;
  heading: (msg: string) => void;
}

export const logger: Logger = {
  info: (msg: string) => {
    console.log(icons.info, msg);
  },

  warning: (msg: string) => {
    console.log(icons.warning, msg);
  },

  // Never pass secrets or derived keys here
  debug: (msg: string) => {
    if (process.env.DEBUG) {
      console.log(chalk.gray('⚙'), chalk.gray(msg));
    }
  },

  blank: () => {
    console.log();
  },

  dim: (msg: string) => {
    console.log(chalk.dim(msg));
  },

  heading: (msg: string) => {
    console.log(chalk.bold.cyan(msg));
  },
};
