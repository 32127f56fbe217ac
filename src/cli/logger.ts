import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  warn(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Simple wrapper around ora providing chainable API and consistent colors.
 * The spinner renders on stderr so response bodies on stdout stay pipeable.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  function ensure(text: string) {
    if (!spinner) spinner = ora({ text, stream: process.stderr }).start();
    else spinner.text = text;
  }

  return {
    start(text: string) {
      ensure(text);
      return this;
    },
    succeed(text?: string) {
      spinner?.succeed(text && chalk.green(text));
      return this;
    },
    fail(text?: string) {
      spinner?.fail(text && chalk.red(text));
      return this;
    },
    warn(text?: string) {
      spinner?.warn(text && chalk.yellow(text));
      return this;
    },
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  warn: chalk.yellow('⚠'),
  info: chalk.cyan('ℹ'),
};

/** Diagnostics for the terminal; all of it goes to stderr. */
export const render = {
  dim(msg: string) {
    console.error(symbols.info + ' ' + chalk.gray(msg));
  },
  warn(msg: string) {
    console.error(symbols.warn + ' ' + chalk.yellow(msg));
  },
};
