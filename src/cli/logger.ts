import chalk from 'chalk';
import ora from 'ora';
import type { Ora } from 'ora';

export interface SpinnerHandle {
  start(text: string): SpinnerHandle;
  update(text: string): SpinnerHandle;
  succeed(text?: string): SpinnerHandle;
  fail(text?: string): SpinnerHandle;
  stop(): void;
}

/**
 * Simple wrapper around ora providing chainable API and consistent colors.
 * One instance is reused across pipeline steps; `start` restarts it after a
 * succeed/fail.
 */
export function createSpinner(): SpinnerHandle {
  let spinner: Ora | undefined;

  return {
    start(text: string) {
      if (!spinner) spinner = ora(text).start();
      else spinner.start(text);
      return this;
    },
    update(text: string) {
      if (spinner?.isSpinning) spinner.text = text;
      else this.start(text);
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
    stop() {
      spinner?.stop();
    },
  };
}

export const symbols = {
  success: chalk.green('✔'),
  info: chalk.cyan('ℹ'),
};

export function heading(title: string) {
  console.log('\n' + chalk.bold.blue(title));
}

export function kv(label: string, value: string) {
  console.log('  ' + chalk.gray(label + ':') + ' ' + chalk.white(value));
}

/** Lightweight render helpers to avoid scattered console.log formatting */
export const render = {
  success(msg: string) {
    console.log(symbols.success + ' ' + chalk.green(msg));
  },
  dim(msg: string) {
    console.log(symbols.info + ' ' + chalk.gray(msg));
  },
};
