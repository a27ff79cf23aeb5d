import chalk from 'chalk';
import type { Reporter } from '../core/reporter.js';
import { withSpinner } from './spinner.js';

export const ok = (msg: string) => console.log(chalk.green('✓'), msg);
export const fail = (msg: string) => console.error(chalk.red('✗'), msg);
export const warn = (msg: string) => console.error(chalk.yellow('⚠'), msg);
export const info = (msg: string) => console.log(chalk.blue('ℹ'), msg);
export const step = (tag: string, msg: string) => console.log(chalk.dim(`[${tag}]`), msg);

export interface ConsoleReporterOptions {
  verbose: boolean;
  /** Spinners only make sense on an interactive terminal. */
  interactive: boolean;
}

export function consoleReporter(opts: ConsoleReporterOptions): Reporter {
  return {
    info,
    ok,
    warn,
    step,
    debug(msg) {
      if (opts.verbose) console.log(chalk.gray(msg));
    },
    output(text) {
      if (!opts.verbose) console.error(chalk.dim(text.trimEnd()));
    },
    task(label, fn) {
      if (opts.interactive && !opts.verbose) return withSpinner(label, fn);
      info(label);
      return fn();
    },
  };
}
