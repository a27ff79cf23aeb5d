import chalk from 'chalk';
import ora, { type Ora } from 'ora';

const TAIL_WIDTH = 60;

let active: Ora | null = null;

/** Shows the latest line of process output beside the running spinner. */
export function spinnerProgress(chunk: string): void {
  if (!active) return;
  const last = chunk
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter(Boolean)
    .pop();
  if (!last) return;
  const tail = last.length > TAIL_WIDTH ? `…${last.slice(-TAIL_WIDTH)}` : last;
  active.suffixText = chalk.dim(tail);
}

export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
): Promise<T> {
  const spinner = ora(text).start();
  active = spinner;
  try {
    const result = await fn();
    spinner.suffixText = '';
    spinner.succeed();
    return result;
  } catch (err) {
    spinner.suffixText = '';
    spinner.fail();
    throw err;
  } finally {
    active = null;
  }
}
