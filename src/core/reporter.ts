/**
 * Sink for progress messages. Core modules report through this instead of
 * printing, so commands decide how output looks and tests can record it.
 */
export interface Reporter {
  info(msg: string): void;
  ok(msg: string): void;
  warn(msg: string): void;
  /** A tagged progress line, e.g. `[compile-check] compiler: /usr/bin/c++`. */
  step(tag: string, msg: string): void;
  debug(msg: string): void;
  /** Captured output of a failed process, shown unless it was already streamed. */
  output(text: string): void;
  /** Wraps a long-running step. */
  task<T>(label: string, fn: () => Promise<T>): Promise<T>;
}
