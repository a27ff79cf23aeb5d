/** One named way of detecting something. `null` means "not found, try the next". */
export interface Strategy<T> {
  name: string;
  detect(): T | null;
}

export interface Detection<T> {
  strategy: string;
  value: T;
}

/** Evaluates strategies in order and stops at the first hit. */
export function firstDetection<T>(strategies: Strategy<T>[]): Detection<T> | null {
  for (const strategy of strategies) {
    const value = strategy.detect();
    if (value !== null) {
      return { strategy: strategy.name, value };
    }
  }
  return null;
}
