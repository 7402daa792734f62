/**
 * Bounded worker pool.
 *
 * Runs an async worker over a list of items with at most `maxWorkers` in
 * flight. Each item settles to its own outcome; a rejected item never stops
 * the others. `onSettled` fires in completion order, which lets callers merge
 * results as they arrive instead of waiting for the whole pool.
 */

export type WorkOutcome<T, R> =
  | { status: 'fulfilled'; item: T; index: number; value: R }
  | { status: 'rejected'; item: T; index: number; reason: unknown };

export class WorkerPool {
  readonly maxWorkers: number;

  constructor(maxWorkers: number) {
    this.maxWorkers = Math.max(1, Math.floor(maxWorkers));
  }

  async map<T, R>(
    items: readonly T[],
    worker: (item: T, index: number) => Promise<R>,
    onSettled?: (outcome: WorkOutcome<T, R>) => void,
  ): Promise<Array<WorkOutcome<T, R>>> {
    const outcomes: Array<WorkOutcome<T, R>> = new Array(items.length);
    let next = 0;

    const runner = async (): Promise<void> => {
      while (next < items.length) {
        const index = next++;
        const item = items[index];
        let outcome: WorkOutcome<T, R>;
        try {
          const value = await worker(item, index);
          outcome = { status: 'fulfilled', item, index, value };
        } catch (reason) {
          outcome = { status: 'rejected', item, index, reason };
        }
        outcomes[index] = outcome;
        onSettled?.(outcome);
      }
    };

    const runners = Math.min(this.maxWorkers, items.length);
    await Promise.all(Array.from({ length: runners }, () => runner()));
    return outcomes;
  }
}
