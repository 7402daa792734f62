/**
 * Ordered fallback strategies.
 *
 * Each strategy reports success with `true`. The chain stops at the first
 * success; a strategy that throws counts as a failure and the next one runs.
 */

export interface Strategy {
  name: string;
  run: () => Promise<boolean>;
}

export interface ChainResult {
  /** Name of the strategy that succeeded, or null when all failed. */
  succeeded: string | null;
  failures: Array<{ name: string; error?: unknown }>;
}

export async function runStrategyChain(strategies: readonly Strategy[]): Promise<ChainResult> {
  const failures: ChainResult['failures'] = [];
  for (const strategy of strategies) {
    try {
      if (await strategy.run()) {
        return { succeeded: strategy.name, failures };
      }
      failures.push({ name: strategy.name });
    } catch (error) {
      failures.push({ name: strategy.name, error });
    }
  }
  return { succeeded: null, failures };
}
