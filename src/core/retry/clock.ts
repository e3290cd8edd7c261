/**
 * Source of time for anything that waits. Tests swap in a fake clock so
 * retry budgets can be asserted without real sleeps.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
};
