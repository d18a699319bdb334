/**
 * Source of time and randomness for everything that waits or jitters.
 * Production code uses `realTiming`; tests pass a policy that never sleeps.
 */
export interface TimingPolicy {
  sleep(ms: number): Promise<void>;
  random(): number;
  now(): number;
}

export const realTiming: TimingPolicy = {
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, Math.max(0, ms))),
  random: () => Math.random(),
  now: () => Date.now(),
};

// Random integer between min and max (inclusive)
export function uniform(timing: TimingPolicy, min: number, max: number): number {
  return Math.floor(timing.random() * (max - min + 1)) + min;
}

export function chance(timing: TimingPolicy, probability: number): boolean {
  return timing.random() < probability;
}

export function randomDelay(timing: TimingPolicy, min: number, max: number): Promise<void> {
  return timing.sleep(uniform(timing, min, max));
}

export function pick<T>(timing: TimingPolicy, items: readonly T[]): T {
  return items[Math.min(items.length - 1, Math.floor(timing.random() * items.length))];
}
