import { TimingPolicy } from '../../src/utils/timing';

export interface TestTiming extends TimingPolicy {
  sleeps: number[];
}

/**
 * Virtual clock: sleep advances `now` instead of waiting. Random values come
 * from a seeded generator, or from `fixed` when given.
 */
export function instantTiming(options: { seed?: number; fixed?: number } = {}): TestTiming {
  let clock = 1_700_000_000_000;
  let state = options.seed ?? 42;
  const sleeps: number[] = [];

  // mulberry32
  const next = (): number => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    sleeps,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      clock += Math.max(0, ms);
    },
    random: () => (options.fixed !== undefined ? options.fixed : next()),
    now: () => clock,
  };
}
