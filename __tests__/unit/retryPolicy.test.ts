import { describe, expect, test } from 'vitest';
import { RetryPolicy } from '../../src/utils/retryPolicy';
import { RetryRules } from '../../src/types';
import { instantTiming } from '../helpers/timing';

const rules: RetryRules = {
  captcha: { maxAttempts: 3, delayMs: 2000 },
  network: { maxAttempts: 3, delayMs: 3000 },
  form_not_found: { maxAttempts: 2, delayMs: 1500 },
  submit: { maxAttempts: 2, delayMs: 2000 },
  default: { maxAttempts: 2, delayMs: 1000 },
};

describe('RetryPolicy.shouldRetry', () => {
  test('allows attempts below the budget and sleeps the category delay', async () => {
    const timing = instantTiming();
    const policy = new RetryPolicy(rules, timing);

    expect(await policy.shouldRetry('captcha', 0)).toBe(true);
    expect(await policy.shouldRetry('captcha', 1)).toBe(true);
    expect(await policy.shouldRetry('captcha', 2)).toBe(true);
    expect(timing.sleeps).toEqual([2000, 2000, 2000]);
  });

  test('stays false past the threshold and never sleeps after refusing', async () => {
    const timing = instantTiming();
    const policy = new RetryPolicy(rules, timing);

    for (let attempt = 3; attempt < 10; attempt++) {
      expect(await policy.shouldRetry('captcha', attempt)).toBe(false);
    }
    expect(timing.sleeps).toEqual([]);
  });

  test('uses each category budget independently', async () => {
    const timing = instantTiming();
    const policy = new RetryPolicy(rules, timing);

    expect(await policy.shouldRetry('form_not_found', 1)).toBe(true);
    expect(await policy.shouldRetry('form_not_found', 2)).toBe(false);
    expect(await policy.shouldRetry('network', 2)).toBe(true);
    expect(timing.sleeps).toEqual([1500, 3000]);
  });

  test('categories without a rule fall back to the default rule', async () => {
    const timing = instantTiming();
    const policy = new RetryPolicy({ default: { maxAttempts: 1, delayMs: 500 } }, timing);

    expect(policy.rule('submit')).toEqual({ maxAttempts: 1, delayMs: 500 });
    expect(await policy.shouldRetry('submit', 0)).toBe(true);
    expect(await policy.shouldRetry('submit', 1)).toBe(false);
    expect(timing.sleeps).toEqual([500]);
  });
});
