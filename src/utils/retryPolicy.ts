import { ErrorCategory, RetryRule, RetryRules } from '../types';
import { TimingPolicy } from './timing';

/**
 * Per-category retry budget. Attempts are 0-indexed: `shouldRetry` sleeps
 * and returns true while `attempt < maxAttempts`, and returns false without
 * sleeping once the budget is spent.
 */
export class RetryPolicy {
  constructor(
    private readonly rules: RetryRules,
    private readonly timing: TimingPolicy
  ) {}

  rule(category: ErrorCategory): RetryRule {
    return this.rules[category] ?? this.rules.default;
  }

  async shouldRetry(category: ErrorCategory, attempt: number): Promise<boolean> {
    const { maxAttempts, delayMs } = this.rule(category);
    if (attempt >= maxAttempts) {
      return false;
    }
    await this.timing.sleep(delayMs);
    return true;
  }
}
