import {
  ApplicationRequest,
  ApplicationState,
  ApplicationStateSnapshot,
  ErrorCategory,
  EvidenceBundle,
  OrchestratorPhase,
  RetryRules,
  RunStep,
} from '../types';
import { RunLog } from '../utils/logger';
import { RetryPolicy } from '../utils/retryPolicy';
import { TimingPolicy } from '../utils/timing';
import { describeError } from '../utils/result';

/**
 * Everything one application run owns. Threaded through every component
 * call; never shared between runs.
 */
export class RunContext {
  readonly log: RunLog;
  readonly retry: RetryPolicy;
  readonly state: ApplicationState = {
    step: 'initial',
    filledFields: new Set<string>(),
    issues: [],
    captchaSolved: false,
    platform: null,
  };
  readonly evidence: EvidenceBundle;
  readonly startedAt: number;
  phase: OrchestratorPhase = 'initial';

  constructor(
    readonly runId: string,
    readonly request: ApplicationRequest,
    readonly timing: TimingPolicy,
    retryRules: RetryRules
  ) {
    this.log = new RunLog(runId);
    this.retry = new RetryPolicy(retryRules, timing);
    this.startedAt = timing.now();
    this.evidence = {
      log: this.log.entries,
      metrics: {},
      errorCounts: { captcha: 0, network: 0, form_not_found: 0, submit: 0, default: 0 },
    };
  }

  setStep(step: RunStep): void {
    this.state.step = step;
    this.log.debug(`Step -> ${step}`);
  }

  setPhase(phase: OrchestratorPhase): void {
    this.phase = phase;
    this.log.debug(`Phase -> ${phase}`);
  }

  markFilled(field: string): void {
    this.state.filledFields.add(field);
  }

  addIssue(issue: string): void {
    this.state.issues.push(issue);
    this.log.warn(issue);
  }

  recordError(category: ErrorCategory, error: unknown): void {
    this.evidence.errorCounts[category] += 1;
    this.log.warn(`${category} error: ${describeError(error)}`);
  }

  /**
   * Time a step and add its latency to the metrics. Repeated steps accumulate.
   */
  async measure<T>(step: string, operation: () => Promise<T>): Promise<T> {
    const started = this.timing.now();
    try {
      return await operation();
    } finally {
      const elapsed = this.timing.now() - started;
      this.evidence.metrics[step] = (this.evidence.metrics[step] ?? 0) + elapsed;
    }
  }

  elapsedMs(): number {
    return this.timing.now() - this.startedAt;
  }

  snapshot(): ApplicationStateSnapshot {
    return {
      step: this.state.step,
      filledFields: [...this.state.filledFields],
      issues: [...this.state.issues],
      captchaSolved: this.state.captchaSolved,
      platform: this.state.platform,
    };
  }
}
