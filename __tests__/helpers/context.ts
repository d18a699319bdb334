import { config } from '../../src/config';
import { RunContext } from '../../src/services/runContext';
import { ApplicationRequest } from '../../src/types';
import { TestTiming, instantTiming } from './timing';

export function makeContext(request: ApplicationRequest = {}, timing: TestTiming = instantTiming()): RunContext {
  return new RunContext('run-test-0001', request, timing, config.retryRules);
}
