import { config } from '../config';
import { ApplicationResult } from '../types';
import { logger } from '../utils/logger';

/**
 * In-memory history of finished runs, oldest evicted first
 */
export class RunStore {
  private runs: Map<string, ApplicationResult> = new Map();

  constructor(private readonly limit: number = config.runHistoryLimit) {}

  add(result: ApplicationResult): void {
    this.runs.set(result.runId, result);
    while (this.runs.size > this.limit) {
      const oldest = this.runs.keys().next();
      if (oldest.done) break;
      this.runs.delete(oldest.value);
      logger.debug(`Evicted run ${oldest.value} from history`);
    }
  }

  get(runId: string): ApplicationResult | undefined {
    return this.runs.get(runId);
  }

  get size(): number {
    return this.runs.size;
  }
}

export const runStore = new RunStore();
