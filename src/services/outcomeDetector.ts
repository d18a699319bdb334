import { Page } from 'playwright';
import phrases from '../config/outcomePhrases.json';
import { getPageText } from '../utils/dom';
import { RunContext } from './runContext';

export type HeuristicSignal = 'negative' | 'positive' | 'url_change' | 'none';

export interface HeuristicVerdict {
  success: boolean;
  signal: HeuristicSignal;
  phrase?: string;
}

const URL_POLL_MS = 500;

function normalize(text: string): string {
  return text.replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Classify rendered page text. Negative phrases win over positive ones.
 */
export function classifyPageText(text: string): HeuristicVerdict {
  const haystack = normalize(text);

  const negative = phrases.negative.find((phrase) => haystack.includes(phrase));
  if (negative) {
    return { success: false, signal: 'negative', phrase: negative };
  }

  const positive = phrases.positive.find((phrase) => haystack.includes(phrase));
  if (positive) {
    return { success: true, signal: 'positive', phrase: positive };
  }

  return { success: false, signal: 'none' };
}

/**
 * Heuristic half of the Outcome Detector. The model-assisted half lives in
 * visionClient.ts; the orchestrator ORs the two.
 */
export class OutcomeDetector {
  constructor(
    private readonly page: Page,
    private readonly ctx: RunContext,
    private readonly urlChangeWaitMs: number
  ) {}

  async check(urlBeforeSubmit: string): Promise<HeuristicVerdict> {
    const first = classifyPageText(await getPageText(this.page));
    if (first.signal !== 'none') {
      this.ctx.log.info(`Outcome heuristic: ${first.signal} phrase "${first.phrase}"`);
      return first;
    }

    const changedTo = await this.waitForUrlChange(urlBeforeSubmit);
    if (!changedTo) {
      this.ctx.log.debug('Outcome heuristic: no phrase matched and the URL did not change');
      return first;
    }

    await this.page.waitForLoadState('domcontentloaded', { timeout: 10000 }).catch(() => undefined);
    const rescan = classifyPageText(await getPageText(this.page));
    this.ctx.log.info(`URL changed to ${changedTo}; re-scan: ${rescan.signal}`);
    if (rescan.signal === 'none') {
      return { success: false, signal: 'url_change' };
    }
    return rescan;
  }

  private async waitForUrlChange(previous: string): Promise<string | null> {
    const deadline = this.ctx.timing.now() + this.urlChangeWaitMs;
    while (this.ctx.timing.now() < deadline) {
      const current = this.page.url();
      if (current !== previous) {
        return current;
      }
      await this.ctx.timing.sleep(URL_POLL_MS);
    }
    return this.page.url() !== previous ? this.page.url() : null;
  }
}
