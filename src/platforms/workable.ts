import { Page } from 'playwright';
import { BasePlatformHandler } from './base';
import { HumanSimulator } from '../services/humanSimulator';
import { RunContext } from '../services/runContext';

/**
 * Workable Platform Handler
 */
export class WorkableHandler extends BasePlatformHandler {
  constructor() {
    super('Workable');
  }

  async fillExtras(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<number> {
    let count = 0;

    if (await this.fillPortfolio(page, ctx, sim, ['input[name*="website"]', 'input[data-ui*="website"]'])) count++;
    if (await this.answerReferralSource(page, ctx, sim)) count++;

    return count;
  }
}
