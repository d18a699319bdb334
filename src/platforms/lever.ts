import { Page } from 'playwright';
import { BasePlatformHandler } from './base';
import { HumanSimulator } from '../services/humanSimulator';
import { RunContext } from '../services/runContext';

/**
 * Lever Platform Handler
 *
 * Lever forms expose links as `urls[<Name>]` inputs.
 */
export class LeverHandler extends BasePlatformHandler {
  constructor() {
    super('Lever');
  }

  async fillExtras(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<number> {
    let count = 0;

    if (
      await this.fillPortfolio(page, ctx, sim, [
        'input[name="urls[Portfolio]"]',
        'input[name="urls[Other]"]',
        'input[name="urls[GitHub]"]',
      ])
    ) {
      count++;
    }
    if (await this.answerReferralSource(page, ctx, sim)) count++;

    return count;
  }
}
