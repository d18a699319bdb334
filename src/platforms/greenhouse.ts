import { Page } from 'playwright';
import { BasePlatformHandler } from './base';
import { HumanSimulator } from '../services/humanSimulator';
import { RunContext } from '../services/runContext';
import { locatorFor, queryPage } from '../utils/dom';

/**
 * Greenhouse Platform Handler
 *
 * Greenhouse boards keep custom questions under `job_application[answers_attributes]`
 * and often ask for a website next to the LinkedIn question.
 */
export class GreenhouseHandler extends BasePlatformHandler {
  constructor() {
    super('Greenhouse');
  }

  async fillExtras(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<number> {
    let count = 0;

    if (await this.answerReferralSource(page, ctx, sim)) count++;
    if (
      await this.fillPortfolio(page, ctx, sim, [
        'input[autocomplete="custom-question-website"]',
        'input[name*="website"]',
      ])
    ) {
      count++;
    }
    if (await this.acknowledgePrivacyNotice(page, ctx)) count++;

    return count;
  }

  /**
   * Newer boards gate submission on a data-privacy acknowledgement checkbox.
   */
  private async acknowledgePrivacyNotice(page: Page, ctx: RunContext): Promise<boolean> {
    const [checkbox] = await queryPage(page, {
      mode: 'css',
      selector: 'input[type="checkbox"][name*="gdpr"], input[type="checkbox"][id*="privacy"]',
    });
    if (!checkbox) {
      return false;
    }
    const checked = await locatorFor(page, checkbox)
      .check({ timeout: 3000 })
      .then(() => true)
      .catch(() => false);
    if (checked) {
      this.log(ctx, 'Privacy notice acknowledged');
    }
    return checked;
  }
}
