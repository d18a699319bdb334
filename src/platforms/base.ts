import { Page } from 'playwright';
import { TaggedElement, isPlaceholderOption, locatorFor, queryPage, readSelectOptions } from '../utils/dom';
import { HumanSimulator } from '../services/humanSimulator';
import { RunContext } from '../services/runContext';

const REFERRAL_LABELS = ['how did you hear', 'where did you hear', 'how did you find', 'referral source', 'source'];
const REFERRAL_PREFERENCES = [/linkedin/i, /job board|online|internet|website/i, /other/i];
const REFERRAL_TEXT = 'LinkedIn';

const PORTFOLIO_LABELS = ['portfolio', 'website', 'personal site', 'github'];

/**
 * Base Platform Handler
 * Platform handlers add opportunistic, platform-specific fills on top of the
 * field resolution chain. None of them is required for a successful run.
 */
export abstract class BasePlatformHandler {
  protected name: string;

  constructor(name: string) {
    this.name = name;
  }

  /**
   * Fill platform-specific extras. Returns how many controls were set.
   */
  abstract fillExtras(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<number>;

  /**
   * Answer "how did you hear about us" with a sensible source.
   */
  protected async answerReferralSource(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<boolean> {
    const [control] = await queryPage(page, { mode: 'label', texts: REFERRAL_LABELS });
    if (!control) {
      return false;
    }

    const locator = locatorFor(page, control);
    await sim.think('decision');

    if (control.tag === 'select') {
      const options = (await readSelectOptions(locator)).filter((o) => !o.disabled && !isPlaceholderOption(o));
      const choice =
        REFERRAL_PREFERENCES.map((pattern) => options.find((o) => pattern.test(o.text))).find(Boolean) ?? options[0];
      if (!choice) {
        return false;
      }
      const selected = await locator
        .selectOption(choice.value, { timeout: 3000 })
        .then(() => true)
        .catch(() => false);
      if (selected) {
        this.log(ctx, `Referral source set to "${choice.text}"`);
      }
      return selected;
    }

    const current = await locator.inputValue({ timeout: 2000 }).catch(() => '');
    if (current) {
      return false;
    }
    const result = await sim.fill(locator, REFERRAL_TEXT);
    if (result.kind === 'ok') {
      this.log(ctx, 'Referral source filled');
      return true;
    }
    return false;
  }

  /**
   * Put the portfolio URL into the first matching control that is still empty.
   */
  protected async fillPortfolio(page: Page, ctx: RunContext, sim: HumanSimulator, selectors: string[] = []): Promise<boolean> {
    const url = ctx.request.portfolioUrl;
    if (!url || ctx.state.filledFields.has('portfolioUrl')) {
      return false;
    }

    const candidates: TaggedElement[] = [];
    for (const selector of selectors) {
      candidates.push(...(await queryPage(page, { mode: 'css', selector })));
    }
    candidates.push(...(await queryPage(page, { mode: 'label', texts: PORTFOLIO_LABELS })));

    for (const candidate of candidates) {
      const locator = locatorFor(page, candidate);
      const current = await locator.inputValue({ timeout: 2000 }).catch(() => 'unreadable');
      if (current) continue;
      const result = await sim.fill(locator, url);
      if (result.kind === 'ok') {
        ctx.markFilled('portfolioUrl');
        this.log(ctx, 'Portfolio URL filled');
        return true;
      }
    }
    return false;
  }

  /**
   * Log application step
   */
  protected log(ctx: RunContext, message: string, level: 'info' | 'debug' | 'warn' = 'debug'): void {
    ctx.log[level](`[${this.name}] ${message}`);
  }
}

/**
 * Generic handler for pages without a dedicated handler
 */
export class GenericHandler extends BasePlatformHandler {
  constructor() {
    super('Generic');
  }

  async fillExtras(page: Page, ctx: RunContext, sim: HumanSimulator): Promise<number> {
    let count = 0;
    if (await this.answerReferralSource(page, ctx, sim)) count++;
    if (await this.fillPortfolio(page, ctx, sim)) count++;
    return count;
  }
}
