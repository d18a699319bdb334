import { Locator, Page } from 'playwright';
import { TimingPolicy, chance, randomDelay, uniform } from '../utils/timing';
import { OpResult, attempt, ok } from '../utils/result';

/**
 * Human Interaction Simulator
 *
 * Wraps every page interaction with human-like pointer movement, typing and
 * think time. Gestures are best-effort: a failing gesture is a no-op and the
 * caller falls back to the direct Playwright action.
 */

export type ThinkBucket = 'simple_field' | 'complex_field' | 'decision' | 'review';

const THINK_TIME: Record<ThinkBucket, [number, number]> = {
  simple_field: [300, 900],
  complex_field: [800, 2200],
  decision: [1000, 2800],
  review: [1500, 4000],
};

const TYPO_PROBABILITY = 0.03;
const HESITATION_PROBABILITY = 0.02;
const CLEAR_FIRST_PROBABILITY = 0.1;
const LONG_BREAK_PROBABILITY = 0.05;
const SHORT_BREAK_PROBABILITY = 0.2;
const REVERSE_SCROLL_PROBABILITY = 0.15;

const WORDS_PER_SECOND = 4;
const MIN_READING_MS = 1500;
const MAX_READING_MS = 8000;

const NEIGHBOUR_KEYS = 'asdfghjklqwertyuiopzxcvbnm';

export interface Point {
  x: number;
  y: number;
}

export interface HumanSimulatorOptions {
  humanizedFillProbability: number;
}

export class HumanSimulator {
  private cursor: Point = { x: 0, y: 0 };

  constructor(
    private readonly page: Page,
    private readonly timing: TimingPolicy,
    private readonly options: HumanSimulatorOptions = { humanizedFillProbability: 0.7 }
  ) {}

  /**
   * Interpolated pointer path along a quadratic Bézier curve with a jittered
   * control point, 8-15 steps.
   */
  curvePath(from: Point, to: Point): Point[] {
    const steps = uniform(this.timing, 8, 15);
    const distance = Math.hypot(to.x - from.x, to.y - from.y);
    const spread = Math.max(20, distance * 0.3);
    const control: Point = {
      x: (from.x + to.x) / 2 + (this.timing.random() - 0.5) * spread,
      y: (from.y + to.y) / 2 + (this.timing.random() - 0.5) * spread,
    };

    const points: Point[] = [];
    for (let i = 1; i <= steps; i++) {
      const t = i / steps;
      const inv = 1 - t;
      points.push({
        x: inv * inv * from.x + 2 * inv * t * control.x + t * t * to.x,
        y: inv * inv * from.y + 2 * inv * t * control.y + t * t * to.y,
      });
    }
    return points;
  }

  async moveTo(target: Point): Promise<void> {
    try {
      for (const point of this.curvePath(this.cursor, target)) {
        await this.page.mouse.move(point.x, point.y);
        await randomDelay(this.timing, 5, 25);
      }
      this.cursor = target;
    } catch {
      // pointer gestures are cosmetic
    }
  }

  /**
   * Click a random point within 30-70% of the element's box after a short
   * approach. Falls back to Playwright's own click when the gesture fails.
   */
  async click(locator: Locator): Promise<OpResult<void>> {
    const gesture = await attempt('humanized click', async () => {
      await locator.scrollIntoViewIfNeeded({ timeout: 3000 });
      const box = await locator.boundingBox({ timeout: 3000 });
      if (!box) {
        throw new Error('element has no bounding box');
      }
      const x = box.x + box.width * (0.3 + this.timing.random() * 0.4);
      const y = box.y + box.height * (0.3 + this.timing.random() * 0.4);
      await this.moveTo({ x, y });
      await randomDelay(this.timing, 40, 160);
      await this.page.mouse.down();
      await randomDelay(this.timing, 50, 140);
      await this.page.mouse.up();
    });
    if (gesture.kind === 'ok') {
      return gesture;
    }
    return attempt('click', () => locator.click({ timeout: 5000 }));
  }

  /**
   * Fill a control. With `humanizedFillProbability` the value is typed with
   * human pacing; otherwise, or when typing did not land, it is assigned
   * directly. Only a failing direct assignment is reported.
   */
  async fill(locator: Locator, value: string): Promise<OpResult<void>> {
    if (chance(this.timing, this.options.humanizedFillProbability)) {
      await this.typeInto(locator, value);
      const landed = await attempt('read value', () => locator.inputValue({ timeout: 2000 }));
      if (landed.kind === 'ok' && landed.value === value) {
        return ok(undefined);
      }
    }
    return attempt('fill', () => locator.fill(value, { timeout: 5000 }));
  }

  /**
   * Character-by-character typing with occasional typos and hesitation.
   */
  async typeInto(locator: Locator, text: string): Promise<void> {
    try {
      await this.click(locator);
      const existing = await locator.inputValue({ timeout: 2000 }).catch(() => '');
      if (existing || chance(this.timing, CLEAR_FIRST_PROBABILITY)) {
        await this.page.keyboard.press('ControlOrMeta+A');
        await this.page.keyboard.press('Backspace');
        await randomDelay(this.timing, 80, 200);
      }

      for (const char of text) {
        if (chance(this.timing, TYPO_PROBABILITY)) {
          await this.page.keyboard.type(NEIGHBOUR_KEYS[uniform(this.timing, 0, NEIGHBOUR_KEYS.length - 1)]);
          await randomDelay(this.timing, 120, 350);
          await this.page.keyboard.press('Backspace');
        }
        if (chance(this.timing, HESITATION_PROBABILITY)) {
          await randomDelay(this.timing, 400, 1200);
        }
        await this.page.keyboard.type(char);
        await randomDelay(this.timing, 40, 160);
      }
    } catch {
      // caller verifies the value and falls back to a direct fill
    }
  }

  async think(bucket: ThinkBucket): Promise<void> {
    const [min, max] = THINK_TIME[bucket];
    await randomDelay(this.timing, min, max);
  }

  /**
   * Occasional pause independent of think time.
   */
  async randomBreak(): Promise<void> {
    const roll = this.timing.random();
    if (roll < LONG_BREAK_PROBABILITY) {
      await randomDelay(this.timing, 3000, 8000);
    } else if (roll < LONG_BREAK_PROBABILITY + SHORT_BREAK_PROBABILITY) {
      await randomDelay(this.timing, 500, 1500);
    }
  }

  /**
   * Reading time for a page of `wordCount` words, jittered and clamped.
   */
  readingTime(wordCount: number): number {
    const base = (wordCount / WORDS_PER_SECOND) * 1000;
    const jitter = 0.8 + this.timing.random() * 0.4;
    return Math.round(Math.min(MAX_READING_MS, Math.max(MIN_READING_MS, base * jitter)));
  }

  /**
   * Pause to "read" the page, then scroll through it in bursts.
   */
  async readPage(): Promise<void> {
    try {
      const wordCount = await this.page.evaluate(() => {
        const text = document.body ? document.body.innerText || document.body.textContent || '' : '';
        return text.split(/\s+/).filter(Boolean).length;
      });
      await this.timing.sleep(this.readingTime(wordCount));

      const bursts = uniform(this.timing, 2, 5);
      for (let i = 0; i < bursts; i++) {
        const steps = uniform(this.timing, 3, 6);
        for (let s = 0; s < steps; s++) {
          await this.page.mouse.wheel(0, uniform(this.timing, 60, 180));
          await randomDelay(this.timing, 40, 120);
        }
        if (chance(this.timing, REVERSE_SCROLL_PROBABILITY)) {
          await this.page.mouse.wheel(0, -uniform(this.timing, 40, 120));
        }
        await randomDelay(this.timing, 300, 900);
      }
    } catch {
      // reading pass is cosmetic
    }
  }
}
