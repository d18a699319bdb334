// @vitest-environment jsdom
import { beforeEach, describe, expect, test } from 'vitest';
import { Page } from 'playwright';
import { HumanSimulator } from '../../src/services/humanSimulator';
import { FakePage, setBody } from '../helpers/fakePage';
import { instantTiming } from '../helpers/timing';

// Pure helpers never touch the page
const noPage = {} as unknown as Page;

describe('HumanSimulator.curvePath', () => {
  test('produces 8-15 points ending exactly on the target', () => {
    const sim = new HumanSimulator(noPage, instantTiming({ seed: 7 }));
    for (let run = 0; run < 20; run++) {
      const path = sim.curvePath({ x: 0, y: 0 }, { x: 400, y: 250 });
      expect(path.length).toBeGreaterThanOrEqual(8);
      expect(path.length).toBeLessThanOrEqual(15);
      expect(path[path.length - 1]).toEqual({ x: 400, y: 250 });
    }
  });

  test('uses the most steps when the random source is at its top', () => {
    const sim = new HumanSimulator(noPage, instantTiming({ fixed: 0.999 }));
    expect(sim.curvePath({ x: 0, y: 0 }, { x: 10, y: 10 })).toHaveLength(15);
  });
});

describe('HumanSimulator.readingTime', () => {
  const sim = new HumanSimulator(noPage, instantTiming({ fixed: 0.5 }));

  test('is words divided by reading rate', () => {
    expect(sim.readingTime(20)).toBe(5000);
  });

  test('is clamped on both ends', () => {
    expect(sim.readingTime(0)).toBe(1500);
    expect(sim.readingTime(5000)).toBe(8000);
  });
});

describe('HumanSimulator.randomBreak', () => {
  test('takes a long break on a low roll', async () => {
    const timing = instantTiming({ fixed: 0.01 });
    await new HumanSimulator(noPage, timing).randomBreak();
    expect(timing.sleeps).toEqual([3050]);
  });

  test('takes a short break on a middling roll', async () => {
    const timing = instantTiming({ fixed: 0.1 });
    await new HumanSimulator(noPage, timing).randomBreak();
    expect(timing.sleeps).toEqual([600]);
  });

  test('usually carries on without a break', async () => {
    const timing = instantTiming({ fixed: 0.5 });
    await new HumanSimulator(noPage, timing).randomBreak();
    expect(timing.sleeps).toEqual([]);
  });
});

describe('HumanSimulator on a page', () => {
  beforeEach(() =>
    setBody(`
      <form>
        <input id="name" data-box="100,200,50,20">
        <input id="city" value="Paris" data-box="0,0,200,30">
      </form>`)
  );

  test('clicks inside the middle of the element box', async () => {
    const page = new FakePage();
    const sim = new HumanSimulator(page.asPage(), instantTiming({ fixed: 0.5 }));

    const result = await sim.click(page.asPage().locator('#name'));

    expect(result.kind).toBe('ok');
    const last = page.mouse.moves[page.mouse.moves.length - 1];
    expect(last.x).toBeCloseTo(125);
    expect(last.y).toBeCloseTo(210);
    expect(document.activeElement?.id).toBe('name');
    expect(page.clicks).toEqual([]);
  });

  test('click points stay within 30-70% of the box', async () => {
    const page = new FakePage();
    const sim = new HumanSimulator(page.asPage(), instantTiming({ seed: 11 }));

    for (let run = 0; run < 10; run++) {
      await sim.click(page.asPage().locator('#name'));
      const last = page.mouse.moves[page.mouse.moves.length - 1];
      expect(last.x).toBeGreaterThanOrEqual(115);
      expect(last.x).toBeLessThanOrEqual(135);
      expect(last.y).toBeGreaterThanOrEqual(206);
      expect(last.y).toBeLessThanOrEqual(214);
    }
  });

  test('falls back to a plain click when the element has no box', async () => {
    setBody('<button id="go">Go</button>');
    const page = new FakePage();
    const sim = new HumanSimulator(page.asPage(), instantTiming({ fixed: 0.5 }));

    expect((await sim.click(page.asPage().locator('#go'))).kind).toBe('ok');
    expect(page.mouse.moves).toEqual([]);
    expect(page.clicks).toEqual(['#go']);
  });

  test('types with a corrected typo and hesitation on a low random source', async () => {
    const page = new FakePage();
    const timing = instantTiming({ fixed: 0.01 });
    const sim = new HumanSimulator(page.asPage(), timing);

    const result = await sim.fill(page.asPage().locator('#name'), 'ab');

    expect(result.kind).toBe('ok');
    expect((document.getElementById('name') as HTMLInputElement).value).toBe('ab');
    expect(page.keyboard.strokes).toEqual([
      'press:ControlOrMeta+A',
      'press:Backspace',
      'type:a',
      'press:Backspace',
      'type:a',
      'type:a',
      'press:Backspace',
      'type:b',
    ]);
    // hesitation pause of 400 + floor(0.01 * 801) per character
    expect(timing.sleeps.filter((ms) => ms === 408)).toHaveLength(2);
  });

  test('clears an existing value before typing', async () => {
    const page = new FakePage();
    const sim = new HumanSimulator(page.asPage(), instantTiming({ fixed: 0.5 }));

    const result = await sim.fill(page.asPage().locator('#city'), 'Lyon');

    expect(result.kind).toBe('ok');
    expect((document.getElementById('city') as HTMLInputElement).value).toBe('Lyon');
    expect(page.keyboard.strokes).toEqual([
      'press:ControlOrMeta+A',
      'press:Backspace',
      'type:L',
      'type:y',
      'type:o',
      'type:n',
    ]);
  });
});
