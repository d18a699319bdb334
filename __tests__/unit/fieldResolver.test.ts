// @vitest-environment jsdom
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { FIELD_SPECS, FieldResolver } from '../../src/services/fieldResolver';
import { HumanSimulator } from '../../src/services/humanSimulator';
import { GENERIC_SELECTORS } from '../../src/utils/platformDetector';
import { FakePage, setBody } from '../helpers/fakePage';
import { makeContext } from '../helpers/context';
import { instantTiming } from '../helpers/timing';

const FORM = `
  <form>
    <label for="fn">First Name *</label><input id="fn" type="text">
    <label for="ln">Last Name</label><input id="ln">
    <input type="email" name="candidate_email" placeholder="you@company.com">
    <input name="city_of_residence">
  </form>`;

function setup() {
  const page = new FakePage();
  const ctx = makeContext({}, instantTiming({ fixed: 0.99 }));
  const sim = new HumanSimulator(page.asPage(), ctx.timing);
  return { ctx, sim, resolver: new FieldResolver(page.asPage(), ctx, sim, GENERIC_SELECTORS) };
}

const valueOf = (selector: string): string => {
  const el = document.querySelector(selector);
  return el instanceof HTMLInputElement ? el.value : '';
};

describe('FieldResolver', () => {
  beforeEach(() => setBody(FORM));

  test('fills by label first and by attribute pattern second', async () => {
    const { ctx, resolver } = setup();

    const filled = await resolver.fillAll({
      firstName: 'Ada',
      lastName: 'Lovelace',
      email: 'ada@example.com',
      location: 'London',
    });

    expect(filled).toBe(4);
    expect(valueOf('#fn')).toBe('Ada');
    expect(valueOf('#ln')).toBe('Lovelace');
    expect(valueOf('[name="candidate_email"]')).toBe('ada@example.com');
    expect(valueOf('[name="city_of_residence"]')).toBe('London');
    expect([...ctx.state.filledFields].sort()).toEqual(['email', 'firstName', 'lastName', 'location']);
    expect(ctx.state.issues).toEqual([]);
  });

  test('reports the strategy that resolved each field', async () => {
    const { resolver } = setup();
    const spec = (name: string) => {
      const found = FIELD_SPECS.find((s) => s.name === name);
      if (!found) throw new Error(name);
      return found;
    };

    expect(await resolver.fillField(spec('firstName'), 'Ada')).toEqual({ status: 'filled', strategy: 'label' });
    expect(await resolver.fillField(spec('email'), 'ada@example.com')).toEqual({
      status: 'filled',
      strategy: 'attribute',
    });
    expect(await resolver.fillField(spec('lastName'), '  ')).toEqual({ status: 'skipped' });
  });

  test('pauses between filled fields', async () => {
    const { sim, resolver } = setup();
    const breaks = vi.spyOn(sim, 'randomBreak');

    await resolver.fillAll({ firstName: 'Ada', lastName: 'Lovelace', phone: '+1 415 555 0100' });

    expect(breaks).toHaveBeenCalledTimes(2);
  });

  test('matches autocomplete attributes by whole token', async () => {
    setBody(`
      <form>
        <input id="title" autocomplete="organization-title">
        <input id="company" autocomplete="organization">
        <input id="hotel" name="hotel_name">
        <input id="tel" autocomplete="section-contact tel-national">
      </form>`);
    const { resolver } = setup();

    const filled = await resolver.fillAll({ currentCompany: 'Analytical Engines', phone: '+1 415 555 0100' });

    expect(filled).toBe(2);
    expect(valueOf('#company')).toBe('Analytical Engines');
    expect(valueOf('#title')).toBe('');
    expect(valueOf('#tel')).toBe('+1 415 555 0100');
    expect(valueOf('#hotel')).toBe('');
  });

  test('filling twice leaves the same values', async () => {
    const { ctx, resolver } = setup();
    const values = { firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.com' };

    await resolver.fillAll(values);
    await resolver.fillAll(values);

    expect(valueOf('#fn')).toBe('Ada');
    expect(valueOf('#ln')).toBe('Lovelace');
    expect(valueOf('[name="candidate_email"]')).toBe('ada@example.com');
    expect(ctx.state.filledFields.size).toBe(3);
  });

  test('records an issue when no control matches', async () => {
    const { ctx, resolver } = setup();

    const filled = await resolver.fillAll({ phone: '+1 415 555 0100' });

    expect(filled).toBe(0);
    expect(ctx.state.issues).toEqual(['Could not fill field "phone"']);
  });

  test('picks the first suggestion of an autocomplete widget', async () => {
    setBody(`
      <label for="loc">Location</label>
      <input id="loc" role="combobox" aria-autocomplete="list">
      <div id="suggestions"></div>`);
    const input = document.getElementById('loc');
    input?.addEventListener('input', () => {
      const list = document.getElementById('suggestions');
      if (list) list.innerHTML = '<ul role="listbox"><li role="option">London, UK</li></ul>';
      list?.querySelector('li')?.addEventListener('click', () => {
        if (input instanceof HTMLInputElement) input.value = 'London, UK';
      });
    });
    const { ctx, resolver } = setup();

    await resolver.fillAll({ location: 'London' });

    expect(valueOf('#loc')).toBe('London, UK');
    expect(ctx.state.filledFields.has('location')).toBe(true);
  });
});
