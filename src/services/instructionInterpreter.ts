import { Locator, Page } from 'playwright';
import { ActionTarget, CorrectiveAction } from '../types';
import {
  PageQuery,
  TaggedElement,
  isPlaceholderOption,
  locatorFor,
  looksLikeSelector,
  queryPage,
  readSelectOptions,
} from '../utils/dom';
import { OpResult, attempt, describeError, notFound, ok } from '../utils/result';
import { HumanSimulator } from './humanSimulator';
import { RunContext } from './runContext';

type AliasedKind = 'fill' | 'select' | 'check' | 'click' | 'skip';

const ACTION_ALIASES: Record<string, AliasedKind> = {
  fill: 'fill',
  type: 'fill',
  enter: 'fill',
  select: 'select',
  choose: 'select',
  check: 'check',
  tick: 'check',
  click: 'click',
  press: 'click',
  skip: 'skip',
};

// Challenge grids are three tiles wide
export const GRID_COLUMNS = 3;

const GRID_SELECTORS = [
  '.rc-imageselect-tile',
  'td[role="button"]',
  '.task-image',
  '.captcha-grid img',
  '[class*="captcha"] img',
];

const CAPTCHA_SUBMIT_SELECTORS = ['#recaptcha-verify-button', '.button-submit', 'button[class*="verify"]'];

const UNSOLVABLE = /\bunsolvable\b|cannot be solved automatically/i;

export function gridIndex(row: number, col: number): number {
  return (row - 1) * GRID_COLUMNS + (col - 1);
}

function cleanTarget(text: string): string {
  return text
    .trim()
    .replace(/^['"]|['"]$/g, '')
    .replace(/\s+(field|dropdown|checkbox|button)$/i, '')
    .trim();
}

function toTarget(text: string): ActionTarget {
  const cleaned = cleanTarget(text);
  return looksLikeSelector(cleaned) ? { selector: cleaned } : { label: cleaned };
}

/**
 * Collect every label and selector a structured instruction names. Labels are
 * tried before selectors when the action runs.
 */
function readTarget(record: Record<string, unknown>): ActionTarget | null {
  const target: ActionTarget = {};
  for (const key of ['label', 'field', 'target', 'element', 'selector']) {
    const value = record[key];
    if (typeof value !== 'string' || !value.trim()) {
      continue;
    }
    const { label, selector } = toTarget(value);
    if (label && !target.label) {
      target.label = label;
    }
    if (selector && !target.selector) {
      target.selector = selector;
    }
  }
  return target.label || target.selector ? target : null;
}

/**
 * Best-effort adapter from a free-text directive to an action.
 */
export function parseDirective(text: string): CorrectiveAction | null {
  const directive = text.trim();
  if (!directive) {
    return null;
  }

  if (UNSOLVABLE.test(directive)) {
    return { kind: 'skip', reason: directive };
  }

  const grid = directive.match(/click\s+(?:on\s+)?(?:the\s+)?captcha\s+image\s+(?:at\s+)?(?:position\s+)?\(?\s*(\d+)\s*,\s*(\d+)\s*\)?/i);
  if (grid) {
    return { kind: 'captcha_grid', row: Number(grid[1]), col: Number(grid[2]) };
  }
  if (/click\s+(?:on\s+)?(?:the\s+)?captcha\s+(?:submit|verify)/i.test(directive)) {
    return { kind: 'captcha_submit' };
  }

  const fill = directive.match(/^(?:fill|type|enter)\s+(?:in\s+)?(?:the\s+)?(.+?)\s+(?:field\s+)?with\s+(['"])(.*)\2\s*\.?$/i);
  if (fill) {
    return { kind: 'fill', target: toTarget(fill[1]), value: fill[3] };
  }

  const select = directive.match(/^(?:select|choose)\s+(['"])(.+?)\1\s+(?:in|from)\s+(?:the\s+)?(?:dropdown\s+)?(.+?)\s*(?:dropdown)?\.?$/i);
  if (select) {
    return { kind: 'select', target: toTarget(select[3]), value: select[2] };
  }

  const check = directive.match(/^(?:check|tick)\s+(?:the\s+)?(['"]?)(.+?)\1\s*(?:checkbox|box)?\.?$/i);
  if (check) {
    return { kind: 'check', target: toTarget(check[2]) };
  }

  const quotedClick = directive.match(/^(?:click|press)\s+(?:on\s+)?(?:the\s+)?(['"])(.+?)\1/i);
  if (quotedClick) {
    return { kind: 'click', target: toTarget(quotedClick[2]) };
  }
  const click = directive.match(/^(?:click|press)\s+(?:on\s+)?(?:the\s+)?(.+?)(?:\s+button)?\.?$/i);
  if (click) {
    return { kind: 'click', target: toTarget(click[1]) };
  }

  return null;
}

function readString(record: Record<string, unknown>, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === 'string' && value.trim()) return value;
    if (typeof value === 'number') return String(value);
  }
  return undefined;
}

/**
 * Normalise one raw instruction into the action union. Returns null for
 * anything that cannot be understood.
 */
export function normalizeInstruction(raw: unknown): CorrectiveAction | null {
  if (typeof raw === 'string') {
    return parseDirective(raw);
  }
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    return null;
  }
  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));

  const actionName = readString(record, ['action', 'type', 'kind'])?.toLowerCase().trim();
  const reason = readString(record, ['reason', 'description', 'note']) ?? '';
  if (record.unsolvable === true || UNSOLVABLE.test(reason)) {
    return { kind: 'skip', reason: reason || 'unsolvable challenge' };
  }

  const row = Number(record.row);
  const col = Number(record.col ?? record.column);
  if (actionName && /captcha/.test(actionName)) {
    if (Number.isInteger(row) && Number.isInteger(col) && row > 0 && col > 0) {
      return { kind: 'captcha_grid', row, col };
    }
    return /submit|verify/.test(actionName) ? { kind: 'captcha_submit' } : null;
  }

  const kind: AliasedKind | undefined = actionName ? ACTION_ALIASES[actionName] : undefined;
  if (!kind) {
    const text = readString(record, ['instruction', 'directive', 'text']);
    return text ? parseDirective(text) : null;
  }
  if (kind === 'skip') {
    return { kind: 'skip', reason: reason || 'skipped by model' };
  }

  const target = readTarget(record);
  if (!target) {
    return null;
  }
  const value = readString(record, ['value', 'text', 'option']);

  switch (kind) {
    case 'fill':
    case 'select':
      return value === undefined ? null : { kind, target, value };
    case 'check':
    case 'click':
      return { kind, target };
  }
}

type ActionOutcome = 'executed' | 'skipped' | 'failed';

/**
 * Instruction Interpreter
 *
 * Replays corrective actions from a vision verdict against the live page.
 * Never throws; returns whether at least one action ran.
 */
export class InstructionInterpreter {
  constructor(
    private readonly page: Page,
    private readonly ctx: RunContext,
    private readonly sim: HumanSimulator
  ) {}

  async execute(instructions: unknown): Promise<boolean> {
    if (!Array.isArray(instructions)) {
      this.ctx.log.debug('No instruction list to replay');
      return false;
    }

    let executed = 0;
    for (const raw of instructions) {
      const action = normalizeInstruction(raw);
      if (!action) {
        this.ctx.log.debug(`Ignoring unrecognised instruction: ${JSON.stringify(raw)}`);
        continue;
      }
      try {
        const outcome = await this.run(action);
        if (outcome === 'executed') executed++;
      } catch (error) {
        this.ctx.log.warn(`Instruction ${action.kind} failed: ${describeError(error)}`);
      }
    }

    this.ctx.log.info(`Replayed ${executed} of ${instructions.length} instruction(s)`);
    return executed > 0;
  }

  private async run(action: CorrectiveAction): Promise<ActionOutcome> {
    switch (action.kind) {
      case 'skip':
        this.ctx.log.info(`Skipping instruction: ${action.reason}`);
        return 'skipped';
      case 'captcha_grid':
        return this.report(`captcha tile (${action.row},${action.col})`, await this.clickGridTile(action.row, action.col));
      case 'captcha_submit':
        return this.report('captcha submit', await this.clickFirst([
          ...CAPTCHA_SUBMIT_SELECTORS.map((selector): PageQuery => ({ mode: 'css', selector })),
          { mode: 'text', texts: ['verify'], exact: true, clickableOnly: true },
        ]));
      case 'click':
        return this.report(`click ${describeTarget(action.target)}`, await this.click(action.target));
      case 'fill': {
        const control = await this.resolveControl(action.target);
        const result = control ? await this.sim.fill(control, action.value) : notFound('no control');
        return this.report(`fill ${describeTarget(action.target)}`, result);
      }
      case 'select': {
        const control = await this.resolveControl(action.target);
        const result = control ? await this.select(control, action.value) : notFound('no control');
        return this.report(`select ${describeTarget(action.target)}`, result);
      }
      case 'check': {
        const control = await this.resolveControl(action.target);
        const result = control
          ? await attempt('check', () => control.check({ timeout: 3000, force: true }))
          : await this.click(action.target);
        return this.report(`check ${describeTarget(action.target)}`, result);
      }
    }
  }

  private report(what: string, result: OpResult<unknown>): ActionOutcome {
    if (result.kind === 'ok') {
      this.ctx.log.info(`Instruction executed: ${what}`);
      return 'executed';
    }
    this.ctx.log.debug(`Instruction failed: ${what} (${result.detail})`);
    return 'failed';
  }

  /**
   * Label lookup first, then the raw selector, then attribute and
   * placeholder text.
   */
  private async resolveControl(target: ActionTarget): Promise<Locator | null> {
    const queries: PageQuery[] = [];
    if (target.label) {
      queries.push({ mode: 'label', texts: [target.label] });
      queries.push({ mode: 'attributes', patterns: [target.label], selectors: [] });
    }
    if (target.selector) {
      queries.push({ mode: 'css', selector: target.selector });
    }
    const found = await this.firstMatch(queries);
    return found ? locatorFor(this.page, found) : null;
  }

  private async click(target: ActionTarget): Promise<OpResult<void>> {
    const queries: PageQuery[] = [];
    if (target.label) {
      queries.push({ mode: 'label', texts: [target.label] });
      queries.push({ mode: 'text', texts: [target.label], exact: false, clickableOnly: true });
    }
    if (target.selector) {
      queries.push({ mode: 'css', selector: target.selector });
    }
    return this.clickFirst(queries);
  }

  private async select(control: Locator, value: string): Promise<OpResult<void>> {
    const options = await readSelectOptions(control);
    if (options.length > 0) {
      const wanted = value.trim().toLowerCase();
      const choice =
        options.find((o) => o.text.toLowerCase() === wanted || o.value.toLowerCase() === wanted) ??
        options.find((o) => !isPlaceholderOption(o) && o.text.toLowerCase().includes(wanted));
      if (!choice) {
        return notFound(`no option "${value}"`);
      }
      return attempt('select option', async () => {
        await control.selectOption(choice.value, { timeout: 3000 });
      });
    }

    // custom dropdown: open it, then click the option by its text
    const opened = await this.sim.click(control);
    if (opened.kind !== 'ok') {
      return opened;
    }
    await this.ctx.timing.sleep(300);
    return this.clickFirst([{ mode: 'text', texts: [value], exact: false, clickableOnly: true }]);
  }

  private async clickGridTile(row: number, col: number): Promise<OpResult<void>> {
    if (row < 1 || col < 1 || col > GRID_COLUMNS) {
      return notFound(`grid position (${row},${col}) out of range`);
    }
    const index = gridIndex(row, col);

    for (const selector of GRID_SELECTORS) {
      const tiles = await queryPage(this.page, { mode: 'css', selector });
      if (tiles.length > index) {
        const clicked = await this.sim.click(locatorFor(this.page, tiles[index]));
        if (clicked.kind === 'ok') return clicked;
      }
    }

    const images = await queryPage(this.page, { mode: 'images' });
    if (images.length > index) {
      return this.sim.click(locatorFor(this.page, images[index]));
    }
    return notFound(`no grid tile at index ${index}`);
  }

  private async clickFirst(queries: PageQuery[]): Promise<OpResult<void>> {
    for (const query of queries) {
      for (const element of await queryPage(this.page, query)) {
        const clicked = await this.sim.click(locatorFor(this.page, element));
        if (clicked.kind === 'ok') {
          return ok(undefined);
        }
      }
    }
    return notFound('no clickable element');
  }

  private async firstMatch(queries: PageQuery[]): Promise<TaggedElement | null> {
    for (const query of queries) {
      const [first] = await queryPage(this.page, query);
      if (first) return first;
    }
    return null;
  }
}

function describeTarget(target: ActionTarget): string {
  return `"${target.label ?? target.selector ?? '?'}"`;
}
