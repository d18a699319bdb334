import { Page } from 'playwright';
import { isPlaceholderOption, locatorFor, readSelectOptions } from '../utils/dom';
import { attempt } from '../utils/result';
import { HumanSimulator } from './humanSimulator';
import { RunContext } from './runContext';

export interface RequiredViolation {
  id: string;
  kind: 'select' | 'combobox' | 'checkbox' | 'radio' | 'text';
  name: string;
}

/**
 * Lists required controls whose constraint is unmet. Runs in the browser.
 */
function findRequiredViolations(): RequiredViolation[] {
  const attr = 'data-fp-id';
  const placeholder = /^(select|choose|please|pick|--|—|-)|\.\.\.$|…$/i;

  const isVisible = (el: Element): boolean => {
    for (let node: Element | null = el; node; node = node.parentElement) {
      if (node instanceof HTMLElement && node.hidden) return false;
      const style = window.getComputedStyle(node);
      if (style.display === 'none' || style.visibility === 'hidden') return false;
    }
    return true;
  };
  const isRequired = (el: Element): boolean =>
    el.hasAttribute('required') || el.getAttribute('aria-required') === 'true';
  const tag = (el: Element): string => {
    let id = el.getAttribute(attr);
    if (!id) {
      const root = document.documentElement;
      const seq = Number(root.getAttribute('data-fp-seq') || '0') + 1;
      root.setAttribute('data-fp-seq', String(seq));
      id = `fp${seq}`;
      el.setAttribute(attr, id);
    }
    return id;
  };
  const nameOf = (el: Element): string =>
    el.getAttribute('name') || el.getAttribute('id') || el.getAttribute('aria-label') || el.tagName.toLowerCase();

  const violations: RequiredViolation[] = [];

  for (const select of Array.from(document.querySelectorAll('select'))) {
    if (!isRequired(select) || select.disabled || !isVisible(select)) continue;
    const selected = select.selectedIndex >= 0 ? select.options[select.selectedIndex] : null;
    if (!selected || !selected.value.trim() || placeholder.test((selected.textContent || '').trim())) {
      violations.push({ id: tag(select), kind: 'select', name: nameOf(select) });
    }
  }

  for (const box of Array.from(document.querySelectorAll('[role="combobox"]'))) {
    if (box instanceof HTMLSelectElement || !isRequired(box) || !isVisible(box)) continue;
    const value = box instanceof HTMLInputElement ? box.value : (box.textContent || '').trim();
    if (!value || placeholder.test(value)) {
      violations.push({ id: tag(box), kind: 'combobox', name: nameOf(box) });
    }
  }

  for (const box of Array.from(document.querySelectorAll<HTMLInputElement>('input[type="checkbox"]'))) {
    if (isRequired(box) && !box.checked && !box.disabled) {
      violations.push({ id: tag(box), kind: 'checkbox', name: nameOf(box) });
    }
  }

  const groups = new Map<string, HTMLInputElement[]>();
  for (const radio of Array.from(document.querySelectorAll<HTMLInputElement>('input[type="radio"]'))) {
    const group = radio.name || radio.id;
    if (!group) continue;
    groups.set(group, [...(groups.get(group) || []), radio]);
  }
  for (const [group, radios] of groups) {
    if (!radios.some(isRequired) || radios.some((r) => r.checked)) continue;
    const first = radios.find((r) => !r.disabled);
    if (first) {
      violations.push({ id: tag(first), kind: 'radio', name: group });
    }
  }

  const textual = 'input:not([type]), input[type="text"], input[type="email"], input[type="tel"], input[type="url"], input[type="number"], input[type="date"], input[type="search"], textarea';
  for (const field of Array.from(document.querySelectorAll<HTMLInputElement | HTMLTextAreaElement>(textual))) {
    if (field.getAttribute('role') === 'combobox') continue;
    if (!isRequired(field) || field.disabled || field.readOnly || !isVisible(field)) continue;
    if (!field.value.trim()) {
      violations.push({ id: tag(field), kind: 'text', name: nameOf(field) });
    }
  }

  return violations;
}

export async function scanRequiredViolations(page: Page): Promise<RequiredViolation[]> {
  try {
    return await page.evaluate(findRequiredViolations);
  } catch {
    return [];
  }
}

/**
 * Neutral values for required text controls nothing else filled.
 */
export function placeholderValue(type: string, ctx: RunContext): string {
  switch (type) {
    case 'email':
      return ctx.request.email ?? 'applicant@example.com';
    case 'tel':
      return ctx.request.phone ?? '0000000000';
    case 'url':
      return ctx.request.portfolioUrl ?? ctx.request.linkedinUrl ?? 'https://example.com';
    case 'number':
      return '0';
    case 'date':
      return new Date(ctx.timing.now()).toISOString().slice(0, 10);
    default:
      return 'N/A';
  }
}

/**
 * Required-Field Autofixer
 *
 * Supplies defaults for required controls left unmet. Sweeps run in a fixed
 * order and each fix is independent; the return value is the number of fixes.
 */
export class RequiredFieldFixer {
  constructor(
    private readonly page: Page,
    private readonly ctx: RunContext,
    private readonly sim: HumanSimulator
  ) {}

  async run(): Promise<number> {
    const violations = await scanRequiredViolations(this.page);
    if (violations.length === 0) {
      return 0;
    }

    let fixes = 0;
    for (const kind of ['select', 'combobox', 'checkbox', 'radio', 'text'] as const) {
      for (const violation of violations.filter((v) => v.kind === kind)) {
        if (await this.fix(violation)) {
          fixes++;
        }
      }
    }

    this.ctx.log.info(`Autofixer applied ${fixes} of ${violations.length} fix(es)`);
    return fixes;
  }

  private async fix(violation: RequiredViolation): Promise<boolean> {
    const locator = locatorFor(this.page, violation);

    const result = await attempt(`autofix ${violation.kind} ${violation.name}`, async () => {
      switch (violation.kind) {
        case 'select': {
          const options = await readSelectOptions(locator);
          const choice = options.find((o) => !o.disabled && !isPlaceholderOption(o));
          if (!choice) throw new Error('no selectable option');
          await locator.selectOption(choice.value, { timeout: 3000 });
          return;
        }
        case 'combobox':
          await this.sim.click(locator);
          await this.ctx.timing.sleep(300);
          await locator.press('ArrowDown', { timeout: 2000 });
          await locator.press('Enter', { timeout: 2000 });
          return;
        case 'checkbox':
        case 'radio':
          // custom-styled controls hide the native input
          await locator.check({ timeout: 3000, force: true });
          return;
        case 'text': {
          const type = (await locator.getAttribute('type', { timeout: 2000 })) ?? 'text';
          const filled = await this.sim.fill(locator, placeholderValue(type.toLowerCase(), this.ctx));
          if (filled.kind !== 'ok') throw new Error(filled.detail);
          return;
        }
      }
    });

    if (result.kind !== 'ok') {
      this.ctx.log.debug(result.detail);
      return false;
    }
    this.ctx.log.debug(`Autofixed ${violation.kind} "${violation.name}"`);
    return true;
  }
}
