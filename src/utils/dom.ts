import { Locator, Page } from 'playwright';

export const TAG_ATTRIBUTE = 'data-fp-id';

/**
 * Queries that run inside the page. Matches are tagged with TAG_ATTRIBUTE so
 * the caller can act on them through a plain CSS locator.
 */
export type PageQuery =
  | { mode: 'label'; texts: string[] }
  | { mode: 'attributes'; patterns: string[]; selectors: string[]; autofill?: string[] }
  | { mode: 'css'; selector: string }
  | { mode: 'text'; texts: string[]; exact: boolean; clickableOnly: boolean }
  | { mode: 'images' };

export interface TaggedElement {
  id: string;
  tag: string;
  type: string;
  role: string;
  autocomplete: boolean;
}

/**
 * Runs in the browser; must not reference anything outside its own body.
 */
function runPageQuery(query: PageQuery): TaggedElement[] {
  const attr = 'data-fp-id';
  const norm = (value: string | null | undefined): string =>
    (value || '').replace(/\s+/g, ' ').replace(/\*/g, '').trim().toLowerCase();

  const isVisible = (el: Element): boolean => {
    if (el instanceof HTMLInputElement && el.type === 'hidden') return false;
    for (let node: Element | null = el; node; node = node.parentElement) {
      if (node instanceof HTMLElement && node.hidden) return false;
      const style = window.getComputedStyle(node);
      if (style.display === 'none' || style.visibility === 'hidden') return false;
    }
    return true;
  };

  const describe = (el: Element): TaggedElement => {
    let id = el.getAttribute(attr);
    if (!id) {
      const root = document.documentElement;
      const seq = Number(root.getAttribute('data-fp-seq') || '0') + 1;
      root.setAttribute('data-fp-seq', String(seq));
      id = `fp${seq}`;
      el.setAttribute(attr, id);
    }
    return {
      id,
      tag: el.tagName.toLowerCase(),
      type: (el.getAttribute('type') || '').toLowerCase(),
      role: (el.getAttribute('role') || '').toLowerCase(),
      autocomplete:
        el.getAttribute('role') === 'combobox' ||
        el.hasAttribute('aria-autocomplete') ||
        el.classList.contains('pac-target-input'),
    };
  };

  const fieldSelector =
    'input:not([type="hidden"]):not([type="submit"]):not([type="button"]), textarea, select, [role="combobox"]';

  const unique = (elements: Element[]): Element[] => [...new Set(elements)];

  if (query.mode === 'label') {
    // A leading "=" asks for an exact label match only
    const wanted = query.texts
      .map((text) => ({ exact: text.startsWith('='), text: norm(text.replace(/^=/, '')) }))
      .filter((want) => want.text);
    const scored: { el: Element; score: number }[] = [];
    const consider = (text: string, control: Element | null) => {
      if (!control || !isVisible(control)) return;
      const label = norm(text);
      if (!label) return;
      for (const want of wanted) {
        if (label === want.text) scored.push({ el: control, score: 2 });
        else if (!want.exact && label.includes(want.text)) scored.push({ el: control, score: 1 });
      }
    };

    for (const label of Array.from(document.querySelectorAll('label'))) {
      const target = label.htmlFor
        ? document.getElementById(label.htmlFor)
        : label.querySelector(fieldSelector);
      consider(label.textContent || '', target);
    }
    for (const control of Array.from(document.querySelectorAll('[aria-labelledby]'))) {
      const ids = (control.getAttribute('aria-labelledby') || '').split(/\s+/);
      const text = ids
        .map((ref) => document.getElementById(ref)?.textContent || '')
        .join(' ');
      consider(text, control);
    }

    scored.sort((a, b) => b.score - a.score);
    return unique(scored.map((s) => s.el)).map(describe);
  }

  if (query.mode === 'attributes') {
    const found: Element[] = [];
    for (const selector of query.selectors) {
      try {
        found.push(...Array.from(document.querySelectorAll(selector)).filter(isVisible));
      } catch {
        // unsupported selector in this document
      }
    }
    const patterns = query.patterns.map(norm).filter(Boolean);
    const autofill = (query.autofill || []).map(norm);
    for (const el of Array.from(document.querySelectorAll(fieldSelector))) {
      if (!isVisible(el)) continue;
      const haystack = ['name', 'id', 'aria-label', 'placeholder', 'data-qa']
        .map((name) => norm(el.getAttribute(name)))
        .join(' ');
      // autocomplete holds whole tokens such as "section-x shipping tel-national"
      const tokens = norm(el.getAttribute('autocomplete')).split(' ');
      if (patterns.some((p) => haystack.includes(p)) || tokens.some((t) => autofill.includes(t))) {
        found.push(el);
      }
    }
    return unique(found).map(describe);
  }

  if (query.mode === 'css') {
    let matches: Element[] = [];
    try {
      matches = Array.from(document.querySelectorAll(query.selector));
    } catch {
      return [];
    }
    return matches.filter(isVisible).map(describe);
  }

  if (query.mode === 'text') {
    const wanted = query.texts.map(norm).filter(Boolean);
    const selector = query.clickableOnly
      ? 'button, a, [role="button"], [role="option"], input[type="submit"], input[type="button"], label'
      : 'button, a, [role="button"], [role="option"], [role="radio"], [role="checkbox"], input[type="submit"], input[type="button"], label, span, div, li, p';
    const scored: { el: Element; score: number }[] = [];
    for (const el of Array.from(document.querySelectorAll(selector))) {
      if (!isVisible(el)) continue;
      const text = norm(
        el instanceof HTMLInputElement ? el.value : el.getAttribute('aria-label') || el.textContent
      );
      if (!text || text.length > 200) continue;
      for (const want of wanted) {
        if (text === want) scored.push({ el, score: 3 });
        else if (!query.exact && text.startsWith(want)) scored.push({ el, score: 2 });
        else if (!query.exact && text.includes(want)) scored.push({ el, score: 1 });
      }
    }
    // Prefer the innermost element for equal scores
    scored.sort(
      (a, b) =>
        b.score - a.score || a.el.querySelectorAll('*').length - b.el.querySelectorAll('*').length
    );
    return unique(scored.map((s) => s.el)).map(describe);
  }

  return Array.from(document.querySelectorAll('img, canvas'))
    .filter(isVisible)
    .map(describe);
}

export async function queryPage(page: Page, query: PageQuery): Promise<TaggedElement[]> {
  try {
    return await page.evaluate(runPageQuery, query);
  } catch {
    // Navigation or a detached frame mid-query leaves nothing to act on
    return [];
  }
}

export function locatorFor(page: Page, element: Pick<TaggedElement, 'id'>): Locator {
  return page.locator(`[${TAG_ATTRIBUTE}="${element.id}"]`);
}

/**
 * Rendered text of the document body.
 */
export async function getPageText(page: Page): Promise<string> {
  try {
    return await page.evaluate(() => {
      const body = document.body;
      if (!body) return '';
      return body.innerText || body.textContent || '';
    });
  } catch {
    return '';
  }
}

/**
 * Whether a string looks like a CSS selector rather than human-readable text.
 */
export function looksLikeSelector(value: string): boolean {
  return /^[#.[]|^[a-z][a-z0-9-]*[#.[]|\[[\w-]+[*^$~|]?=/.test(value.trim());
}

export interface SelectOption {
  value: string;
  text: string;
  disabled: boolean;
}

/**
 * Options of a native <select>; empty for any other element.
 */
export async function readSelectOptions(locator: Locator): Promise<SelectOption[]> {
  try {
    return await locator.evaluate((el) =>
      el instanceof HTMLSelectElement
        ? Array.from(el.options).map((option) => ({
            value: option.value,
            text: (option.textContent || '').trim(),
            disabled: option.disabled,
          }))
        : []
    );
  } catch {
    return [];
  }
}

const PLACEHOLDER_OPTION = /^(select|choose|please|pick|--|—|-)|\.\.\.$|…$/i;

export function isPlaceholderOption(option: SelectOption): boolean {
  return !option.value.trim() || PLACEHOLDER_OPTION.test(option.text);
}
