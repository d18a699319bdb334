import { Locator, Page } from 'playwright';
import { FieldValues, LogicalField } from '../types';
import { PlatformSelectors } from '../utils/platformDetector';
import { TaggedElement, locatorFor, queryPage } from '../utils/dom';
import { OpResult, attempt, notFound, ok } from '../utils/result';
import { HumanSimulator } from './humanSimulator';
import { RunContext } from './runContext';

export interface FieldSpec {
  name: LogicalField;
  labels: string[];
  patterns: string[];
  // exact tokens of the HTML autocomplete attribute
  autofill?: string[];
  autocomplete?: boolean;
  complex?: boolean;
}

/**
 * Label texts and platform-agnostic attribute patterns for each logical field.
 * Order matters: more specific fields come before the ones they overlap with.
 */
export const FIELD_SPECS: FieldSpec[] = [
  { name: 'firstName', labels: ['first name', 'given name', 'vorname', 'prénom'], patterns: ['first_name', 'firstname', 'first-name', 'fname', 'given'], autofill: ['given-name'] },
  { name: 'lastName', labels: ['last name', 'surname', 'family name', 'nachname'], patterns: ['last_name', 'lastname', 'last-name', 'lname', 'surname', 'family'], autofill: ['family-name'] },
  { name: 'fullName', labels: ['full name', '=name', 'your name', 'legal name'], patterns: ['full_name', 'fullname', 'full-name', 'candidate_name', '_systemfield_name'], autofill: ['name'] },
  { name: 'email', labels: ['email', 'e-mail', 'email address'], patterns: ['email', 'e-mail'], autofill: ['email'] },
  { name: 'phone', labels: ['phone', 'mobile', 'telephone', 'phone number'], patterns: ['phone', 'mobile', 'telephone'], autofill: ['tel', 'tel-national'] },
  { name: 'currentLocation', labels: ['current location', 'where are you based'], patterns: ['current_location', 'currentlocation'], autocomplete: true },
  { name: 'location', labels: ['location', 'city', 'address'], patterns: ['location', 'city', 'address'], autocomplete: true },
  { name: 'currentCompany', labels: ['current company', 'current employer', '=company', '=employer'], patterns: ['current_company', 'company', 'employer'], autofill: ['organization'] },
  { name: 'salaryExpectation', labels: ['salary expectation', 'expected salary', 'desired salary', 'compensation'], patterns: ['salary', 'compensation'] },
  { name: 'noticePeriod', labels: ['notice period', 'availability', 'start date', 'when can you start'], patterns: ['notice', 'availability', 'start_date'] },
  { name: 'linkedinUrl', labels: ['linkedin'], patterns: ['linkedin'] },
  { name: 'portfolioUrl', labels: ['portfolio', 'website', 'personal site', 'github'], patterns: ['portfolio', 'website', 'github'], autofill: ['url'] },
  { name: 'note', labels: ['cover letter', 'additional information', 'message', 'anything else'], patterns: ['cover', 'comments', 'message', 'additional'], complex: true },
];

const DROPDOWN_OPTION_SELECTORS = [
  '[role="listbox"] [role="option"]',
  '[role="option"]',
  '.pac-item',
  '.select__option',
  'ul[class*="autocomplete"] li',
  'ul[class*="suggest"] li',
];

const DROPDOWN_WAIT_MS = 1500;
const DROPDOWN_POLL_MS = 250;

export type FillStrategy = 'label' | 'attribute' | 'autocomplete';

export type FillOutcome =
  | { status: 'filled'; strategy: FillStrategy }
  | { status: 'skipped' }
  | { status: 'failed'; detail: string };

/**
 * Resolves logical field names to fillable controls and writes values,
 * trying label match, then attribute patterns, then the autocomplete path.
 */
export class FieldResolver {
  // Element id -> the field written into it, so overlapping patterns never overwrite
  private readonly claimed = new Map<string, LogicalField>();

  constructor(
    private readonly page: Page,
    private readonly ctx: RunContext,
    private readonly sim: HumanSimulator,
    private readonly selectors: PlatformSelectors
  ) {}

  async fillAll(values: FieldValues): Promise<number> {
    let filled = 0;
    for (const spec of FIELD_SPECS) {
      const outcome = await this.fillField(spec, values[spec.name]);
      if (outcome.status === 'filled') {
        filled++;
        await this.sim.randomBreak();
      }
    }
    this.ctx.log.info(`Filled ${filled} field(s): ${[...this.ctx.state.filledFields].join(', ') || 'none'}`);
    return filled;
  }

  async fillField(spec: FieldSpec, value: string | undefined): Promise<FillOutcome> {
    if (!value || !value.trim()) {
      return { status: 'skipped' };
    }

    await this.sim.think(spec.complex ? 'complex_field' : 'simple_field');

    const byLabel = await queryPage(this.page, { mode: 'label', texts: spec.labels });
    const labelResult = await this.fillFirst(byLabel, value, spec);
    if (labelResult.kind === 'ok') {
      return this.filled(spec, labelResult.value ? 'autocomplete' : 'label');
    }

    const byAttribute = await queryPage(this.page, {
      mode: 'attributes',
      patterns: spec.patterns,
      autofill: spec.autofill,
      selectors: this.selectors.fields[spec.name] ?? [],
    });
    const attributeResult = await this.fillFirst(byAttribute, value, spec);
    if (attributeResult.kind === 'ok') {
      return this.filled(spec, attributeResult.value ? 'autocomplete' : 'attribute');
    }

    if (spec.autocomplete) {
      const widgets = await queryPage(this.page, {
        mode: 'css',
        selector: 'input[role="combobox"], input[aria-autocomplete], input.pac-target-input',
      });
      for (const widget of widgets) {
        const owner = this.claimed.get(widget.id);
        if (owner && owner !== spec.name) continue;
        const result = await this.fillAutocomplete(locatorFor(this.page, widget), value);
        if (result.kind === 'ok') {
          this.claimed.set(widget.id, spec.name);
          return this.filled(spec, 'autocomplete');
        }
      }
    }

    const detail = `Could not fill field "${spec.name}"`;
    this.ctx.addIssue(detail);
    return { status: 'failed', detail };
  }

  /**
   * Fill the first usable candidate. The ok value tells whether the
   * autocomplete path was used.
   */
  private async fillFirst(candidates: TaggedElement[], value: string, spec: FieldSpec): Promise<OpResult<boolean>> {
    for (const candidate of candidates) {
      const owner = this.claimed.get(candidate.id);
      if (!isTextual(candidate) || (owner && owner !== spec.name)) {
        continue;
      }
      if (candidate.type === 'email' && spec.name !== 'email') {
        continue;
      }
      const locator = locatorFor(this.page, candidate);
      if (spec.autocomplete && candidate.autocomplete) {
        const result = await this.fillAutocomplete(locator, value);
        if (result.kind === 'ok') {
          this.claimed.set(candidate.id, spec.name);
          return ok(true);
        }
        continue;
      }
      const result = await this.sim.fill(locator, value);
      if (result.kind === 'ok') {
        this.claimed.set(candidate.id, spec.name);
        return ok(false);
      }
      this.ctx.log.debug(`${spec.name}: ${result.detail}`);
    }
    return notFound(`no control for ${spec.name}`);
  }

  /**
   * Type into an autocomplete control, pick the first suggestion, or
   * confirm with Enter when no suggestion list shows up.
   */
  async fillAutocomplete(locator: Locator, value: string): Promise<OpResult<void>> {
    const typed = await this.sim.fill(locator, value);
    if (typed.kind !== 'ok') {
      return typed;
    }

    const deadline = this.ctx.timing.now() + DROPDOWN_WAIT_MS;
    do {
      for (const selector of DROPDOWN_OPTION_SELECTORS) {
        const [first] = await queryPage(this.page, { mode: 'css', selector });
        if (first) {
          const picked = await this.sim.click(locatorFor(this.page, first));
          if (picked.kind === 'ok') {
            this.ctx.log.debug(`Picked first suggestion for "${value}"`);
            return picked;
          }
        }
      }
      await this.ctx.timing.sleep(DROPDOWN_POLL_MS);
    } while (this.ctx.timing.now() < deadline);

    return attempt('confirm with Enter', () => locator.press('Enter', { timeout: 2000 }));
  }

  private filled(spec: FieldSpec, strategy: FillStrategy): FillOutcome {
    this.ctx.markFilled(spec.name);
    this.ctx.log.debug(`Filled ${spec.name} via ${strategy}`);
    return { status: 'filled', strategy };
  }
}

function isTextual(element: TaggedElement): boolean {
  if (element.tag === 'textarea') return true;
  if (element.tag !== 'input') return element.role === 'combobox';
  return ['', 'text', 'email', 'tel', 'url', 'search', 'number'].includes(element.type);
}
