import fs from 'fs/promises';
import path from 'path';
import { Page } from 'playwright';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { getPlatformHandler } from '../platforms';
import {
  ApplicationRequest,
  ApplicationResult,
  ApplicationStatus,
  ErrorCategory,
  FieldValues,
  LogicalField,
  RetryRules,
  TerminalPhase,
} from '../types';
import { gotoWithReadiness } from '../utils/antiBot';
import { PageQuery, locatorFor, queryPage } from '../utils/dom';
import { logApplication } from '../utils/logger';
import { PlatformSelectors, detectPlatformOnPage, extractCompanyFromUrl } from '../utils/platformDetector';
import { OpResult, PreconditionError, attempt, describeError, notFound, ok } from '../utils/result';
import { TimingPolicy, realTiming } from '../utils/timing';
import { BrowserProvider, BrowserSession, PlaywrightBrowserProvider } from './browserProvider';
import { CaptchaChain } from './captchaSolver';
import { FieldResolver } from './fieldResolver';
import { HumanSimulator } from './humanSimulator';
import { InstructionInterpreter } from './instructionInterpreter';
import { OutcomeDetector } from './outcomeDetector';
import { RequiredFieldFixer } from './requiredFieldFixer';
import { DocumentExtractor, ResumeExtractor, ResumeFile } from './resumeExtractor';
import { RunContext } from './runContext';
import { SolvingService, TwoCaptchaClient } from './solvingService';
import { VisionModel, createVisionModel } from './visionClient';

export interface OrchestratorSettings {
  maxRetries: number;
  maxWizardHops: number;
  humanizedFillProbability: number;
  urlChangeWaitMs: number;
  navigationTimeoutMs: number;
  resumeExcerptChars: number;
  managedCaptchaDetectTimeoutMs: number;
  retryRules: RetryRules;
  // screenshots are also written here when set
  screenshotsDir?: string;
}

export interface OrchestratorDeps {
  browserProvider: BrowserProvider;
  documentExtractor: DocumentExtractor;
  createVisionModel: (apiKey?: string) => VisionModel;
  createSolvingService: (apiKey: string | undefined, timing: TimingPolicy) => SolvingService | null;
  timing: TimingPolicy;
  settings: OrchestratorSettings;
  newRunId: () => string;
}

interface Terminal {
  status: ApplicationStatus;
  phase: TerminalPhase;
  error?: string;
}

interface RunPage {
  page: Page;
  ctx: RunContext;
  sim: HumanSimulator;
  selectors: PlatformSelectors;
  resolver: FieldResolver;
  fixer: RequiredFieldFixer;
  values: FieldValues;
}

const APPLICANT_FIELDS: LogicalField[] = [
  'firstName',
  'lastName',
  'fullName',
  'email',
  'phone',
  'location',
  'currentCompany',
  'currentLocation',
  'salaryExpectation',
  'noticePeriod',
  'linkedinUrl',
  'portfolioUrl',
  'note',
];

const APPLY_TEXTS = ['apply for this job', 'apply now', 'apply for this position', 'apply'];
const NEXT_TEXTS = ['next', 'continue', 'save and continue', 'weiter', 'suivant', 'siguiente'];
const SUBMIT_TEXTS = ['submit application', 'submit', 'send application', 'finish'];
// Disclosure toggles only; comboboxes and popup menus also carry aria-expanded
const COLLAPSED_SELECTOR =
  'button[aria-expanded="false"][aria-controls]:not([role="combobox"]):not([aria-haspopup]), details:not([open]) > summary';
const MAX_EXPANSIONS = 10;

export const defaultSettings = (): OrchestratorSettings => ({
  maxRetries: config.maxRetries,
  maxWizardHops: config.maxWizardHops,
  humanizedFillProbability: config.humanizedFillProbability,
  urlChangeWaitMs: config.urlChangeWaitMs,
  navigationTimeoutMs: config.navigationTimeoutMs,
  resumeExcerptChars: config.resumeExcerptChars,
  managedCaptchaDetectTimeoutMs: config.managedCaptchaDetectTimeoutMs,
  retryRules: config.retryRules,
  screenshotsDir: config.screenshotsDir,
});

function defaultSolvingService(apiKey: string | undefined, timing: TimingPolicy): SolvingService | null {
  const key = apiKey || config.captchaApiKey;
  return key ? new TwoCaptchaClient(key, timing) : null;
}

/**
 * Applicant values for the form: résumé-derived fields first, explicit
 * request values on top.
 */
export function mergeFieldValues(request: ApplicationRequest, fromResume: FieldValues): FieldValues {
  const values: FieldValues = { ...fromResume };
  for (const field of APPLICANT_FIELDS) {
    const value = request[field];
    if (typeof value === 'string' && value.trim()) {
      values[field] = value.trim();
    }
  }

  if (!values.fullName && values.firstName && values.lastName) {
    values.fullName = `${values.firstName} ${values.lastName}`;
  }
  if (values.fullName && (!values.firstName || !values.lastName)) {
    const parts = values.fullName.split(/\s+/);
    values.firstName = values.firstName ?? parts[0];
    if (parts.length > 1) {
      values.lastName = values.lastName ?? parts[parts.length - 1];
    }
  }
  return values;
}

/**
 * Submission Orchestrator
 *
 * Drives one application run: navigate, detect the platform, fill, then the
 * bounded captcha / submit / outcome loop. Always returns a result; the
 * browser session is released on every path.
 */
export class SubmissionOrchestrator {
  private readonly deps: OrchestratorDeps;

  constructor(deps: Partial<OrchestratorDeps> = {}) {
    this.deps = {
      browserProvider: deps.browserProvider ?? new PlaywrightBrowserProvider(),
      documentExtractor: deps.documentExtractor ?? new ResumeExtractor(),
      createVisionModel: deps.createVisionModel ?? createVisionModel,
      createSolvingService: deps.createSolvingService ?? defaultSolvingService,
      timing: deps.timing ?? realTiming,
      settings: deps.settings ?? defaultSettings(),
      newRunId: deps.newRunId ?? uuidv4,
    };
  }

  async submit(request: ApplicationRequest): Promise<ApplicationResult> {
    const { timing, settings } = this.deps;
    const ctx = new RunContext(this.deps.newRunId(), request, timing, settings.retryRules);
    ctx.log.info(`Starting application run for ${request.jobUrl || '(no job URL)'}`);

    const missing = (['jobUrl', 'email'] as const).filter((key) => !request[key]?.trim());
    if (missing.length > 0) {
      const error = new PreconditionError(missing);
      ctx.log.error(error.message);
      return this.finish(ctx, { status: 'missing_fields', phase: 'missing_fields', error: error.message }, 0);
    }
    const jobUrl = request.jobUrl?.trim() ?? '';

    let session: BrowserSession | null = null;
    let attempts = 0;
    try {
      const resume = await ctx.measure('resume', () => this.deps.documentExtractor.extract(request));
      session = await ctx.measure('browser', () => this.deps.browserProvider.acquire(ctx));
      const page = session.page;
      const sim = new HumanSimulator(page, timing, { humanizedFillProbability: settings.humanizedFillProbability });

      await ctx.measure('navigate', () => gotoWithReadiness(page, jobUrl, timing, settings.navigationTimeoutMs));
      ctx.setStep('page_loaded');
      ctx.setPhase('navigated');
      await sim.readPage();

      const detection = await detectPlatformOnPage(page);
      ctx.state.platform = detection.platform;
      ctx.setPhase('platform_detected');
      ctx.log.info(
        `Platform: ${detection.platform} (confidence ${detection.confidence}), company: ${extractCompanyFromUrl(page.url()) ?? 'unknown'}`
      );

      await this.openForm(page, ctx, sim, detection.selectors);

      ctx.setStep('filling_form');
      const values = mergeFieldValues(request, resume.extraction.fields);
      const run: RunPage = {
        page,
        ctx,
        sim,
        selectors: detection.selectors,
        resolver: new FieldResolver(page, ctx, sim, detection.selectors),
        fixer: new RequiredFieldFixer(page, ctx, sim),
        values,
      };

      await ctx.measure('fill', async () => {
        await run.resolver.fillAll(values);
        const extras = await getPlatformHandler(detection.platform).fillExtras(page, ctx, sim);
        ctx.log.debug(`Platform handler filled ${extras} extra control(s)`);
        if (resume.file) {
          await this.uploadResume(page, ctx, resume.file);
        }
      });
      await ctx.measure('autofix', () => run.fixer.run());
      ctx.setPhase('form_filled');

      if (request.planOnly) {
        ctx.log.info('Plan only: stopping before the submission loop');
        return this.finish(ctx, { status: 'planned_only', phase: 'planned_only' }, 0);
      }

      const vision = this.deps.createVisionModel(request.openaiApiKey);
      const captcha = new CaptchaChain(page, ctx, {
        managed: session.managedCaptcha,
        service: this.deps.createSolvingService(request.captchaApiKey, timing),
        managedDetectTimeoutMs: settings.managedCaptchaDetectTimeoutMs,
      });
      const detector = new OutcomeDetector(page, ctx, settings.urlChangeWaitMs);
      const interpreter = new InstructionInterpreter(page, ctx, sim);
      const excerpt = resume.extraction.text.slice(0, settings.resumeExcerptChars);

      const failures: Partial<Record<ErrorCategory, number>> = {};
      // Records the failure and reports whether its category still has budget
      const retryAfter = async (category: ErrorCategory, detail: string): Promise<boolean> => {
        ctx.recordError(category, detail);
        const count = (failures[category] ?? 0) + 1;
        failures[category] = count;
        if (await ctx.retry.shouldRetry(category, count)) {
          return true;
        }
        ctx.log.warn(`Retry budget for ${category} spent after ${count} failure(s)`);
        return false;
      };

      for (let attemptNo = 1; attemptNo <= settings.maxRetries; attemptNo++) {
        attempts = attemptNo;
        ctx.log.info(`Submission attempt ${attemptNo}/${settings.maxRetries}`);

        await this.expandSections(run);
        await ctx.measure('autofix', () => run.fixer.run());
        await ctx.measure('captcha', () => captcha.resolve());
        ctx.setPhase('captcha_cleared');
        await this.triggerValidation(run);
        await this.advanceWizard(run);

        if (!request.allowSubmit) {
          ctx.log.info('Submission not authorised; stopping before the submit click');
          return this.finish(ctx, { status: 'awaiting_consent', phase: 'awaiting_consent' }, attempts);
        }

        const urlBeforeSubmit = page.url();
        const pre = await this.capture(page, ctx, `pre-${attemptNo}`);
        if (pre.kind !== 'ok') {
          if (await retryAfter('submit', `pre-submit screenshot: ${pre.detail}`)) continue;
          break;
        }
        ctx.evidence.preSubmitScreenshot = pre.value;

        await sim.think('decision');
        const clicked = await ctx.measure('submit', () => this.clickSubmit(run));
        if (clicked.kind !== 'ok') {
          if (await retryAfter('form_not_found', `submit button: ${clicked.detail}`)) continue;
          break;
        }
        ctx.log.info('Submit clicked');
        ctx.setStep('submitted');
        ctx.setPhase('submitted');
        await sim.think('review');

        const post = await this.capture(page, ctx, `post-${attemptNo}`);
        if (post.kind !== 'ok') {
          if (await retryAfter('submit', `post-submit screenshot: ${post.detail}`)) continue;
          break;
        }
        ctx.evidence.postSubmitScreenshot = post.value;

        const heuristic = await ctx.measure('outcome', () => detector.check(urlBeforeSubmit));
        const verdict = await ctx.measure('vision', () =>
          vision.evaluate({ screenshot: post.value, resumeExcerpt: excerpt, knownFields: values })
        );
        ctx.setPhase('outcome_known');

        if (heuristic.success || verdict.success) {
          ctx.setStep('done');
          ctx.log.info(`Application confirmed (${heuristic.success ? `heuristic: "${heuristic.phrase}"` : `vision: ${verdict.reason}`})`);
          return this.finish(ctx, { status: 'submitted', phase: 'success' }, attempts);
        }
        ctx.log.info(`Not confirmed: ${verdict.reason || heuristic.signal}`);

        if (verdict.instructions.length > 0) {
          if (attemptNo < settings.maxRetries) {
            await ctx.measure('corrections', () => interpreter.execute(verdict.instructions));
          }
          continue;
        }
        if (vision.available) {
          return this.finish(ctx, { status: 'not_confirmed', phase: 'not_confirmed' }, attempts);
        }
      }

      ctx.log.warn(`Gave up after ${attempts} attempt(s)`);
      return this.finish(ctx, { status: 'max_retries_reached', phase: 'max_retries_reached' }, attempts);
    } catch (error) {
      ctx.log.error('Run failed', error);
      return this.finish(ctx, { status: 'error', phase: 'error', error: describeError(error) }, attempts);
    } finally {
      if (session) {
        await session.close();
      }
    }
  }

  /**
   * Click through an "Apply" button when the page does not show a form yet.
   */
  private async openForm(page: Page, ctx: RunContext, sim: HumanSimulator, selectors: PlatformSelectors): Promise<void> {
    const fields = await queryPage(page, {
      mode: 'css',
      selector: 'input[type="text"], input[type="email"], input:not([type]), textarea',
    });
    if (fields.length >= 2) {
      return;
    }

    const opened = await this.clickFirst(page, sim, [
      ...selectors.applyButton.map((selector): PageQuery => ({ mode: 'css', selector })),
      { mode: 'text', texts: APPLY_TEXTS, exact: false, clickableOnly: true },
    ]);
    if (opened.kind !== 'ok') {
      ctx.log.debug('No apply button found; assuming the form is on the page');
      return;
    }

    await page.waitForLoadState('domcontentloaded', { timeout: 15000 }).catch(() => undefined);
    await sim.think('decision');
    ctx.setStep('form_opened');
    ctx.log.info('Opened the application form');
  }

  private async uploadResume(page: Page, ctx: RunContext, file: ResumeFile): Promise<void> {
    const named = page.locator('input[type="file"][name*="resume"], input[type="file"][id*="resume"]');
    const input = (await named.count().catch(() => 0)) > 0 ? named.first() : page.locator('input[type="file"]').first();

    const uploaded = await attempt('upload résumé', () =>
      input.setInputFiles({ name: file.name, mimeType: file.mimeType, buffer: file.buffer }, { timeout: 5000 })
    );
    if (uploaded.kind === 'ok') {
      ctx.log.info(`Uploaded résumé ${file.name}`);
    } else {
      ctx.log.debug(uploaded.detail);
    }
  }

  private async expandSections({ page, ctx, sim }: RunPage): Promise<void> {
    const collapsed = await queryPage(page, { mode: 'css', selector: COLLAPSED_SELECTOR });
    let expanded = 0;
    for (const toggle of collapsed.slice(0, MAX_EXPANSIONS)) {
      const clicked = await sim.click(locatorFor(page, toggle));
      if (clicked.kind === 'ok') expanded++;
    }
    if (expanded > 0) {
      ctx.log.debug(`Expanded ${expanded} collapsed section(s)`);
    }
  }

  /**
   * Ask the browser to run native constraint validation so invalid
   * controls show their messages before the submit attempt.
   */
  private async triggerValidation({ page, ctx }: RunPage): Promise<void> {
    const invalid = await page
      .evaluate(() => {
        let count = 0;
        for (const form of Array.from(document.forms)) {
          try {
            if (!form.reportValidity()) count++;
          } catch {
            // reportValidity unsupported
          }
        }
        return count;
      })
      .catch(() => 0);
    if (invalid > 0) {
      ctx.log.info(`${invalid} form(s) report invalid controls`);
    }
  }

  /**
   * Multi-step forms: follow "next"/"continue" while no submit control is
   * shown, filling each new step.
   */
  private async advanceWizard(run: RunPage): Promise<void> {
    const { page, ctx, sim } = run;
    for (let hop = 1; hop <= this.deps.settings.maxWizardHops; hop++) {
      const submitShown = await queryPage(page, { mode: 'text', texts: SUBMIT_TEXTS, exact: false, clickableOnly: true });
      if (submitShown.length > 0) {
        return;
      }
      const [next] = await queryPage(page, { mode: 'text', texts: NEXT_TEXTS, exact: true, clickableOnly: true });
      if (!next) {
        return;
      }

      const clicked = await sim.click(locatorFor(page, next));
      if (clicked.kind !== 'ok') {
        return;
      }
      ctx.log.info(`Advanced wizard step ${hop}`);
      await page.waitForLoadState('domcontentloaded', { timeout: 10000 }).catch(() => undefined);
      await sim.think('decision');
      await run.resolver.fillAll(run.values);
      await run.fixer.run();
    }
  }

  private async clickSubmit({ page, sim, selectors }: RunPage): Promise<OpResult<void>> {
    return this.clickFirst(page, sim, [
      ...selectors.submit.map((selector): PageQuery => ({ mode: 'css', selector })),
      { mode: 'text', texts: SUBMIT_TEXTS, exact: false, clickableOnly: true },
    ]);
  }

  private async clickFirst(page: Page, sim: HumanSimulator, queries: PageQuery[]): Promise<OpResult<void>> {
    for (const query of queries) {
      const [first] = await queryPage(page, query);
      if (first) {
        const clicked = await sim.click(locatorFor(page, first));
        if (clicked.kind === 'ok') return clicked;
      }
    }
    return notFound('no matching control');
  }

  /**
   * Full-page screenshot as base64, also written to disk when configured.
   */
  private async capture(page: Page, ctx: RunContext, label: string): Promise<OpResult<string>> {
    const shot = await attempt('screenshot', () => page.screenshot({ fullPage: true, timeout: 15000 }));
    if (shot.kind !== 'ok') {
      return shot;
    }

    const dir = this.deps.settings.screenshotsDir;
    if (dir) {
      try {
        await fs.mkdir(dir, { recursive: true });
        await fs.writeFile(path.join(dir, `${ctx.runId}-${label}.png`), shot.value);
      } catch (error) {
        ctx.log.debug(`Screenshot not saved: ${describeError(error)}`);
      }
    }
    return ok(shot.value.toString('base64'));
  }

  private finish(ctx: RunContext, terminal: Terminal, attempts: number): ApplicationResult {
    ctx.setPhase(terminal.phase);
    const elapsedMs = ctx.elapsedMs();
    ctx.evidence.metrics.total = elapsedMs;
    ctx.log.info(`Run finished: ${terminal.status} after ${elapsedMs} ms`);
    logApplication(ctx.runId, ctx.request.jobUrl || '(none)', terminal.status);

    return {
      ok: terminal.status === 'submitted' || terminal.status === 'planned_only' || terminal.status === 'awaiting_consent',
      runId: ctx.runId,
      status: terminal.status,
      phase: ctx.phase,
      platform: ctx.state.platform,
      elapsedMs,
      evidence: ctx.evidence,
      log: ctx.log.entries,
      state: ctx.snapshot(),
      metrics: ctx.evidence.metrics,
      attempts,
      ...(terminal.error ? { error: terminal.error } : {}),
    };
  }
}
