// @vitest-environment jsdom
import { beforeEach, describe, expect, test, vi } from 'vitest';
import { parseApplicationRequest } from '../../src/api/routes';
import { config } from '../../src/config';
import { BrowserProvider } from '../../src/services/browserProvider';
import { DocumentExtractor } from '../../src/services/resumeExtractor';
import {
  OrchestratorSettings,
  SubmissionOrchestrator,
  mergeFieldValues,
} from '../../src/services/submissionOrchestrator';
import { VisionModel } from '../../src/services/visionClient';
import { ApplicationRequest, VisionVerdict } from '../../src/types';
import { FakePage, setBody } from '../helpers/fakePage';
import { instantTiming } from '../helpers/timing';

const JOB_URL = 'https://careers.example.com/jobs/42';

const FORM = `
  <form id="apply">
    <label for="first">First Name</label><input id="first" name="first_name">
    <label for="last">Last Name</label><input id="last" name="last_name">
    <label for="email">Email</label><input id="email" type="email" name="email">
    <label for="phone">Phone</label><input id="phone" type="tel" name="phone">
    <button type="submit" id="submit-btn">Submit application</button>
  </form>`;

const SETTINGS: OrchestratorSettings = {
  maxRetries: 5,
  maxWizardHops: 3,
  humanizedFillProbability: 0.7,
  urlChangeWaitMs: 1000,
  navigationTimeoutMs: 30000,
  resumeExcerptChars: 2000,
  managedCaptchaDetectTimeoutMs: 30000,
  retryRules: config.retryRules,
  screenshotsDir: undefined,
};

const MISSING_KEY: VisionVerdict = { success: false, reason: 'API key not provided', instructions: [] };

const baseRequest: ApplicationRequest = {
  jobUrl: JOB_URL,
  email: 'ada@example.com',
  firstName: 'Ada',
  lastName: 'Lovelace',
};

function setup(options: { vision?: Partial<VisionModel>; failScreenshots?: boolean } = {}) {
  const page = new FakePage({ failScreenshots: options.failScreenshots });
  const close = vi.fn(async () => undefined);
  const provider: BrowserProvider = {
    acquire: vi.fn(async () => ({ page: page.asPage(), remote: false, close })),
  };
  const extractor: DocumentExtractor = {
    extract: async () => ({ extraction: { fields: {}, text: '' }, file: null }),
  };
  const evaluate = vi.fn(async (): Promise<VisionVerdict> => MISSING_KEY);
  const vision: VisionModel = { available: false, evaluate, ...options.vision };

  const orchestrator = new SubmissionOrchestrator({
    browserProvider: provider,
    documentExtractor: extractor,
    createVisionModel: () => vision,
    createSolvingService: () => null,
    // 0.99 keeps every fill on the direct path
    timing: instantTiming({ fixed: 0.99 }),
    settings: SETTINGS,
    newRunId: () => 'run-0001',
  });
  return { page, close, provider, evaluate, vision, orchestrator };
}

const submitClicks = (page: FakePage): number => {
  const button = document.getElementById('submit-btn');
  const id = button?.getAttribute('data-fp-id');
  return page.clicks.filter((selector) => selector === `[data-fp-id="${id}"]`).length;
};

const linesEnding = (log: string[], text: string): number => log.filter((line) => line.endsWith(text)).length;

function confirmOnSubmit(): void {
  document.getElementById('submit-btn')?.addEventListener('click', () => {
    document.body.insertAdjacentHTML('beforeend', '<p>Application received</p>');
  });
}

describe('SubmissionOrchestrator', () => {
  beforeEach(() => {
    setBody(FORM);
    document.getElementById('apply')?.addEventListener('submit', (event) => event.preventDefault());
  });

  test('plan only: fills the form and never reaches the submission loop', async () => {
    const { page, orchestrator, close } = setup();

    const result = await orchestrator.submit({ ...baseRequest, planOnly: true });

    expect(result.status).toBe('planned_only');
    expect(result.phase).toBe('planned_only');
    expect(result.ok).toBe(true);
    expect(result.platform).toBe('generic');
    expect(result.attempts).toBe(0);
    expect((document.getElementById('first') as HTMLInputElement).value).toBe('Ada');
    expect((document.getElementById('email') as HTMLInputElement).value).toBe('ada@example.com');
    expect(result.state.filledFields).toEqual(expect.arrayContaining(['firstName', 'lastName', 'email']));
    expect(linesEnding(result.log, 'Submit clicked')).toBe(0);
    expect(page.visited).toEqual([JOB_URL]);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('without consent it stops before the submit click', async () => {
    const { page, orchestrator } = setup();

    const result = await orchestrator.submit(baseRequest);

    expect(result.status).toBe('awaiting_consent');
    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(1);
    expect(submitClicks(page)).toBe(0);
  });

  test('confirmation text after the click means success', async () => {
    confirmOnSubmit();
    const { page, orchestrator } = setup();

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('submitted');
    expect(result.phase).toBe('success');
    expect(result.attempts).toBe(1);
    expect(submitClicks(page)).toBe(1);
    expect(result.evidence.preSubmitScreenshot).toBe(Buffer.from('fake-png').toString('base64'));
    expect(result.evidence.postSubmitScreenshot).toBe(Buffer.from('fake-png').toString('base64'));
    expect(result.metrics.total).toBe(result.elapsedMs);
  });

  test('without a vision key it keeps trying until the retry limit', async () => {
    const { page, orchestrator, evaluate } = setup();

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('max_retries_reached');
    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(5);
    expect(submitClicks(page)).toBe(5);
    expect(evaluate).toHaveBeenCalledTimes(5);
    expect(linesEnding(result.log, 'Submit clicked')).toBe(5);
  });

  test('missing job URL or email fails before a browser is acquired', async () => {
    const { orchestrator, provider } = setup();

    const result = await orchestrator.submit({ jobUrl: '  ', email: 'ada@example.com' });

    expect(result.status).toBe('missing_fields');
    expect(result.ok).toBe(false);
    expect(result.error).toBe('Missing required fields: jobUrl');
    expect(provider.acquire).not.toHaveBeenCalled();
  });

  test('a body with null job URL and email is reported as missing fields', async () => {
    const { orchestrator, provider } = setup();
    const { request } = parseApplicationRequest({ jobUrl: null, email: null });

    const result = await orchestrator.submit(request ?? {});

    expect(result.status).toBe('missing_fields');
    expect(result.error).toBe('Missing required fields: jobUrl, email');
    expect(provider.acquire).not.toHaveBeenCalled();
  });

  test('a vision model that sees no confirmation and offers no fixes ends the run', async () => {
    const { orchestrator } = setup({
      vision: {
        available: true,
        evaluate: async () => ({ success: false, reason: 'Form still shown', instructions: [] }),
      },
    });

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('not_confirmed');
    expect(result.attempts).toBe(1);
  });

  test('replays vision instructions and confirms on the next attempt', async () => {
    const evaluate = vi
      .fn(async (): Promise<VisionVerdict> => ({ success: true, reason: 'Confirmation page', instructions: [] }))
      .mockResolvedValueOnce({ success: false, reason: 'Phone missing', instructions: ["fill Phone with '555 0100'"] });
    const { orchestrator } = setup({ vision: { available: true, evaluate } });

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('submitted');
    expect(result.attempts).toBe(2);
    expect(evaluate).toHaveBeenCalledTimes(2);
    expect((document.getElementById('phone') as HTMLInputElement).value).toBe('555 0100');
  });

  test('a navigation failure is an error result and the session is still closed', async () => {
    const { page, orchestrator, close } = setup();
    page.goto = async () => {
      throw new Error('net::ERR_NAME_NOT_RESOLVED');
    };

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('error');
    expect(result.phase).toBe('error');
    expect(result.error).toMatch(/^Navigation to https:\/\/careers\.example\.com\/jobs\/42 failed/);
    expect(close).toHaveBeenCalledTimes(1);
  });

  test('screenshot failures spend the submit retry budget and never click submit', async () => {
    const { page, orchestrator } = setup({ failScreenshots: true });

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('max_retries_reached');
    expect(result.attempts).toBe(2);
    expect(result.evidence.errorCounts.submit).toBe(2);
    expect(linesEnding(result.log, 'Retry budget for submit spent after 2 failure(s)')).toBe(1);
    expect(submitClicks(page)).toBe(0);
  });

  test('a form without a submit button spends the form_not_found retry budget', async () => {
    document.getElementById('submit-btn')?.remove();
    const { orchestrator, evaluate } = setup();

    const result = await orchestrator.submit({ ...baseRequest, allowSubmit: true });

    expect(result.status).toBe('max_retries_reached');
    expect(result.attempts).toBe(2);
    expect(result.evidence.errorCounts.form_not_found).toBe(2);
    expect(evaluate).not.toHaveBeenCalled();
  });

  test('expands disclosure sections but leaves comboboxes and menus alone', async () => {
    document.getElementById('apply')?.insertAdjacentHTML(
      'beforeend',
      `<button type="button" id="more" aria-expanded="false" aria-controls="extra">Additional details</button>
       <div id="extra"></div>
       <input id="country" role="combobox" aria-expanded="false" aria-controls="country-list">
       <button type="button" id="menu" aria-expanded="false" aria-controls="menu-list" aria-haspopup="listbox">Pick</button>
       <details><summary id="summary">Diversity questions</summary></details>`
    );
    const { page, orchestrator } = setup();
    const clicksOn = (id: string): number =>
      page.clicks.filter((selector) => document.querySelector(selector)?.id === id).length;

    const result = await orchestrator.submit(baseRequest);

    expect(result.status).toBe('awaiting_consent');
    expect(clicksOn('more')).toBe(1);
    expect(clicksOn('summary')).toBe(1);
    expect(clicksOn('country')).toBe(0);
    expect(clicksOn('menu')).toBe(0);
  });
});

describe('mergeFieldValues', () => {
  test('request values override résumé values and derive the full name', () => {
    expect(
      mergeFieldValues(
        { firstName: 'Ada', lastName: 'Lovelace', email: 'ada@example.com' },
        { email: 'ada@resume.example', phone: '+1 415 555 0100' }
      )
    ).toEqual({
      email: 'ada@example.com',
      phone: '+1 415 555 0100',
      firstName: 'Ada',
      lastName: 'Lovelace',
      fullName: 'Ada Lovelace',
    });
  });

  test('splits a full name when first or last name is missing', () => {
    expect(mergeFieldValues({ fullName: 'Grace Brewster Hopper' }, {})).toEqual({
      fullName: 'Grace Brewster Hopper',
      firstName: 'Grace',
      lastName: 'Hopper',
    });
  });
});
