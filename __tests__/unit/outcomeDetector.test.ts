// @vitest-environment jsdom
import { beforeEach, describe, expect, test } from 'vitest';
import { OutcomeDetector, classifyPageText } from '../../src/services/outcomeDetector';
import { FakePage, setBody } from '../helpers/fakePage';
import { makeContext } from '../helpers/context';

describe('classifyPageText', () => {
  test('recognises a confirmation phrase', () => {
    expect(classifyPageText('Application received. We will be in touch.')).toEqual({
      success: true,
      signal: 'positive',
      phrase: 'application received',
    });
  });

  test('negative phrases win over positive ones', () => {
    const verdict = classifyPageText('Thank you!\nEmail   is required');
    expect(verdict.success).toBe(false);
    expect(verdict.signal).toBe('negative');
    expect(verdict.phrase).toBe('is required');
  });

  test('matches confirmations in other languages', () => {
    expect(classifyPageText('Vielen Dank für Ihre Bewerbung!').success).toBe(true);
    expect(classifyPageText('Merci pour votre candidature').success).toBe(true);
  });

  test('neutral text is not a success', () => {
    expect(classifyPageText('Senior Platform Engineer - Berlin')).toEqual({ success: false, signal: 'none' });
  });
});

describe('OutcomeDetector.check', () => {
  beforeEach(() => setBody('<main><h1>Senior Platform Engineer</h1></main>'));

  test('returns the first scan when the page already confirms', async () => {
    setBody('<p>Thanks for applying</p>');
    const page = new FakePage();
    const detector = new OutcomeDetector(page.asPage(), makeContext(), 2000);

    const verdict = await detector.check(page.url());
    expect(verdict).toEqual({ success: true, signal: 'positive', phrase: 'thanks for applying' });
  });

  test('re-scans after the URL changes', async () => {
    const page = new FakePage({ url: 'https://careers.example.com/jobs/42/confirmation' });
    page.waitForLoadState = async () => setBody('<p>We have received your application</p>');
    const detector = new OutcomeDetector(page.asPage(), makeContext(), 2000);

    const verdict = await detector.check('https://careers.example.com/jobs/42/apply');
    expect(verdict.success).toBe(true);
    expect(verdict.phrase).toBe('we have received your application');
  });

  test('a URL change without a confirmation phrase is not a success', async () => {
    const page = new FakePage({ url: 'https://careers.example.com/jobs/42/step-2' });
    const detector = new OutcomeDetector(page.asPage(), makeContext(), 2000);

    expect(await detector.check('https://careers.example.com/jobs/42/apply')).toEqual({
      success: false,
      signal: 'url_change',
    });
  });

  test('gives up when nothing changes within the wait window', async () => {
    const page = new FakePage();
    const ctx = makeContext();
    const started = ctx.timing.now();
    const detector = new OutcomeDetector(page.asPage(), ctx, 2000);

    expect(await detector.check(page.url())).toEqual({ success: false, signal: 'none' });
    expect(ctx.timing.now() - started).toBe(2000);
  });
});
