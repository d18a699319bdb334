import { Page } from 'playwright';
import { CaptchaChallenge, CaptchaType } from '../types';
import { OpResult } from '../utils/result';
import { RunContext } from './runContext';
import { SolvingService } from './solvingService';

export type ManagedSolveStatus = 'solved' | 'not_detected' | 'failed';

/**
 * CAPTCHA resolution performed by the remote browser vendor itself.
 */
export interface ManagedCaptchaSolver {
  waitForManagedSolve(detectTimeoutMs: number): Promise<OpResult<ManagedSolveStatus>>;
}

export interface DetectedCaptcha {
  type: CaptchaType;
  siteKey?: string;
}

export interface CaptchaChainOptions {
  managed?: ManagedCaptchaSolver;
  service: SolvingService | null;
  managedDetectTimeoutMs: number;
}

/**
 * Probes hCaptcha markers first, then reCAPTCHA, then the simple text and
 * audio challenges. Runs in the browser.
 */
function detectChallengeInPage(): DetectedCaptcha {
  const keyFromFrame = (src: string | null, param: string): string | undefined => {
    if (!src) return undefined;
    try {
      const url = new URL(src, window.location.href);
      return url.searchParams.get(param) || new URLSearchParams(url.hash.slice(1)).get(param) || undefined;
    } catch {
      return undefined;
    }
  };

  const hWidget = document.querySelector('.h-captcha[data-sitekey], [data-hcaptcha-sitekey]');
  if (hWidget) {
    return {
      type: 'hcaptcha',
      siteKey: hWidget.getAttribute('data-sitekey') || hWidget.getAttribute('data-hcaptcha-sitekey') || undefined,
    };
  }
  const hFrame = document.querySelector('iframe[src*="hcaptcha.com"]');
  if (hFrame) {
    return { type: 'hcaptcha', siteKey: keyFromFrame(hFrame.getAttribute('src'), 'sitekey') };
  }

  const rWidget = document.querySelector('.g-recaptcha[data-sitekey], [data-recaptcha-sitekey]');
  if (rWidget) {
    return {
      type: 'recaptcha',
      siteKey: rWidget.getAttribute('data-sitekey') || rWidget.getAttribute('data-recaptcha-sitekey') || undefined,
    };
  }
  const rFrame = document.querySelector('iframe[src*="recaptcha/api2/anchor"], iframe[src*="recaptcha/enterprise/anchor"], iframe[src*="recaptcha"]');
  if (rFrame) {
    return { type: 'recaptcha', siteKey: keyFromFrame(rFrame.getAttribute('src'), 'k') };
  }

  if (document.querySelector('img[src*="captcha"], img[alt*="captcha"], img[alt*="CAPTCHA"], input[name*="captcha"]')) {
    return { type: 'text' };
  }
  if (document.querySelector('#recaptcha-audio-button, button[aria-label*="audio challenge"]')) {
    return { type: 'audio' };
  }
  return { type: 'none' };
}

/**
 * Writes the solved token into the widget's response fields and fires the
 * widget callbacks so client-side validation accepts it. Runs in the browser.
 */
function injectTokenInPage(args: { type: 'recaptcha' | 'hcaptcha'; token: string }): number {
  const { type, token } = args;
  const names = type === 'hcaptcha' ? ['h-captcha-response', 'g-recaptcha-response'] : ['g-recaptcha-response'];

  for (const name of names) {
    let fields = Array.from(document.querySelectorAll<HTMLTextAreaElement>(`textarea[name="${name}"]`));
    if (fields.length === 0) {
      const created = document.createElement('textarea');
      created.name = name;
      created.style.display = 'none';
      (document.querySelector('form') || document.body).appendChild(created);
      fields = [created];
    }
    for (const field of fields) {
      field.value = token;
      field.textContent = token;
      field.dispatchEvent(new Event('input', { bubbles: true }));
      field.dispatchEvent(new Event('change', { bubbles: true }));
    }
  }

  let invoked = 0;
  for (const el of Array.from(document.querySelectorAll('[data-callback]'))) {
    const name = el.getAttribute('data-callback');
    const callback: unknown = name ? Reflect.get(window, name) : undefined;
    if (typeof callback === 'function') {
      callback(token);
      invoked++;
    }
  }

  // reCAPTCHA keeps widget callbacks in its client config
  const walk = (node: unknown, depth: number): void => {
    if (!node || typeof node !== 'object' || depth > 5) return;
    for (const [key, value] of Object.entries(node)) {
      if (key === 'callback' && typeof value === 'function') {
        value(token);
        invoked++;
      } else if (value && typeof value === 'object') {
        walk(value, depth + 1);
      }
    }
  };
  if (type === 'recaptcha') {
    walk(Reflect.get(window, '___grecaptcha_cfg'), 0);
  }

  for (const api of ['grecaptcha', 'hcaptcha']) {
    const widget: unknown = Reflect.get(window, api);
    if (widget && typeof widget === 'object') {
      Reflect.set(widget, 'getResponse', () => token);
    }
  }

  return invoked;
}

interface TierAttempt {
  challenge: CaptchaChallenge;
  // a tier actually tried and failed, so another attempt may help
  retryable: boolean;
}

/**
 * CAPTCHA Resolution Chain
 *
 * Tier 1: managed resolution by the remote browser vendor.
 * Tier 2: paid solving service with token injection.
 * Tier 3: text / audio detection stubs.
 * Failing every tier is never fatal.
 */
export class CaptchaChain {
  constructor(
    private readonly page: Page,
    private readonly ctx: RunContext,
    private readonly options: CaptchaChainOptions
  ) {}

  async detect(): Promise<DetectedCaptcha> {
    try {
      return await this.page.evaluate(detectChallengeInPage);
    } catch {
      return { type: 'none' };
    }
  }

  /**
   * Resolve with the captcha retry budget.
   */
  async resolve(): Promise<CaptchaChallenge> {
    for (let attemptNo = 0; ; attemptNo++) {
      const { challenge, retryable } = await this.attempt();

      if (challenge.outcome === 'solved') {
        this.ctx.state.captchaSolved = true;
        this.ctx.log.info(`CAPTCHA solved (${challenge.type}) by ${challenge.tier} tier`);
        return challenge;
      }
      if (challenge.outcome === 'not_detected') {
        return challenge;
      }
      if (!retryable || !(await this.ctx.retry.shouldRetry('captcha', attemptNo + 1))) {
        this.ctx.addIssue(`CAPTCHA (${challenge.type}): no automatic resolution${challenge.detail ? ` - ${challenge.detail}` : ''}`);
        return challenge;
      }
      this.ctx.log.info(`Retrying CAPTCHA resolution (attempt ${attemptNo + 2})`);
    }
  }

  private async attempt(): Promise<TierAttempt> {
    let retryable = false;

    if (this.options.managed) {
      const managed = await this.options.managed.waitForManagedSolve(this.options.managedDetectTimeoutMs);
      if (managed.kind === 'ok' && managed.value === 'solved') {
        return { challenge: { type: 'none', outcome: 'solved', tier: 'managed' }, retryable };
      }
      if (managed.kind === 'ok') {
        this.ctx.log.debug(`Managed CAPTCHA resolution: ${managed.value}`);
        retryable = managed.value === 'failed';
      } else {
        this.ctx.recordError('captcha', `managed resolution: ${managed.detail}`);
        retryable = true;
      }
    }

    const detected = await this.detect();
    if (detected.type === 'none') {
      return { challenge: { type: 'none', outcome: 'not_detected' }, retryable: false };
    }
    this.ctx.log.info(`CAPTCHA detected: ${detected.type}${detected.siteKey ? ` (site key ${detected.siteKey})` : ''}`);

    let detail: string | undefined;
    if ((detected.type === 'recaptcha' || detected.type === 'hcaptcha') && detected.siteKey) {
      const service = this.options.service;
      if (!service) {
        // kept apart from service failures in the log and error counts
        detail = 'solving service not configured';
        this.ctx.log.info('CAPTCHA service tier skipped: no credential configured');
      } else {
        const solved = await service.solve(detected.type, detected.siteKey, this.page.url());
        if (solved.kind === 'ok') {
          const invoked = await this.page
            .evaluate(injectTokenInPage, { type: detected.type, token: solved.value })
            .catch(() => -1);
          if (invoked >= 0) {
            this.ctx.log.debug(`Token injected, ${invoked} widget callback(s) invoked`);
            return {
              challenge: { type: detected.type, siteKey: detected.siteKey, outcome: 'solved', tier: 'service' },
              retryable,
            };
          }
          detail = 'token injection failed';
        } else {
          detail = `${service.name}: ${solved.detail}`;
        }
        this.ctx.recordError('captcha', detail);
        retryable = true;
      }
    }

    if (detected.type === 'text') {
      this.ctx.log.info('Text CAPTCHA detected; no OCR solver available');
    } else if (detected.type === 'audio') {
      this.ctx.log.info('Audio CAPTCHA challenge detected; no speech-to-text solver available');
    }

    return {
      challenge: { type: detected.type, siteKey: detected.siteKey, outcome: 'unsolved', tier: 'fallback', detail },
      retryable,
    };
  }
}
