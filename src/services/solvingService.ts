import { z } from 'zod';
import { config } from '../config';
import { logger } from '../utils/logger';
import { TimingPolicy } from '../utils/timing';
import { OpResult, describeError, ok, serviceError, timedOut } from '../utils/result';

export type SolvableCaptcha = 'recaptcha' | 'hcaptcha';

/**
 * External CAPTCHA solving service: exchanges a site key for a response token.
 */
export interface SolvingService {
  readonly name: string;
  solve(type: SolvableCaptcha, siteKey: string, pageUrl: string): Promise<OpResult<string>>;
}

export interface TwoCaptchaOptions {
  baseUrl: string;
  pollIntervalMs: number;
  maxPolls: number;
}

const twoCaptchaResponse = z.object({
  status: z.number(),
  request: z.string(),
});

const NOT_READY = 'CAPCHA_NOT_READY';

/**
 * 2Captcha API client (in.php / res.php, JSON mode)
 */
export class TwoCaptchaClient implements SolvingService {
  readonly name = '2captcha';

  constructor(
    private readonly apiKey: string,
    private readonly timing: TimingPolicy,
    private readonly options: TwoCaptchaOptions = {
      baseUrl: config.captchaServiceUrl,
      pollIntervalMs: config.captchaPollIntervalMs,
      maxPolls: config.captchaMaxPolls,
    }
  ) {}

  async solve(type: SolvableCaptcha, siteKey: string, pageUrl: string): Promise<OpResult<string>> {
    const submitUrl = new URL('/in.php', this.options.baseUrl);
    submitUrl.searchParams.set('key', this.apiKey);
    submitUrl.searchParams.set('json', '1');
    submitUrl.searchParams.set('pageurl', pageUrl);
    if (type === 'hcaptcha') {
      submitUrl.searchParams.set('method', 'hcaptcha');
      submitUrl.searchParams.set('sitekey', siteKey);
    } else {
      submitUrl.searchParams.set('method', 'userrecaptcha');
      submitUrl.searchParams.set('googlekey', siteKey);
    }

    const submitted = await this.call(submitUrl);
    if (submitted.kind !== 'ok') {
      return submitted;
    }
    const taskId = submitted.value;
    logger.debug(`2Captcha task ${taskId} created for ${type}`);

    const resultUrl = new URL('/res.php', this.options.baseUrl);
    resultUrl.searchParams.set('key', this.apiKey);
    resultUrl.searchParams.set('action', 'get');
    resultUrl.searchParams.set('id', taskId);
    resultUrl.searchParams.set('json', '1');

    for (let poll = 0; poll < this.options.maxPolls; poll++) {
      await this.timing.sleep(this.options.pollIntervalMs);
      const result = await this.call(resultUrl, NOT_READY);
      if (result.kind !== 'ok') {
        return result;
      }
      if (result.value !== NOT_READY) {
        return ok(result.value);
      }
    }

    return timedOut(`2Captcha task ${taskId} not solved after ${this.options.maxPolls} polls`);
  }

  /**
   * One API call. Returns `request` on status 1, or `pending` when the
   * service answers with that value.
   */
  private async call(url: URL, pending?: string): Promise<OpResult<string>> {
    try {
      const response = await fetch(url.toString(), { headers: { Accept: 'application/json' } });
      if (!response.ok) {
        return serviceError(`2Captcha HTTP ${response.status}`);
      }
      const parsed = twoCaptchaResponse.safeParse(await response.json());
      if (!parsed.success) {
        return serviceError('2Captcha returned an unexpected payload');
      }
      const { status, request } = parsed.data;
      if (status === 1) {
        return ok(request);
      }
      if (pending && request === pending) {
        return ok(pending);
      }
      return serviceError(`2Captcha error: ${request}`);
    } catch (error) {
      return serviceError(`2Captcha request failed: ${describeError(error)}`);
    }
  }
}
