import { chromium, Browser, Page } from 'playwright';
import { config } from '../config';
import { ProxyCredentials } from '../types';
import { HARDENED_LAUNCH_ARGS, addStealthScripts, randomUserAgent, randomViewport } from '../utils/antiBot';
import { logger } from '../utils/logger';
import { OpResult, describeError, ok, serviceError } from '../utils/result';
import { ManagedCaptchaSolver, ManagedSolveStatus } from './captchaSolver';
import { RunContext } from './runContext';

/**
 * One browser and one page owned by a single run.
 */
export interface BrowserSession {
  page: Page;
  remote: boolean;
  // only remote vendor sessions resolve CAPTCHAs themselves
  managedCaptcha?: ManagedCaptchaSolver;
  close(): Promise<void>;
}

export interface BrowserProvider {
  acquire(ctx: RunContext): Promise<BrowserSession>;
}

export interface BrowserProviderOptions {
  headless: boolean;
  slowMo: number;
  defaultWsEndpoint: string;
}

/**
 * CDP endpoint for the vendor, from an explicit endpoint or host credentials.
 */
export function remoteEndpoint(proxy: ProxyCredentials | undefined, fallback: string): string | null {
  if (proxy?.wsEndpoint) {
    return proxy.wsEndpoint;
  }
  if (proxy?.host) {
    const auth = proxy.username
      ? `${encodeURIComponent(proxy.username)}:${encodeURIComponent(proxy.password ?? '')}@`
      : '';
    return `wss://${auth}${proxy.host}`;
  }
  return fallback || null;
}

function mapManagedStatus(status: string): ManagedSolveStatus {
  switch (status) {
    case 'solve_finished':
      return 'solved';
    case 'not_detected':
      return 'not_detected';
    default:
      return 'failed';
  }
}

export class PlaywrightBrowserProvider implements BrowserProvider {
  constructor(
    private readonly options: BrowserProviderOptions = {
      headless: config.headless,
      slowMo: config.slowMo,
      defaultWsEndpoint: config.proxyWsEndpoint,
    }
  ) {}

  async acquire(ctx: RunContext): Promise<BrowserSession> {
    const endpoint = remoteEndpoint(ctx.request.proxy, this.options.defaultWsEndpoint);

    if (endpoint) {
      // The network retry rule bounds the connection attempts and spaces them out
      for (let attemptNo = 1; ; attemptNo++) {
        try {
          return await this.connectRemote(endpoint, ctx);
        } catch (error) {
          ctx.recordError('network', `remote browser attempt ${attemptNo}: ${describeError(error)}`);
        }
        if (!(await ctx.retry.shouldRetry('network', attemptNo))) {
          break;
        }
      }
      ctx.log.warn('Remote browser unavailable, falling back to a local browser');
    }

    return this.launchLocal(ctx);
  }

  private async connectRemote(endpoint: string, ctx: RunContext): Promise<BrowserSession> {
    const browser = await chromium.connectOverCDP(endpoint, { timeout: 30000 });
    let page: Page;
    try {
      const context = browser.contexts()[0] ?? (await browser.newContext());
      page = await context.newPage();
    } catch (error) {
      await closeBrowser(browser);
      throw error;
    }
    ctx.log.info('Connected to remote browser');

    const managedCaptcha: ManagedCaptchaSolver = {
      waitForManagedSolve: async (detectTimeoutMs: number): Promise<OpResult<ManagedSolveStatus>> => {
        try {
          const cdp = await page.context().newCDPSession(page);
          const { status } = await cdp.send('Captcha.waitForSolve', { detectTimeout: detectTimeoutMs });
          return ok(mapManagedStatus(status));
        } catch (error) {
          return serviceError(`Captcha.waitForSolve: ${describeError(error)}`);
        }
      },
    };

    return {
      page,
      remote: true,
      managedCaptcha,
      close: () => closeBrowser(browser),
    };
  }

  private async launchLocal(ctx: RunContext): Promise<BrowserSession> {
    const browser = await chromium.launch({
      headless: this.options.headless,
      slowMo: this.options.slowMo,
      args: HARDENED_LAUNCH_ARGS,
    });

    try {
      const context = await browser.newContext({
        viewport: randomViewport(ctx.timing),
        userAgent: randomUserAgent(ctx.timing),
        locale: 'en-US',
        timezoneId: 'America/Los_Angeles',
      });
      await addStealthScripts(context);
      const page = await context.newPage();
      ctx.log.info('Launched local browser');

      return { page, remote: false, close: () => closeBrowser(browser) };
    } catch (error) {
      await closeBrowser(browser);
      throw error;
    }
  }
}

async function closeBrowser(browser: Browser): Promise<void> {
  try {
    await browser.close();
    logger.debug('Browser closed');
  } catch (error) {
    logger.warn(`Browser close failed: ${describeError(error)}`);
  }
}
