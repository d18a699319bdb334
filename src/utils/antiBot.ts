import { BrowserContext, Page } from 'playwright';
import { logger } from './logger';
import { TimingPolicy, pick, randomDelay } from './timing';
import { NavigationError, describeError } from './result';

/**
 * Anti-bot detection utilities for human-like browser automation
 */

export const HARDENED_LAUNCH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-features=IsolateOrigins,site-per-process',
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-accelerated-2d-canvas',
  '--no-first-run',
  '--disable-gpu',
];

const VIEWPORTS = [
  { width: 1920, height: 1080 },
  { width: 1440, height: 900 },
  { width: 1536, height: 864 },
  { width: 1366, height: 768 },
  { width: 1600, height: 900 },
];

const USER_AGENTS = [
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
];

// Random viewport sizes to avoid fingerprinting
export const randomViewport = (timing: TimingPolicy): { width: number; height: number } =>
  pick(timing, VIEWPORTS);

// Chromium user agents only; the launched engine is always Chromium
export const randomUserAgent = (timing: TimingPolicy): string => pick(timing, USER_AGENTS);

// Add stealth scripts to every page of the context
export const addStealthScripts = async (context: BrowserContext): Promise<void> => {
  await context.addInitScript(() => {
    Object.defineProperty(navigator, 'webdriver', {
      get: () => undefined,
    });

    Object.defineProperty(window, 'chrome', {
      value: { runtime: {} },
      configurable: true,
    });

    Object.defineProperty(navigator, 'plugins', {
      get: () => [1, 2, 3, 4, 5],
    });

    Object.defineProperty(navigator, 'languages', {
      get: () => ['en-US', 'en'],
    });
  });

  logger.debug('Stealth scripts added to context');
};

/**
 * Readiness criteria tried in order, each looser than the last.
 */
export const READINESS_STRATEGIES = ['networkidle', 'load', 'domcontentloaded', 'commit'] as const;

/**
 * Navigate, cycling through progressively looser readiness criteria.
 * Throws NavigationError when every strategy fails.
 */
export const gotoWithReadiness = async (
  page: Page,
  url: string,
  timing: TimingPolicy,
  timeoutMs: number
): Promise<string> => {
  const failures: string[] = [];

  for (const waitUntil of READINESS_STRATEGIES) {
    try {
      await page.goto(url, { waitUntil, timeout: timeoutMs });
      await randomDelay(timing, 500, 1500);
      return waitUntil;
    } catch (error) {
      failures.push(`${waitUntil}: ${describeError(error)}`);
      logger.debug(`Navigation with ${waitUntil} failed: ${describeError(error)}`);
    }
  }

  throw new NavigationError(url, failures);
};
