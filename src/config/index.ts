import dotenv from 'dotenv';
import path from 'path';
import { RetryRules } from '../types';

dotenv.config();

// Retry policy defaults, 0-indexed attempts against maxAttempts
const retryRules: RetryRules = {
  captcha: { maxAttempts: 3, delayMs: 2000 },
  network: { maxAttempts: 3, delayMs: 3000 },
  form_not_found: { maxAttempts: 2, delayMs: 1500 },
  submit: { maxAttempts: 2, delayMs: 2000 },
  default: { maxAttempts: 2, delayMs: 1000 },
};

export const config = {
  // Server
  port: parseInt(process.env.PORT || '3000', 10),
  nodeEnv: process.env.NODE_ENV || 'development',

  // Vision model
  openaiApiKey: process.env.OPENAI_API_KEY || '',
  visionModel: process.env.VISION_MODEL || 'gpt-4o',
  resumeExcerptChars: 2000,

  // CAPTCHA solving service (2Captcha)
  captchaApiKey: process.env.TWOCAPTCHA_API_KEY || '',
  captchaServiceUrl: process.env.TWOCAPTCHA_URL || 'https://2captcha.com',
  captchaPollIntervalMs: 5000,
  captchaMaxPolls: 24,
  managedCaptchaDetectTimeoutMs: 30000,

  // Remote browser / proxy vendor
  proxyWsEndpoint: process.env.PROXY_WS_ENDPOINT || '',

  // Paths
  dataDir: path.join(__dirname, '../../data'),
  screenshotsDir: path.join(__dirname, '../../data/screenshots'),
  logsDir: path.join(__dirname, '../../logs'),

  // Browser
  headless: process.env.HEADLESS !== 'false',
  slowMo: parseInt(process.env.SLOW_MO || '0', 10),
  navigationTimeoutMs: parseInt(process.env.NAVIGATION_TIMEOUT_MS || '45000', 10),

  // Submission loop
  maxRetries: parseInt(process.env.MAX_RETRIES || '5', 10),
  maxWizardHops: 3,
  humanizedFillProbability: 0.7,
  urlChangeWaitMs: 5000,

  retryRules,

  // Completed runs kept in memory for GET /api/runs/:id
  runHistoryLimit: 50,
};
