import { Page } from 'playwright';
import { LogicalField, Platform, PlatformConfidence } from '../types';

/**
 * Selectors specialised for one ATS. Generic pages get GENERIC_SELECTORS.
 */
export interface PlatformSelectors {
  applyButton: string[];
  submit: string[];
  fields: Partial<Record<LogicalField, string[]>>;
}

export interface PlatformDetection {
  platform: Platform;
  confidence: PlatformConfidence;
  selectors: PlatformSelectors;
}

interface PlatformSignature {
  platform: Platform;
  // matched against the hostname only, anchored on domain boundaries
  hostPatterns: RegExp[];
  // matched against the full URL
  urlPatterns?: RegExp[];
  htmlMarkers: RegExp[];
}

/**
 * Platform signatures in priority order
 */
const platformSignatures: PlatformSignature[] = [
  {
    platform: 'greenhouse',
    hostPatterns: [/(^|\.)greenhouse\.io$/],
    urlPatterns: [/[?&]gh_jid=/i],
    htmlMarkers: [/boards\.greenhouse\.io/i, /id="application_form"|id="application-form"/i, /grnhse/i],
  },
  {
    platform: 'lever',
    hostPatterns: [/(^|\.)lever\.co$/],
    htmlMarkers: [/lever-jobs-embed|lever-application/i, /class="application-page"/i],
  },
  {
    platform: 'workable',
    hostPatterns: [/(^|\.)workable\.com$/],
    htmlMarkers: [/workable-application|data-ui="application-form"/i],
  },
  {
    platform: 'ashby',
    hostPatterns: [/(^|\.)ashbyhq\.com$/],
    htmlMarkers: [/ashby-application|_ashby/i],
  },
  {
    platform: 'smartrecruiters',
    hostPatterns: [/(^|\.)smartrecruiters\.com$/],
    htmlMarkers: [/smartrecruiters/i],
  },
  {
    platform: 'workday',
    hostPatterns: [/(^|\.)myworkdayjobs\.com$/, /(^|\.)workday\.com$/],
    htmlMarkers: [/data-automation-id="/i, /wd-popup/i],
  },
  {
    platform: 'bamboohr',
    hostPatterns: [/(^|\.)bamboohr\.com$/],
    htmlMarkers: [/bamboohr/i],
  },
  {
    platform: 'jobvite',
    hostPatterns: [/(^|\.)jobvite\.com$/],
    htmlMarkers: [/jv-careersite|jobvite/i],
  },
  {
    platform: 'icims',
    hostPatterns: [/(^|\.)icims\.com$/],
    htmlMarkers: [/icims_content_iframe|iCIMS/],
  },
  {
    platform: 'teamtailor',
    hostPatterns: [/(^|\.)teamtailor\.com$/],
    htmlMarkers: [/teamtailor/i],
  },
  {
    platform: 'recruitee',
    hostPatterns: [/(^|\.)recruitee\.com$/],
    htmlMarkers: [/recruitee/i],
  },
  {
    platform: 'personio',
    hostPatterns: [/(^|\.)personio\.(de|com)$/],
    htmlMarkers: [/personio/i],
  },
];

export const GENERIC_SELECTORS: PlatformSelectors = {
  applyButton: ['a[href*="apply" i]', '.apply-button', '.btn-apply', '#apply-button', '[data-testid="apply-button"]'],
  submit: ['button[type="submit"]', 'input[type="submit"]', '.submit-button', '.btn-submit'],
  fields: {},
};

const platformSelectors: Partial<Record<Platform, PlatformSelectors>> = {
  greenhouse: {
    applyButton: ['#apply_button', 'a[href="#app"]', 'button[aria-label*="Apply"]'],
    submit: ['#submit_app', 'button[type="submit"]', 'input[type="submit"]'],
    fields: {
      firstName: ['#first_name', 'input[name="job_application[first_name]"]'],
      lastName: ['#last_name', 'input[name="job_application[last_name]"]'],
      email: ['#email', 'input[name="job_application[email]"]'],
      phone: ['#phone', 'input[name="job_application[phone]"]'],
      location: ['#job_application_location', '#candidate-location', 'input[name="job_application[location]"]'],
      linkedinUrl: ['input[name*="linkedin"]', 'input[autocomplete="custom-question-linkedin-profile"]'],
    },
  },
  lever: {
    applyButton: ['a.postings-btn[href*="/apply"]', '.template-btn-submit'],
    submit: ['#btn-submit', 'button[data-qa="btn-submit"]', 'button[type="submit"]'],
    fields: {
      fullName: ['input[name="name"]'],
      email: ['input[name="email"]'],
      phone: ['input[name="phone"]'],
      currentCompany: ['input[name="org"]'],
      location: ['input[name="location"]', '#location-input'],
      linkedinUrl: ['input[name="urls[LinkedIn]"]'],
      portfolioUrl: ['input[name="urls[Portfolio]"]', 'input[name="urls[Other]"]'],
      note: ['textarea[name="comments"]'],
    },
  },
  workable: {
    applyButton: ['a[data-ui="apply-button"]', 'button[data-ui="apply-button"]'],
    submit: ['button[data-ui="apply-button"]', 'button[type="submit"]'],
    fields: {
      firstName: ['input[name="firstname"]'],
      lastName: ['input[name="lastname"]'],
      email: ['input[name="email"]'],
      phone: ['input[name="phone"]'],
      location: ['input[name="address"]', 'input[data-ui="address"]'],
    },
  },
  ashby: {
    applyButton: ['a[href$="/application"]', 'button[class*="apply"]'],
    submit: ['button[class*="submit"]', 'button[type="submit"]'],
    fields: {
      fullName: ['#_systemfield_name', 'input[name="_systemfield_name"]'],
      email: ['#_systemfield_email', 'input[name="_systemfield_email"]'],
      location: ['input[placeholder*="Start typing"]'],
    },
  },
  workday: {
    applyButton: ['a[data-automation-id="adventureButton"]', 'button[data-automation-id="applyManually"]'],
    submit: ['button[data-automation-id="bottom-navigation-next-button"]', 'button[data-automation-id="pageFooterNextButton"]'],
    fields: {
      firstName: ['input[data-automation-id="legalNameSection_firstName"]'],
      lastName: ['input[data-automation-id="legalNameSection_lastName"]'],
      email: ['input[data-automation-id="email"]'],
      phone: ['input[data-automation-id="phone-number"]'],
    },
  },
};

function hostnameOf(url: string): string {
  try {
    return new URL(url).hostname.toLowerCase();
  } catch {
    return '';
  }
}

function matchSignature(text: string, patterns: RegExp[]): boolean {
  return patterns.some((pattern) => pattern.test(text));
}

export function getPlatformSelectors(platform: Platform): PlatformSelectors {
  const specific = platformSelectors[platform];
  if (!specific) {
    return GENERIC_SELECTORS;
  }
  return {
    applyButton: [...specific.applyButton, ...GENERIC_SELECTORS.applyButton],
    submit: [...specific.submit, ...GENERIC_SELECTORS.submit],
    fields: specific.fields,
  };
}

/**
 * Classify the ATS behind a page. URL matches are `high` confidence, HTML
 * marker matches `medium`; anything else is the generic platform.
 */
export function detectPlatform(url: string, html = ''): PlatformDetection {
  const hostname = hostnameOf(url);

  for (const { platform, hostPatterns, urlPatterns = [] } of platformSignatures) {
    if ((hostname && matchSignature(hostname, hostPatterns)) || matchSignature(url || '', urlPatterns)) {
      return { platform, confidence: 'high', selectors: getPlatformSelectors(platform) };
    }
  }

  if (html) {
    for (const { platform, htmlMarkers } of platformSignatures) {
      if (matchSignature(html, htmlMarkers)) {
        return { platform, confidence: 'medium', selectors: getPlatformSelectors(platform) };
      }
    }
  }

  return {
    platform: 'generic',
    confidence: html ? 'low' : 'none',
    selectors: GENERIC_SELECTORS,
  };
}

/**
 * Detect from the live page: its current URL and rendered HTML.
 */
export async function detectPlatformOnPage(page: Page): Promise<PlatformDetection> {
  const html = await page.content().catch(() => '');
  return detectPlatform(page.url(), html);
}

/**
 * Extract company name from career page URL
 */
export function extractCompanyFromUrl(url: string): string | null {
  try {
    const hostname = new URL(url).hostname;

    // company.greenhouse.io, jobs.lever.co/company
    if (hostname.includes('lever.co') || hostname.includes('ashbyhq.com')) {
      const segment = new URL(url).pathname.split('/').filter(Boolean)[0];
      return segment || null;
    }
    if (hostname.includes('greenhouse.io')) {
      const parts = hostname.split('.');
      if (parts.length >= 3 && parts[0] !== 'boards' && parts[0] !== 'job-boards') {
        return parts[0];
      }
      return new URL(url).pathname.split('/').filter(Boolean)[0] || null;
    }

    if (hostname.startsWith('careers.') || hostname.startsWith('jobs.')) {
      const parts = hostname.split('.');
      return parts.length >= 2 ? parts[1] : null;
    }

    const parts = hostname.replace('www.', '').split('.');
    return parts.length >= 2 ? parts[0] : null;
  } catch {
    return null;
  }
}
