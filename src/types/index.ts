// Platform Types
export type Platform =
  | 'greenhouse'
  | 'lever'
  | 'workable'
  | 'ashby'
  | 'smartrecruiters'
  | 'workday'
  | 'bamboohr'
  | 'jobvite'
  | 'icims'
  | 'teamtailor'
  | 'recruitee'
  | 'personio'
  | 'generic';

export type PlatformConfidence = 'high' | 'medium' | 'low' | 'none';

// Request Types
export interface ProxyCredentials {
  wsEndpoint?: string;
  host?: string;
  username?: string;
  password?: string;
}

export interface ApplicationRequest {
  jobUrl?: string;
  email?: string;
  firstName?: string;
  lastName?: string;
  fullName?: string;
  phone?: string;
  location?: string;
  currentCompany?: string;
  currentLocation?: string;
  salaryExpectation?: string;
  noticePeriod?: string;
  linkedinUrl?: string;
  portfolioUrl?: string;
  note?: string;
  resumeUrl?: string;
  resumeBase64?: string;
  resumeFileName?: string;
  planOnly?: boolean;
  allowSubmit?: boolean;
  openaiApiKey?: string;
  captchaApiKey?: string;
  proxy?: ProxyCredentials;
}

/**
 * Logical applicant fields the engine knows how to place on a form.
 * Keys match the applicant properties of ApplicationRequest.
 */
export type LogicalField =
  | 'firstName'
  | 'lastName'
  | 'fullName'
  | 'email'
  | 'phone'
  | 'location'
  | 'currentCompany'
  | 'currentLocation'
  | 'salaryExpectation'
  | 'noticePeriod'
  | 'linkedinUrl'
  | 'portfolioUrl'
  | 'note';

export type FieldValues = Partial<Record<LogicalField, string>>;

// Run State Types
export type RunStep =
  | 'initial'
  | 'page_loaded'
  | 'form_opened'
  | 'filling_form'
  | 'submitted'
  | 'done';

export interface ApplicationState {
  step: RunStep;
  filledFields: Set<string>;
  issues: string[];
  captchaSolved: boolean;
  platform: Platform | null;
}

export interface ApplicationStateSnapshot {
  step: RunStep;
  filledFields: string[];
  issues: string[];
  captchaSolved: boolean;
  platform: Platform | null;
}

export type TerminalPhase =
  | 'success'
  | 'not_confirmed'
  | 'max_retries_reached'
  | 'awaiting_consent'
  | 'planned_only'
  | 'missing_fields'
  | 'error';

export type OrchestratorPhase =
  | 'initial'
  | 'navigated'
  | 'platform_detected'
  | 'form_filled'
  | 'captcha_cleared'
  | 'submitted'
  | 'outcome_known'
  | TerminalPhase;

// Retry Types
export type ErrorCategory = 'captcha' | 'network' | 'form_not_found' | 'submit' | 'default';

export interface RetryRule {
  maxAttempts: number;
  delayMs: number;
}

// Categories without their own rule use `default`
export type RetryRules = { default: RetryRule } & Partial<Record<ErrorCategory, RetryRule>>;

// CAPTCHA Types
export type CaptchaType = 'recaptcha' | 'hcaptcha' | 'text' | 'audio' | 'none';

export type CaptchaOutcome = 'solved' | 'not_detected' | 'unsolved';

export type CaptchaTier = 'managed' | 'service' | 'fallback';

export interface CaptchaChallenge {
  type: CaptchaType;
  siteKey?: string;
  outcome: CaptchaOutcome;
  tier?: CaptchaTier;
  detail?: string;
}

// Corrective Action Types
export interface ActionTarget {
  label?: string;
  selector?: string;
}

export type CorrectiveAction =
  | { kind: 'fill'; target: ActionTarget; value: string }
  | { kind: 'select'; target: ActionTarget; value: string }
  | { kind: 'check'; target: ActionTarget }
  | { kind: 'click'; target: ActionTarget }
  | { kind: 'captcha_grid'; row: number; col: number }
  | { kind: 'captcha_submit' }
  | { kind: 'skip'; reason: string };

/**
 * An instruction as the vision model emitted it: either a loose JSON object
 * or a free-text directive such as `fill Email with 'a@b.c'`.
 */
export type RawInstruction = string | Record<string, unknown>;

export interface VisionVerdict {
  success: boolean;
  reason: string;
  instructions: RawInstruction[];
  captchaType?: string;
}

// Evidence Types
export interface EvidenceBundle {
  preSubmitScreenshot?: string;
  postSubmitScreenshot?: string;
  log: string[];
  metrics: Record<string, number>;
  errorCounts: Record<ErrorCategory, number>;
}

// Result Types
export type ApplicationStatus =
  | 'missing_fields'
  | 'planned_only'
  | 'awaiting_consent'
  | 'submitted'
  | 'not_confirmed'
  | 'max_retries_reached'
  | 'error';

export interface ApplicationResult {
  ok: boolean;
  runId: string;
  status: ApplicationStatus;
  phase: OrchestratorPhase;
  platform: Platform | null;
  elapsedMs: number;
  evidence: EvidenceBundle;
  log: string[];
  state: ApplicationStateSnapshot;
  metrics: Record<string, number>;
  attempts: number;
  error?: string;
}

// Résumé Types
export interface ResumeExtraction {
  fields: FieldValues;
  text: string;
}

// API Response Types
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: string;
  message?: string;
}
