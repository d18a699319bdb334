import OpenAI from 'openai';
import { z } from 'zod';
import { config } from '../config';
import { FieldValues, VisionVerdict } from '../types';
import { logger } from '../utils/logger';
import { describeError } from '../utils/result';

export interface VisionInput {
  // base64 PNG
  screenshot: string;
  resumeExcerpt: string;
  knownFields: FieldValues;
}

export interface VisionModel {
  readonly available: boolean;
  evaluate(input: VisionInput): Promise<VisionVerdict>;
}

export const MISSING_KEY_REASON = 'API key not provided';

const verdictSchema = z.object({
  success: z.boolean(),
  reason: z.string().default(''),
  instructions: z.array(z.union([z.string(), z.record(z.unknown())])).default([]),
  captcha_type: z.string().optional(),
  captchaType: z.string().optional(),
});

const SYSTEM_PROMPT = `You review screenshots of job application forms right after a submit attempt.
Answer with JSON only, no prose:
{"success": boolean, "reason": string, "instructions": [...], "captcha_type": string | null}
"success" is true only when the page clearly confirms the application was received.
Otherwise list corrective instructions, each either
{"action": "fill" | "select" | "check" | "click", "selector": "<field label or CSS selector>", "value": "<value>"}
or a short directive such as "fill Phone with '555 0100'", "click captcha image at position (2,3)" or "click captcha submit".
Mark embedded challenges you cannot solve with {"action": "skip", "reason": "unsolvable captcha"}.`;

export function failureVerdict(reason: string): VisionVerdict {
  return { success: false, reason, instructions: [] };
}

function stripCodeFences(text: string): string {
  return text
    .trim()
    .replace(/^```[a-zA-Z]*\s*/, '')
    .replace(/\s*```$/, '')
    .trim();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    const braces = text.match(/\{[\s\S]*\}/);
    if (!braces) {
      return undefined;
    }
    try {
      return JSON.parse(braces[0]);
    } catch {
      return undefined;
    }
  }
}

/**
 * Unwrap and validate a model reply. Anything unusable becomes a failure
 * verdict with no instructions.
 */
export function parseVisionResponse(text: string): VisionVerdict {
  const raw = parseJson(stripCodeFences(text));
  if (raw === undefined) {
    return failureVerdict('Unparseable vision response');
  }

  const parsed = verdictSchema.safeParse(raw);
  if (!parsed.success) {
    return failureVerdict(`Invalid vision response: ${parsed.error.issues[0]?.message ?? 'schema mismatch'}`);
  }

  const { success, reason, instructions, captcha_type, captchaType } = parsed.data;
  const verdict: VisionVerdict = { success, reason, instructions };
  const type = captchaType ?? captcha_type;
  if (type) {
    verdict.captchaType = type;
  }
  return verdict;
}

function buildPrompt(input: VisionInput): string {
  const known = Object.entries(input.knownFields)
    .filter(([, value]) => Boolean(value))
    .map(([field, value]) => `- ${field}: ${value}`)
    .join('\n');

  return [
    'Did this job application submit successfully? If not, what should be corrected?',
    '',
    'Applicant details:',
    known || '- (none)',
    '',
    'Resume excerpt:',
    input.resumeExcerpt || '(no resume text)',
  ].join('\n');
}

/**
 * Vision model over OpenAI chat completions with an image part.
 */
export class OpenAIVisionModel implements VisionModel {
  private client: OpenAI | null;
  readonly available: boolean;

  constructor(
    apiKey: string | undefined,
    private readonly model: string = config.visionModel
  ) {
    this.client = apiKey ? new OpenAI({ apiKey }) : null;
    this.available = this.client !== null;
  }

  async evaluate(input: VisionInput): Promise<VisionVerdict> {
    if (!this.client) {
      return failureVerdict(MISSING_KEY_REASON);
    }

    try {
      const response = await this.client.chat.completions.create({
        model: this.model,
        temperature: 0,
        max_tokens: 1000,
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          {
            role: 'user',
            content: [
              { type: 'text', text: buildPrompt(input) },
              { type: 'image_url', image_url: { url: `data:image/png;base64,${input.screenshot}` } },
            ],
          },
        ],
      });

      return parseVisionResponse(response.choices[0]?.message?.content ?? '');
    } catch (error) {
      logger.warn(`Vision model request failed: ${describeError(error)}`);
      return failureVerdict(`Vision model error: ${describeError(error)}`);
    }
  }
}

export function createVisionModel(apiKey?: string): VisionModel {
  return new OpenAIVisionModel(apiKey || config.openaiApiKey || undefined);
}
