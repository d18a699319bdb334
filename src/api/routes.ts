import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SubmissionOrchestrator } from '../services/submissionOrchestrator';
import { RunStore, runStore } from '../services/runStore';
import { logger } from '../utils/logger';
import { ApiResponse, ApplicationRequest, ApplicationResult } from '../types';

// JSON clients send null for blank fields; treat it as absent
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

/**
 * Body of POST /api/apply. jobUrl and email stay optional here so a request
 * without them reaches the orchestrator and comes back as missing_fields.
 */
export const applicationRequestSchema = z.object({
  jobUrl: optionalText,
  email: optionalText,
  firstName: optionalText,
  lastName: optionalText,
  fullName: optionalText,
  phone: optionalText,
  location: optionalText,
  currentCompany: optionalText,
  currentLocation: optionalText,
  salaryExpectation: optionalText,
  noticePeriod: optionalText,
  linkedinUrl: optionalText,
  portfolioUrl: optionalText,
  note: optionalText,
  resumeUrl: z.string().url().optional(),
  resumeBase64: optionalText,
  resumeFileName: optionalText,
  planOnly: z.boolean().optional(),
  allowSubmit: z.boolean().optional(),
  openaiApiKey: optionalText,
  captchaApiKey: optionalText,
  proxy: z
    .object({
      wsEndpoint: optionalText,
      host: optionalText,
      username: optionalText,
      password: optionalText,
    })
    .optional(),
});

export function parseApplicationRequest(body: unknown): { request?: ApplicationRequest; error?: string } {
  const parsed = applicationRequestSchema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { error: `${issue.path.join('.') || 'body'}: ${issue.message}` };
  }
  return { request: parsed.data };
}

export function createApiRouter(
  orchestrator: SubmissionOrchestrator = new SubmissionOrchestrator(),
  store: RunStore = runStore
): Router {
  const router = Router();

  /**
   * GET /api/health
   * Health check endpoint
   */
  router.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  /**
   * POST /api/apply
   * Run one application and return its structured result
   */
  router.post('/apply', async (req: Request, res: Response) => {
    const { request, error } = parseApplicationRequest(req.body);
    if (!request) {
      const body: ApiResponse<null> = { success: false, error: error ?? 'Invalid request' };
      return res.status(400).json(body);
    }

    try {
      const result = await orchestrator.submit(request);
      store.add(result);
      return res.json(result);
    } catch (err) {
      logger.error('Apply error:', err);
      const body: ApiResponse<null> = {
        success: false,
        error: err instanceof Error ? err.message : 'Application run failed',
      };
      return res.status(500).json(body);
    }
  });

  /**
   * GET /api/runs/:id
   * Result of a finished run
   */
  router.get('/runs/:id', (req: Request, res: Response) => {
    const result = store.get(req.params.id);
    if (!result) {
      const body: ApiResponse<null> = { success: false, error: 'Run not found' };
      return res.status(404).json(body);
    }
    const body: ApiResponse<ApplicationResult> = { success: true, data: result };
    return res.json(body);
  });

  return router;
}
