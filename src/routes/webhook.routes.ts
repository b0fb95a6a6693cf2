import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { AgentService } from '../services/agent.service';
import { LEAD_SOURCES } from '../types/lead';
import { ValidationError } from '../utils/errors';

export const leadWebhookSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  name: z.string().trim().min(1).max(255).optional(),
  message: z.string().trim().min(1).max(5000),
  source: z.enum(LEAD_SOURCES).default('website_form'),
  metadata: z.record(z.unknown()).optional(),
});

export type LeadWebhookPayload = z.infer<typeof leadWebhookSchema>;

export function createWebhookRouter(agent: AgentService): Router {
  const router = Router();

  router.post('/lead', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = leadWebhookSchema.safeParse(req.body);
      if (!parsed.success) {
        throw new ValidationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', '));
      }

      const result = await agent.handleLead(parsed.data);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
