import { NextFunction, Request, Response, Router } from 'express';
import { z } from 'zod';
import { serializeLead } from '../services/tools/crm.tool';
import { LeadStore } from '../types/lead';
import { NotFoundError, ValidationError } from '../utils/errors';

const leadIdSchema = z.string().uuid();

export function createAgentRouter(leads: LeadStore): Router {
  const router = Router();

  router.get('/status/:leadId', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = leadIdSchema.safeParse(req.params.leadId);
      if (!parsed.success) {
        throw new ValidationError('leadId must be a UUID');
      }

      const lead = await leads.getLeadById(parsed.data);
      if (!lead) {
        throw new NotFoundError(`Lead not found: ${parsed.data}`);
      }

      const interactions = await leads.getLeadInteractions(lead.id, 10);

      res.json({
        success: true,
        lead: serializeLead(lead),
        recent_interactions: interactions.map((interaction) => ({
          message_from: interaction.message_from,
          message_text: interaction.message_text,
          decision_type: interaction.decision_type,
          confidence_score: interaction.confidence_score,
          tools_used: interaction.tools_used,
          sources_retrieved: interaction.sources_retrieved,
          created_at: interaction.created_at.toISOString(),
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
