import { LeadStore } from '../types/lead';
import { ToolAdapter } from '../types/tool';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { ToolExecutor } from './tools/tool.executor';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const FOLLOWUP_INTERVAL_DAYS = 7;

export interface FollowupSweepResult {
  due: number;
  sent: number;
  failed: number;
}

export class FollowupService {
  constructor(
    private leads: LeadStore,
    private emailTool: ToolAdapter,
    private executor: ToolExecutor,
    private now: () => Date = () => new Date()
  ) {}

  /** Sends a follow-up to every due lead. One lead failing does not stop the sweep. */
  async runDueFollowups(): Promise<FollowupSweepResult> {
    const now = this.now();
    const due = await this.leads.getLeadsForFollowup(now);
    const result: FollowupSweepResult = { due: due.length, sent: 0, failed: 0 };

    for (const lead of due) {
      try {
        const outcome = await this.executor.executeWithRetry(this.emailTool, 'send_followup', {
          to_email: lead.email,
          lead_name: lead.name,
        });

        if (!outcome.success) {
          result.failed += 1;
          logger.warn('Follow-up email failed', { leadId: lead.id, error: outcome.error });
          continue;
        }

        await this.leads.updateLead(lead.id, {
          last_contacted_at: now,
          next_followup_at: new Date(now.getTime() + FOLLOWUP_INTERVAL_DAYS * MS_PER_DAY),
        });
        result.sent += 1;
      } catch (error) {
        result.failed += 1;
        logger.error('Follow-up processing failed', { leadId: lead.id, error: errorMessage(error) });
      }
    }

    logger.info('Follow-up sweep completed', { ...result });
    return result;
  }
}
