import { Job, Worker } from 'bullmq';
import { connection, FollowupCheckJobData, QUEUE_NAMES } from '../config/queue';
import { FollowupService, FollowupSweepResult } from '../services/followup.service';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export function processFollowupJob(service: FollowupService) {
  return async (job: Job<FollowupCheckJobData>): Promise<FollowupSweepResult> => {
    try {
      const result = await service.runDueFollowups();
      logger.info('Follow-up job completed', { jobId: job.id, ...result });
      return result;
    } catch (error) {
      logger.error('Follow-up job failed', { jobId: job.id, error: errorMessage(error) });
      throw error;
    }
  };
}

export function createFollowupWorker(service: FollowupService): Worker<FollowupCheckJobData, FollowupSweepResult> {
  return new Worker<FollowupCheckJobData, FollowupSweepResult>(QUEUE_NAMES.FOLLOWUPS, processFollowupJob(service), {
    connection,
    concurrency: 1,
  });
}
