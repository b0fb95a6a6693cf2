import { Queue } from 'bullmq';
import { env } from './env';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';

export const connection = {
  url: env.REDIS_URL,
};

export const QUEUE_NAMES = {
  FOLLOWUPS: 'lead-followups',
} as const;

export const FOLLOWUP_CHECK_JOB = 'check-followups';

export interface FollowupCheckJobData {
  requestedAt: string;
}

export const followupQueue = new Queue<FollowupCheckJobData>(QUEUE_NAMES.FOLLOWUPS, { connection });

/** Registers the repeatable follow-up sweep. Re-registering with the same interval is a no-op. */
export async function scheduleFollowupChecks(intervalMinutes: number = env.FOLLOWUP_CHECK_INTERVAL_MINUTES): Promise<void> {
  try {
    await followupQueue.add(
      FOLLOWUP_CHECK_JOB,
      { requestedAt: new Date().toISOString() },
      {
        repeat: { every: intervalMinutes * 60 * 1000 },
        jobId: FOLLOWUP_CHECK_JOB,
        removeOnComplete: 100,
        removeOnFail: 500,
      }
    );
    logger.info('Follow-up checks scheduled', { intervalMinutes });
  } catch (error) {
    logger.error('Failed to schedule follow-up checks', { error: errorMessage(error) });
  }
}
