import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis } from './config/redis';
import { scheduleFollowupChecks } from './config/queue';
import { createApp } from './app';
import { createAppContext } from './bootstrap';
import { createFollowupWorker } from './workers/followup.worker';
import { logger } from './utils/logger';
import { errorMessage } from './utils/errors';

if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

async function start(): Promise<void> {
  try {
    await connectRedis();

    const context = createAppContext(env);
    const app = createApp(context, {
      apiKeys: env.API_KEYS,
      sentryEnabled: Boolean(env.SENTRY_DSN),
      exposeErrors: env.NODE_ENV !== 'production',
    });

    if (env.ENABLE_BACKGROUND_JOBS) {
      createFollowupWorker(context.followups);
      await scheduleFollowupChecks(env.FOLLOWUP_CHECK_INTERVAL_MINUTES);
    }

    app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV, llmProvider: env.LLM_PROVIDER });
    });
  } catch (error) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();
