import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { AppContext } from './bootstrap';
import { createApiKeyAuth, parseApiKeys } from './middleware/auth';
import { createErrorHandler } from './middleware/errorHandler';
import adminRoutes from './routes/admin.routes';
import { createAgentRouter } from './routes/agent.routes';
import { createWebhookRouter } from './routes/webhook.routes';

export interface AppOptions {
  apiKeys?: string;
  sentryEnabled: boolean;
  exposeErrors: boolean;
}

export function createApp(context: AppContext, options: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '100kb' }));

  const limiter = rateLimit({
    windowMs: 60 * 1000,
    max: 100,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/api', limiter);
  app.use('/webhook', limiter);

  app.use(createApiKeyAuth(parseApiKeys(options.apiKeys)));

  app.use('/webhook', createWebhookRouter(context.agent));
  app.use('/api/agent', createAgentRouter(context.leads));
  app.use('/api/admin', adminRoutes);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  if (options.sentryEnabled) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(createErrorHandler(options.exposeErrors));

  return app;
}
