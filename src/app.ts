import express, { Express } from 'express';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as Sentry from '@sentry/node';
import { Queue } from 'bullmq';
import { RedisClient } from './config/redis';
import { ProcessMessagesJobData } from './config/queue';
import { ConversationStore } from './services/conversation.service';
import { errorHandler } from './middleware/errorHandler';
import { captureRawBody } from './middleware/signature.validator';
import { WebhookConfig, createWebhookRouter } from './routes/webhook.routes';
import { createHealthRouter } from './routes/health.routes';

export interface AppDeps {
  redis: RedisClient;
  queue: Queue<ProcessMessagesJobData>;
  conversations: ConversationStore;
  webhook: WebhookConfig;
  webhookRateLimitPerHour: number;
  sentryEnabled?: boolean;
  jitterSeconds?: () => number;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Middleware
  app.use(helmet());
  app.use(express.json({ verify: captureRawBody }));

  // Rate limiting
  const limiter = rateLimit({
    windowMs: 60 * 60 * 1000, // 1 hour
    max: deps.webhookRateLimitPerHour,
    standardHeaders: true,
    legacyHeaders: false,
  });
  app.use('/webhook', limiter);

  // Routes
  app.use(
    '/webhook',
    createWebhookRouter({
      conversations: deps.conversations,
      queue: deps.queue,
      config: deps.webhook,
      jitterSeconds: deps.jitterSeconds,
    })
  );
  app.use(createHealthRouter(deps.redis));

  // Error handler
  if (deps.sentryEnabled) {
    Sentry.setupExpressErrorHandler(app);
  }
  app.use(errorHandler);

  return app;
}
