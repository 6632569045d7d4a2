import * as Sentry from '@sentry/node';
import { env } from './config/env';
import { connectRedis } from './config/redis';
import { buildServices } from './container';
import { createApp } from './app';
import { createMessageWorker } from './workers/message.worker';
import { logger, errorMessage } from './utils/logger';

// Initialize Sentry
if (env.SENTRY_DSN) {
  Sentry.init({
    dsn: env.SENTRY_DSN,
    environment: env.NODE_ENV,
    tracesSampleRate: env.NODE_ENV === 'production' ? 0.1 : 1.0,
  });
}

const services = buildServices(env);

const app = createApp({
  redis: services.redis,
  queue: services.queue,
  conversations: services.conversations,
  webhook: services.webhook,
  webhookRateLimitPerHour: env.WEBHOOK_RATE_LIMIT_PER_HOUR,
  sentryEnabled: Boolean(env.SENTRY_DSN),
});

// Start
async function start() {
  try {
    await connectRedis(services.redis);

    createMessageWorker(services.connection, {
      conversations: services.conversations,
      assistant: services.assistant,
      instagram: services.instagram,
      openai: services.openai,
      queue: services.queue,
      graceWindowSeconds: env.GRACE_WINDOW_SECONDS,
    });

    app.listen(parseInt(env.PORT, 10), () => {
      logger.info(`Server running on port ${env.PORT}`, { env: env.NODE_ENV });
    });
  } catch (error: unknown) {
    logger.error('Failed to start server', { error: errorMessage(error) });
    process.exit(1);
  }
}

void start();

export default app;
