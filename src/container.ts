import { ConnectionOptions, Queue } from 'bullmq';
import { Pinecone } from '@pinecone-database/pinecone';
import { DateTime } from 'luxon';
import { Env } from './config/env';
import { RedisClient, createRedisClient } from './config/redis';
import { ProcessMessagesJobData, createMessageQueue, parseRedisConnection } from './config/queue';
import { RedisHoldStore } from './services/holds/redis.store';
import { GoogleCalendarAdapter, createCalendarClient } from './services/calendar/google.adapter';
import { SlotArbiter } from './services/slot-arbiter.service';
import { BookingService } from './services/booking.service';
import { ConversationStore } from './services/conversation.service';
import { OpenAIService } from './services/openai.service';
import { RetrievalService } from './services/retrieval.service';
import { InstagramService } from './services/instagram.service';
import { ToolExecutor } from './services/tools/executor';
import { AssistantService } from './services/assistant.service';
import { WebhookConfig } from './routes/webhook.routes';

export interface Services {
  redis: RedisClient;
  connection: ConnectionOptions;
  queue: Queue<ProcessMessagesJobData>;
  conversations: ConversationStore;
  openai: OpenAIService;
  instagram: InstagramService;
  assistant: AssistantService;
  webhook: WebhookConfig;
}

/** Wires every service once at startup; nothing below reads `env` directly. */
export function buildServices(config: Env): Services {
  const clock = () => DateTime.now().setZone(config.STUDIO_TIMEZONE);

  const redis = createRedisClient(config.REDIS_URL);
  const connection = parseRedisConnection(config.REDIS_URL);
  const queue = createMessageQueue(connection);

  const calendar = new GoogleCalendarAdapter(createCalendarClient(config), {
    calendarId: config.GOOGLE_CALENDAR_ID,
    timezone: config.STUDIO_TIMEZONE,
    capacity: config.CALENDAR_SLOT_CAPACITY,
  });
  const arbiter = new SlotArbiter(new RedisHoldStore(redis), calendar, {
    holdTtlSeconds: config.HOLD_TTL_SECONDS,
  });
  const booking = new BookingService(calendar, arbiter, clock);
  const conversations = new ConversationStore(redis, config.MAX_HISTORY_LENGTH);

  const openai = new OpenAIService({
    apiKey: config.OPENAI_API_KEY,
    models: {
      chat: config.OPENAI_MODEL_DEFAULT,
      classify: config.OPENAI_MODEL_CLASSIFY,
      vision: config.OPENAI_MODEL_VISION,
      embedding: config.OPENAI_EMBEDDING_MODEL,
    },
    timeoutMs: config.OPENAI_TIMEOUT_MS,
  });
  const pinecone = config.PINECONE_API_KEY ? new Pinecone({ apiKey: config.PINECONE_API_KEY }) : null;
  const retrieval = new RetrievalService(pinecone, openai, {
    conversations: config.PINECONE_CONVERSATIONS_INDEX,
    pricing: config.PINECONE_PRICING_INDEX,
  });

  const instagram = new InstagramService({ accessToken: config.IG_USER_ACCESS_TOKEN });
  const tools = new ToolExecutor(booking, arbiter, conversations);
  const assistant = new AssistantService(openai, retrieval, tools, conversations, clock);

  return {
    redis,
    connection,
    queue,
    conversations,
    openai,
    instagram,
    assistant,
    webhook: {
      verifyToken: config.META_VERIFY_TOKEN,
      appSecret: config.META_APP_SECRET,
      allowedSenderIds: config.ALLOWED_SENDER_IDS,
      reactionBotSenderId: config.REACTION_BOT_SENDER_ID,
      graceWindowSeconds: config.GRACE_WINDOW_SECONDS,
    },
  };
}
