import { RedisClient } from '../config/redis';
import {
  CONVERSATION_TTL_SECONDS,
  MUTE_DURATION_SECONDS,
  PROCESSING_LOCK_TTL_SECONDS,
  QUEUE_TTL_SECONDS,
} from '../config/studio';
import {
  BookingDraft,
  ChatEntry,
  ConversationContext,
  QueuedMessage,
  conversationContextSchema,
  queuedMessageSchema,
} from '../types/conversation';
import { logger, errorMessage } from '../utils/logger';

const KEYS = {
  chat: (userId: string) => `chat:${userId}`,
  queue: (userId: string) => `message_queue:${userId}`,
  lock: (userId: string) => `processing_lock:${userId}`,
  mute: (userId: string) => `mute:${userId}`,
};

function emptyContext(): ConversationContext {
  return { messages: [], draft: null, updatedAt: new Date().toISOString() };
}

/**
 * Keeps the newest `max` entries. A tool result whose assistant turn was cut
 * off is dropped too, since the chat API rejects it without its call.
 */
export function trimHistory(messages: ChatEntry[], max: number): ChatEntry[] {
  const kept = messages.slice(-max);
  let start = 0;
  while (start < kept.length && kept[start].role === 'tool') start++;
  return kept.slice(start);
}

export class ConversationStore {
  constructor(
    private redis: RedisClient,
    private maxHistory: number
  ) {}

  async getContext(userId: string): Promise<ConversationContext> {
    try {
      const data = await this.redis.get(KEYS.chat(userId));
      if (!data) return emptyContext();

      const parsed = conversationContextSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logger.warn('Stored conversation is malformed, starting fresh', { userId });
        return emptyContext();
      }
      return parsed.data;
    } catch (error: unknown) {
      logger.warn('Conversation get failed', { userId, error: errorMessage(error) });
      return emptyContext();
    }
  }

  async saveContext(userId: string, context: ConversationContext): Promise<void> {
    const stored: ConversationContext = {
      messages: trimHistory(context.messages, this.maxHistory),
      draft: context.draft,
      updatedAt: new Date().toISOString(),
    };
    await this.redis.set(KEYS.chat(userId), JSON.stringify(stored), { EX: CONVERSATION_TTL_SECONDS });
  }

  async appendEntries(userId: string, entries: ChatEntry[]): Promise<void> {
    const context = await this.getContext(userId);
    await this.saveContext(userId, { ...context, messages: [...context.messages, ...entries] });
  }

  async setDraft(userId: string, draft: BookingDraft | null): Promise<void> {
    const context = await this.getContext(userId);
    await this.saveContext(userId, { ...context, draft });
  }

  async enqueueMessage(userId: string, message: QueuedMessage): Promise<void> {
    await this.redis.rPush(KEYS.queue(userId), JSON.stringify(message));
    await this.redis.expire(KEYS.queue(userId), QUEUE_TTL_SECONDS);
  }

  /** Oldest first. */
  async getQueuedMessages(userId: string): Promise<QueuedMessage[]> {
    const raw = await this.redis.lRange(KEYS.queue(userId), 0, -1);
    const messages: QueuedMessage[] = [];
    for (const item of raw) {
      try {
        const parsed = queuedMessageSchema.safeParse(JSON.parse(item));
        if (parsed.success) {
          messages.push(parsed.data);
        } else {
          logger.warn('Skipping malformed queued message', { userId });
        }
      } catch (error: unknown) {
        logger.warn('Skipping unparseable queued message', { userId, error: errorMessage(error) });
      }
    }
    return messages.sort((a, b) => a.timestamp - b.timestamp);
  }

  async clearQueue(userId: string): Promise<void> {
    await this.redis.del(KEYS.queue(userId));
  }

  async acquireLock(userId: string): Promise<boolean> {
    const result = await this.redis.set(KEYS.lock(userId), '1', { NX: true, EX: PROCESSING_LOCK_TTL_SECONDS });
    return result === 'OK';
  }

  async releaseLock(userId: string): Promise<void> {
    await this.redis.del(KEYS.lock(userId));
  }

  async mute(userId: string): Promise<void> {
    await this.redis.set(KEYS.mute(userId), '1', { EX: MUTE_DURATION_SECONDS });
    logger.info('Automated replies muted', { userId, seconds: MUTE_DURATION_SECONDS });
  }

  async isMuted(userId: string): Promise<boolean> {
    return (await this.redis.exists(KEYS.mute(userId))) > 0;
  }
}
