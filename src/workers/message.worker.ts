import { Worker, Job, ConnectionOptions, Queue } from 'bullmq';
import { ProcessMessagesJobData, QUEUE_NAMES, scheduleProcessing } from '../config/queue';
import { ConversationStore } from '../services/conversation.service';
import { AssistantService } from '../services/assistant.service';
import { InstagramService } from '../services/instagram.service';
import { OpenAIService } from '../services/openai.service';
import { QueuedMessage } from '../types/conversation';
import { logger, errorMessage } from '../utils/logger';

export interface MessageWorkerDeps {
  conversations: ConversationStore;
  assistant: AssistantService;
  instagram: InstagramService;
  openai: OpenAIService;
  queue: Queue<ProcessMessagesJobData>;
  graceWindowSeconds: number;
}

export type ProcessOutcome = 'locked' | 'muted' | 'empty' | 'replied';

async function analyzeImages(
  userId: string,
  messages: QueuedMessage[],
  deps: Pick<MessageWorkerDeps, 'instagram' | 'openai'>
): Promise<string[]> {
  const analyses: string[] = [];
  for (const url of messages.flatMap((m) => m.imageUrls)) {
    try {
      const image = await deps.instagram.downloadAttachment(url);
      analyses.push(await deps.openai.analyzeImage(image.base64, image.mimeType));
    } catch (error: unknown) {
      logger.warn('Image analysis failed, continuing without it', { userId, error: errorMessage(error) });
    }
  }
  return analyses;
}

export function combineMessages(messages: QueuedMessage[], analyses: string[]): string {
  const parts = messages.map((m) => m.text?.trim() ?? '').filter((text) => text.length > 0);
  for (const analysis of analyses) {
    parts.push(`[Ανάλυση εικόνας]: ${analysis}`);
  }
  return parts.join('\n');
}

/**
 * One batched turn for a user: everything queued during the grace window is
 * answered with a single reply. The per-user lock keeps turns from overlapping.
 */
export async function processUserMessages(userId: string, deps: MessageWorkerDeps): Promise<ProcessOutcome> {
  const { conversations } = deps;

  if (!(await conversations.acquireLock(userId))) {
    logger.debug('Turn already running, skipping', { userId });
    return 'locked';
  }

  try {
    if (await conversations.isMuted(userId)) {
      logger.info('User muted, skipping automated reply', { userId });
      await conversations.clearQueue(userId);
      return 'muted';
    }

    const queued = await conversations.getQueuedMessages(userId);
    await conversations.clearQueue(userId);
    if (queued.length === 0) {
      return 'empty';
    }

    const analyses = await analyzeImages(userId, queued, deps);
    const combined = combineMessages(queued, analyses);
    if (!combined) {
      return 'empty';
    }

    await conversations.appendEntries(userId, [{ role: 'user', content: combined }]);
    const turn = await deps.assistant.reply(userId, combined, analyses);

    // A human may have taken over while the model was thinking.
    if (await conversations.isMuted(userId)) {
      logger.info('User muted during turn, reply not sent', { userId });
      return 'muted';
    }

    // Stored before sending: tool results such as a created booking must
    // survive a failed delivery.
    await conversations.appendEntries(userId, turn.entries);
    try {
      await deps.instagram.sendLongMessage(userId, turn.reply);
    } catch (error: unknown) {
      logger.error('Reply delivery failed', { userId, error: errorMessage(error) });
      throw error;
    }
    logger.info('Turn answered', { userId, batched: queued.length, images: analyses.length });
    return 'replied';
  } finally {
    await conversations.releaseLock(userId);
    await rescheduleIfPending(userId, deps);
  }
}

/** Messages that arrived mid-turn could not join the running job; give them their own. */
async function rescheduleIfPending(userId: string, deps: MessageWorkerDeps): Promise<void> {
  try {
    const pending = await deps.conversations.getQueuedMessages(userId);
    if (pending.length > 0) {
      await scheduleProcessing(deps.queue, userId, deps.graceWindowSeconds * 1000, String(Date.now()));
    }
  } catch (error: unknown) {
    logger.error('Failed to reschedule pending messages', { userId, error: errorMessage(error) });
  }
}

export function createMessageWorker(connection: ConnectionOptions, deps: MessageWorkerDeps): Worker<ProcessMessagesJobData> {
  const worker = new Worker<ProcessMessagesJobData>(
    QUEUE_NAMES.MESSAGE_PROCESSING,
    async (job: Job<ProcessMessagesJobData>) => {
      const outcome = await processUserMessages(job.data.userId, deps);
      logger.debug('Message job finished', { jobId: job.id, userId: job.data.userId, outcome });
    },
    { connection, concurrency: 5 }
  );

  worker.on('failed', (job, err) => {
    logger.error('Message job failed', {
      jobId: job?.id,
      userId: job?.data.userId,
      error: err.message,
    });
  });

  logger.info('Message worker started');
  return worker;
}
