import { Router, Request, Response } from 'express';
import { Queue } from 'bullmq';
import { ProcessMessagesJobData, scheduleProcessing } from '../config/queue';
import { ConversationStore } from '../services/conversation.service';
import { MessagingEvent, WebhookPayload, webhookPayloadSchema } from '../types/messaging';
import { validateMetaSignature } from '../middleware/signature.validator';
import { logger, errorMessage } from '../utils/logger';

const HEART_EMOJIS = new Set(['❤', '❤️']);

export interface WebhookConfig {
  verifyToken?: string;
  appSecret?: string;
  /** Empty means every sender is answered. */
  allowedSenderIds: string[];
  reactionBotSenderId?: string;
  graceWindowSeconds: number;
}

export interface WebhookDeps {
  conversations: ConversationStore;
  queue: Queue<ProcessMessagesJobData>;
  config: WebhookConfig;
  /** Extra seconds added to the grace window, 1 to 10 unless overridden. */
  jitterSeconds?: () => number;
}

export type EventOutcome = 'muted_by_reaction' | 'ignored' | 'queued';

function randomJitterSeconds(): number {
  return Math.floor(Math.random() * 10) + 1;
}

function isHeartReaction(event: MessagingEvent, botSenderId: string | undefined): boolean {
  if (!botSenderId || event.sender.id !== botSenderId || !event.reaction || event.reaction.action === 'unreact') {
    return false;
  }
  const emoji = event.reaction.emoji ?? '';
  return HEART_EMOJIS.has(emoji) || event.reaction.reaction === 'love';
}

function imageUrls(event: MessagingEvent): string[] {
  return (event.message?.attachments ?? [])
    .filter((attachment) => attachment.type === 'image')
    .flatMap((attachment) => {
      const url = attachment.payload?.url;
      return url ? [url] : [];
    });
}

export async function handleMessagingEvent(event: MessagingEvent, deps: WebhookDeps): Promise<EventOutcome> {
  const { conversations, config } = deps;
  const senderId = event.sender.id;

  if (isHeartReaction(event, config.reactionBotSenderId)) {
    const customerId = event.recipient.id;
    await conversations.mute(customerId);
    await conversations.clearQueue(customerId);
    logger.info('Human takeover by reaction', { userId: customerId });
    return 'muted_by_reaction';
  }

  if (!event.message || event.message.is_echo) {
    return 'ignored';
  }

  if (config.allowedSenderIds.length > 0 && !config.allowedSenderIds.includes(senderId)) {
    logger.debug('Sender not in allowlist', { userId: senderId });
    return 'ignored';
  }

  if (await conversations.isMuted(senderId)) {
    logger.info('Message from muted user ignored', { userId: senderId });
    return 'ignored';
  }

  const text = event.message.text;
  const images = imageUrls(event);
  if (!text && images.length === 0) {
    return 'ignored';
  }

  await conversations.enqueueMessage(senderId, {
    timestamp: event.timestamp ?? Date.now(),
    mid: event.message.mid,
    text,
    imageUrls: images,
  });

  const jitter = (deps.jitterSeconds ?? randomJitterSeconds)();
  await scheduleProcessing(deps.queue, senderId, (config.graceWindowSeconds + jitter) * 1000);
  return 'queued';
}

export async function handleWebhookEvents(payload: WebhookPayload, deps: WebhookDeps): Promise<EventOutcome[]> {
  const outcomes: EventOutcome[] = [];
  for (const entry of payload.entry) {
    for (const event of entry.messaging) {
      outcomes.push(await handleMessagingEvent(event, deps));
    }
  }
  return outcomes;
}

export function createWebhookRouter(deps: WebhookDeps): Router {
  const router = Router();

  // Meta verification handshake
  router.get('/', (req: Request, res: Response) => {
    const challenge = req.query['hub.challenge'];
    const token = req.query['hub.verify_token'];

    if (deps.config.verifyToken && token !== deps.config.verifyToken) {
      logger.warn('Webhook verification failed');
      return res.sendStatus(403);
    }
    if (typeof challenge !== 'string') {
      return res.status(400).send('Missing hub.challenge');
    }
    res.status(200).send(challenge);
  });

  router.post('/', validateMetaSignature(deps.config.appSecret), (req: Request, res: Response) => {
    const parsed = webhookPayloadSchema.safeParse(req.body);
    if (!parsed.success) {
      logger.warn('Invalid webhook payload', { issues: parsed.error.issues.length });
      return res.status(400).send('INVALID_PAYLOAD');
    }

    // Meta retries slow webhooks, so acknowledge before doing any work.
    res.status(200).send('EVENT_RECEIVED');

    handleWebhookEvents(parsed.data, deps).catch((error: unknown) => {
      logger.error('Webhook processing failed', { error: errorMessage(error) });
    });
  });

  return router;
}
