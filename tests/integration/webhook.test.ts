jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));
jest.mock('@sentry/node', () => ({ setupExpressErrorHandler: jest.fn() }));

import request from 'supertest';
import { Express } from 'express';
import { Queue } from 'bullmq';
import { createApp } from '../../src/app';
import { ProcessMessagesJobData } from '../../src/config/queue';
import { ConversationStore } from '../../src/services/conversation.service';
import { computeSignature } from '../../src/middleware/signature.validator';
import { FakeRedis } from '../helpers/fake-redis';

const APP_SECRET = 'test-secret';

function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

function messageEvent(senderId: string, message: object) {
  return {
    object: 'instagram',
    entry: [
      {
        id: 'studio-page',
        time: 1760860000000,
        messaging: [{ sender: { id: senderId }, recipient: { id: 'studio-page' }, timestamp: 1760860000000, message }],
      },
    ],
  };
}

describe('Webhook API', () => {
  let redis: FakeRedis;
  let conversations: ConversationStore;
  let app: Express;
  const queue = { add: jest.fn() };

  function postSigned(payload: object) {
    const raw = JSON.stringify(payload);
    return request(app)
      .post('/webhook')
      .set('Content-Type', 'application/json')
      .set('X-Hub-Signature-256', computeSignature(APP_SECRET, raw))
      .send(raw);
  }

  beforeEach(() => {
    jest.clearAllMocks();
    redis = new FakeRedis();
    conversations = new ConversationStore(redis.asClient(), 20);
    app = createApp({
      redis: redis.asClient(),
      queue: queue as unknown as Queue<ProcessMessagesJobData>,
      conversations,
      webhook: {
        verifyToken: 'test-verify-token',
        appSecret: APP_SECRET,
        allowedSenderIds: ['user-1'],
        reactionBotSenderId: 'studio-bot',
        graceWindowSeconds: 20,
      },
      webhookRateLimitPerHour: 100,
      jitterSeconds: () => 1,
    });
  });

  describe('GET /webhook', () => {
    it('should echo the challenge for the right verify token', async () => {
      const response = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'test-verify-token', 'hub.challenge': '1158201444' });

      expect(response.status).toBe(200);
      expect(response.text).toBe('1158201444');
    });

    it('should refuse a wrong verify token', async () => {
      const response = await request(app)
        .get('/webhook')
        .query({ 'hub.mode': 'subscribe', 'hub.verify_token': 'wrong', 'hub.challenge': '1158201444' });

      expect(response.status).toBe(403);
    });
  });

  describe('POST /webhook', () => {
    it('should reject a request without a signature', async () => {
      const response = await request(app).post('/webhook').send(messageEvent('user-1', { mid: 'm1', text: 'Γεια' }));

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ error: 'Missing signature' });
    });

    it('should reject a signature made with another secret', async () => {
      const raw = JSON.stringify(messageEvent('user-1', { mid: 'm1', text: 'Γεια' }));
      const response = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .set('X-Hub-Signature-256', computeSignature('other-secret', raw))
        .send(raw);

      expect(response.status).toBe(403);
      expect(response.body).toEqual({ error: 'Invalid signature' });
    });

    it('should answer malformed JSON with 400', async () => {
      const response = await request(app)
        .post('/webhook')
        .set('Content-Type', 'application/json')
        .send('{"object":"instagram",');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, error: 'INVALID_JSON' });
    });

    it('should reject a payload without events', async () => {
      const response = await postSigned({ object: 'instagram', entry: [] });

      expect(response.status).toBe(400);
      expect(response.text).toBe('INVALID_PAYLOAD');
    });

    it('should queue a message and schedule its processing', async () => {
      const response = await postSigned(
        messageEvent('user-1', {
          mid: 'm1',
          text: 'Πόσο κάνει αυτό;',
          attachments: [{ type: 'image', payload: { url: 'https://cdn.test/rose.jpg' } }],
        })
      );
      await flush();

      expect(response.status).toBe(200);
      expect(response.text).toBe('EVENT_RECEIVED');
      expect(await conversations.getQueuedMessages('user-1')).toEqual([
        { timestamp: 1760860000000, mid: 'm1', text: 'Πόσο κάνει αυτό;', imageUrls: ['https://cdn.test/rose.jpg'] },
      ]);
      expect(queue.add).toHaveBeenCalledWith('process', { userId: 'user-1' }, { jobId: 'process-user-1', delay: 21000 });
    });

    it('should ignore senders outside the allowlist', async () => {
      const response = await postSigned(messageEvent('user-2', { mid: 'm2', text: 'Γεια' }));
      await flush();

      expect(response.status).toBe(200);
      expect(await conversations.getQueuedMessages('user-2')).toEqual([]);
      expect(queue.add).not.toHaveBeenCalled();
    });

    it('should ignore echoes of the studio own messages', async () => {
      await postSigned(messageEvent('user-1', { mid: 'm3', text: 'Καλησπέρα', is_echo: true }));
      await flush();

      expect(queue.add).not.toHaveBeenCalled();
    });

    it('should mute a customer when the studio reacts with a heart', async () => {
      await conversations.enqueueMessage('user-1', { timestamp: 1, text: 'Γεια', imageUrls: [] });

      const response = await postSigned({
        object: 'instagram',
        entry: [
          {
            messaging: [
              {
                sender: { id: 'studio-bot' },
                recipient: { id: 'user-1' },
                timestamp: 1760860000000,
                reaction: { mid: 'm1', action: 'react', reaction: 'love', emoji: '❤' },
              },
            ],
          },
        ],
      });
      await flush();

      expect(response.status).toBe(200);
      expect(await conversations.isMuted('user-1')).toBe(true);
      expect(await conversations.getQueuedMessages('user-1')).toEqual([]);

      await postSigned(messageEvent('user-1', { mid: 'm4', text: 'Είστε εκεί;' }));
      await flush();
      expect(queue.add).not.toHaveBeenCalled();
    });

    it('should not mute when the studio removes its heart', async () => {
      const response = await postSigned({
        object: 'instagram',
        entry: [
          {
            messaging: [
              {
                sender: { id: 'studio-bot' },
                recipient: { id: 'user-1' },
                timestamp: 1760860000000,
                reaction: { mid: 'm1', action: 'unreact', reaction: 'love', emoji: '❤' },
              },
            ],
          },
        ],
      });
      await flush();

      expect(response.status).toBe(200);
      expect(await conversations.isMuted('user-1')).toBe(false);
    });
  });

  describe('GET /health', () => {
    it('should report healthy when Redis answers', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.redis).toEqual({ status: 'healthy' });
    });

    it('should report degraded when Redis is down', async () => {
      jest.spyOn(redis, 'ping').mockRejectedValue(new Error('Connection refused'));

      const response = await request(app).get('/health');

      expect(response.status).toBe(503);
      expect(response.body.status).toBe('degraded');
      expect(response.body.redis).toEqual({ status: 'unhealthy', error: 'Connection refused' });
    });
  });
});
