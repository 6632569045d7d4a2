import { Queue, ConnectionOptions } from 'bullmq';
import { logger } from '../utils/logger';

export const QUEUE_NAMES = {
  MESSAGE_PROCESSING: 'message-processing',
} as const;

export interface ProcessMessagesJobData {
  userId: string;
}

export function parseRedisConnection(redisUrl: string): ConnectionOptions {
  const url = new URL(redisUrl);
  return {
    host: url.hostname,
    port: url.port ? parseInt(url.port, 10) : 6379,
    username: url.username || undefined,
    password: url.password ? decodeURIComponent(url.password) : undefined,
    tls: url.protocol === 'rediss:' ? {} : undefined,
    maxRetriesPerRequest: null,
  };
}

export function createMessageQueue(connection: ConnectionOptions): Queue<ProcessMessagesJobData> {
  return new Queue<ProcessMessagesJobData>(QUEUE_NAMES.MESSAGE_PROCESSING, {
    connection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: true,
      removeOnFail: 500,
    },
  });
}

/**
 * Schedules a processing run for the user after the grace window. While a run is
 * already waiting, BullMQ ignores the duplicate job id, so a burst of messages
 * is answered once.
 */
export async function scheduleProcessing(
  queue: Queue<ProcessMessagesJobData>,
  userId: string,
  delayMs: number,
  jobSuffix?: string
): Promise<void> {
  const jobId = jobSuffix ? `process-${userId}-${jobSuffix}` : `process-${userId}`;
  await queue.add('process', { userId }, { jobId, delay: delayMs });
  logger.debug('Message processing scheduled', { userId, delayMs, jobId });
}
