import { MESSAGE_MAX_LENGTH } from '../config/studio';
import { DownloadedAttachment, SendResult } from '../types/messaging';
import { ServiceError, toError } from '../utils/errors';
import { logger } from '../utils/logger';

const GRAPH_API_URL = 'https://graph.instagram.com/v22.0/me/messages';
const DEFAULT_TIMEOUT_MS = 15000;

export interface InstagramServiceOptions {
  accessToken: string;
  timeoutMs?: number;
}

/**
 * Splits `text` into parts of at most `limit` characters. Each cut happens at
 * the last newline inside the window, else the last space, else exactly at
 * `limit`; the newline or space at a cut is dropped and nothing else is
 * trimmed.
 */
export function splitMessage(text: string, limit: number = MESSAGE_MAX_LENGTH): string[] {
  if (limit < 1) {
    throw new RangeError(`limit must be positive, got ${limit}`);
  }

  const parts: string[] = [];
  let rest = text;

  while (rest.length > limit) {
    const window = rest.slice(0, limit + 1);
    let cut = window.lastIndexOf('\n', limit);
    if (cut <= 0) cut = window.lastIndexOf(' ', limit);

    if (cut > 0) {
      parts.push(rest.slice(0, cut));
      rest = rest.slice(cut + 1);
    } else {
      parts.push(rest.slice(0, limit));
      rest = rest.slice(limit);
    }
  }

  if (rest.length > 0 || parts.length === 0) {
    parts.push(rest);
  }
  return parts;
}

export class InstagramService {
  private timeoutMs: number;

  constructor(private options: InstagramServiceOptions) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async sendMessage(recipientId: string, text: string): Promise<SendResult> {
    const response = await this.request('sendMessage', GRAPH_API_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.options.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ recipient: { id: recipientId }, message: { text } }),
    });

    const body: unknown = await response.json();
    const messageId =
      typeof body === 'object' && body !== null && 'message_id' in body && typeof body.message_id === 'string'
        ? body.message_id
        : undefined;

    logger.info('Instagram message sent', { recipientId, messageId, length: text.length });
    return { recipientId, messageId };
  }

  /** Sends the parts of `splitMessage(text)` in order; stops at the first failure. */
  async sendLongMessage(recipientId: string, text: string): Promise<SendResult[]> {
    const results: SendResult[] = [];
    for (const part of splitMessage(text)) {
      results.push(await this.sendMessage(recipientId, part));
    }
    return results;
  }

  async downloadAttachment(url: string): Promise<DownloadedAttachment> {
    const response = await this.request('downloadAttachment', url, { method: 'GET' });
    const buffer = Buffer.from(await response.arrayBuffer());
    const mimeType = response.headers.get('content-type')?.split(';')[0]?.trim() || 'image/jpeg';

    logger.debug('Attachment downloaded', { bytes: buffer.length, mimeType });
    return { base64: buffer.toString('base64'), mimeType };
  }

  private async request(operation: string, url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const detail = await response.text();
        throw new ServiceError(
          'Instagram',
          operation,
          new Error(`HTTP ${response.status}: ${detail.slice(0, 200)}`),
          response.status === 429 || response.status >= 500
        );
      }
      return response;
    } catch (error: unknown) {
      if (error instanceof ServiceError) throw error;
      throw new ServiceError('Instagram', operation, toError(error), true);
    } finally {
      clearTimeout(timer);
    }
  }
}
