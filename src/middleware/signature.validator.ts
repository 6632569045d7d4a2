import crypto from 'crypto';
import { IncomingMessage } from 'http';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';

const rawBodies = new WeakMap<IncomingMessage, Buffer>();

/** `verify` hook for express.json(): keeps the exact bytes Meta signed. */
export function captureRawBody(req: IncomingMessage, _res: unknown, buf: Buffer): void {
  rawBodies.set(req, buf);
}

export function computeSignature(appSecret: string, body: Buffer | string): string {
  return `sha256=${crypto.createHmac('sha256', appSecret).update(body).digest('hex')}`;
}

export function isValidSignature(appSecret: string, body: Buffer, header: string): boolean {
  const expected = Buffer.from(computeSignature(appSecret, body));
  const received = Buffer.from(header);
  return expected.length === received.length && crypto.timingSafeEqual(expected, received);
}

/**
 * Checks X-Hub-Signature-256 against the raw request body. Without an app
 * secret there is nothing to check against and requests pass through.
 */
export function validateMetaSignature(appSecret: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!appSecret) {
      return next();
    }

    const signature = req.get('x-hub-signature-256');
    if (!signature) {
      logger.warn('Missing Meta signature');
      return res.status(403).json({ error: 'Missing signature' });
    }

    const body = rawBodies.get(req);
    if (!body || !isValidSignature(appSecret, body, signature)) {
      logger.warn('Invalid Meta signature', { path: req.originalUrl });
      return res.status(403).json({ error: 'Invalid signature' });
    }

    next();
  };
}
