import { z } from 'zod';

const attachmentSchema = z.object({
  type: z.string(),
  payload: z.object({ url: z.string().url().optional() }).passthrough().optional(),
});

export const messagingEventSchema = z.object({
  sender: z.object({ id: z.string().min(1) }),
  recipient: z.object({ id: z.string().min(1) }),
  timestamp: z.number().optional(),
  message: z
    .object({
      mid: z.string().optional(),
      text: z.string().optional(),
      is_echo: z.boolean().optional(),
      attachments: z.array(attachmentSchema).optional(),
    })
    .optional(),
  reaction: z
    .object({
      mid: z.string().optional(),
      action: z.string().optional(),
      reaction: z.string().optional(),
      emoji: z.string().optional(),
    })
    .optional(),
});

export const webhookPayloadSchema = z.object({
  object: z.string().optional(),
  entry: z
    .array(
      z.object({
        id: z.string().optional(),
        time: z.number().optional(),
        messaging: z.array(messagingEventSchema).min(1),
      })
    )
    .min(1),
});

export type MessagingEvent = z.infer<typeof messagingEventSchema>;
export type WebhookPayload = z.infer<typeof webhookPayloadSchema>;

export interface SendResult {
  recipientId: string;
  messageId?: string;
}

export interface DownloadedAttachment {
  base64: string;
  mimeType: string;
}
