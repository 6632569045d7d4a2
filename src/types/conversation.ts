import { z } from 'zod';

export const toolCallRecordSchema = z.object({
  id: z.string(),
  type: z.literal('function'),
  function: z.object({ name: z.string(), arguments: z.string() }),
});

export const chatEntrySchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('user'), content: z.string() }),
  z.object({
    role: z.literal('assistant'),
    content: z.string(),
    tool_calls: z.array(toolCallRecordSchema).optional(),
  }),
  z.object({ role: z.literal('tool'), tool_call_id: z.string(), content: z.string() }),
]);

export const holdTokenSchema = z.object({
  slotKey: z.string(),
  holder: z.string(),
  id: z.string(),
});

export const bookingDraftSchema = z.object({
  holds: z.array(holdTokenSchema),
});

export const conversationContextSchema = z.object({
  messages: z.array(chatEntrySchema),
  draft: bookingDraftSchema.nullable(),
  updatedAt: z.string(),
});

export const queuedMessageSchema = z.object({
  timestamp: z.number(),
  mid: z.string().optional(),
  text: z.string().optional(),
  imageUrls: z.array(z.string()),
});

export type ToolCallRecord = z.infer<typeof toolCallRecordSchema>;
export type ChatEntry = z.infer<typeof chatEntrySchema>;
export type BookingDraft = z.infer<typeof bookingDraftSchema>;
export type ConversationContext = z.infer<typeof conversationContextSchema>;
export type QueuedMessage = z.infer<typeof queuedMessageSchema>;
