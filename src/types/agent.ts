import { z } from 'zod';

export const INTENT_PRIORITIES = {
  pricing: 1,
  booking_request: 2,
  studio_information: 3,
  follow_up: 4,
  other: 5,
} as const;

export type IntentName = keyof typeof INTENT_PRIORITIES;

export const intentSchema = z.object({
  primary: z.enum(['pricing', 'booking_request', 'studio_information', 'follow_up', 'other']).catch('other'),
  subcategory: z.string().optional(),
  confidence: z.number().min(0).max(1).optional(),
  start_date: z.string().optional(),
  end_date: z.string().optional(),
});

export const intentsPayloadSchema = z.object({
  intents: z.array(intentSchema).default([]),
});

export type Intent = z.infer<typeof intentSchema>;

export interface PrioritizedIntents {
  primary: Intent;
  others: Intent[];
}
