export const STUDIO = {
  openingHour: 11,
  closingHour: 20,
  // Luxon weekday numbers (Mon=1 … Sun=7)
  closedWeekdays: [7],
  slotStepMinutes: 60,
  suggestedSlotCount: 3,
  defaultDurationHours: 1,
  maxDurationHours: 10,
  maxPrice: 5000,
  // price / 100 = hours
  pricePerHour: 100,
  bookingSearchDays: 90,
} as const;

export const MESSAGE_MAX_LENGTH = 800;
export const CONVERSATION_TTL_SECONDS = 60 * 60 * 24 * 7;
export const QUEUE_TTL_SECONDS = 60 * 10;
export const MUTE_DURATION_SECONDS = 60 * 60 * 2;
export const PROCESSING_LOCK_TTL_SECONDS = 30;
export const MAX_TOOL_ROUNDS = 3;

export const RETRY_POLICY = {
  maxAttempts: 3,
  backoffMs: [2000, 4000],
} as const;

export const RETRIEVAL = {
  topK: 3,
  minScore: 0.75,
  minFilteredMatches: 2,
} as const;
