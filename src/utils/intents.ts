import { INTENT_PRIORITIES, Intent, PrioritizedIntents } from '../types/agent';

const DMY_DATE = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

/** `5/6/2025` → `2025-06-05`; anything else passes through. */
export function normalizeIntentDate(value: string | undefined): string | undefined {
  if (!value) return value;
  const match = DMY_DATE.exec(value.trim());
  if (!match) return value;
  const [, day, month, year] = match;
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

/**
 * Orders intents by business priority, higher confidence first on ties.
 * Pricing always outranks booking, so a "how much and when?" message gets the
 * price answered first. Among booking intents, an `available_slots` one carries
 * the dates and takes over as primary.
 */
export function prioritizeIntents(intents: Intent[]): PrioritizedIntents {
  const sorted = [...intents].sort(
    (a, b) =>
      INTENT_PRIORITIES[a.primary] - INTENT_PRIORITIES[b.primary] || (b.confidence ?? 0) - (a.confidence ?? 0)
  );

  let primary: Intent = sorted[0] ?? { primary: 'other' };
  const others = sorted.slice(1).filter((intent) => intent.primary !== primary.primary);

  if (primary.primary === 'booking_request') {
    const slots = sorted.find((i) => i.primary === 'booking_request' && i.subcategory === 'available_slots');
    if (slots) primary = slots;
  }

  return {
    primary: {
      ...primary,
      start_date: normalizeIntentDate(primary.start_date),
      end_date: normalizeIntentDate(primary.end_date),
    },
    others,
  };
}
