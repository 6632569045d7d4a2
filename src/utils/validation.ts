import { DateTime } from 'luxon';
import { STUDIO } from '../config/studio';
import { ValidationError } from './errors';

const PHONE_FORMATTING = /[\s\-()]/g;
const NAME_PATTERN = /^[\p{L}\s\-.]+$/u;
const EVENT_ID_PATTERN = /^[a-zA-Z0-9_]+$/;
const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)$/;
const DISALLOWED_TEXT = /[^\p{L}\p{N}_\s.,!?;:\-()/"'\n]/gu;

/**
 * Normalises a Greek phone number to its 10-digit national form.
 * Accepts +30 / 0030 / 30 prefixes and spaces, dashes or parentheses.
 */
export function validatePhoneNumber(phone: string): string {
  if (!phone) {
    throw new ValidationError('Phone number cannot be empty');
  }

  let cleaned = phone.replace(PHONE_FORMATTING, '');

  if (cleaned.startsWith('+30')) {
    cleaned = cleaned.slice(3);
  } else if (cleaned.startsWith('0030')) {
    cleaned = cleaned.slice(4);
  } else if (cleaned.startsWith('30') && cleaned.length === 12) {
    cleaned = cleaned.slice(2);
  }

  if (cleaned.length !== 10) {
    throw new ValidationError(`Invalid phone number length: ${cleaned.length} (expected 10 digits)`);
  }

  if (!/^\d+$/.test(cleaned)) {
    throw new ValidationError('Phone number must contain only digits');
  }

  // Mobiles start with 69/68, landlines with 2
  if (!(cleaned.startsWith('69') || cleaned.startsWith('68') || cleaned.startsWith('2'))) {
    throw new ValidationError(`Invalid Greek phone number pattern: ${cleaned.slice(0, 2)}`);
  }

  return cleaned;
}

export function validateDate(dateStr: string, timezone: string, now: DateTime = DateTime.now()): DateTime {
  if (!dateStr) {
    throw new ValidationError('Date cannot be empty');
  }

  const parsed = DateTime.fromFormat(dateStr, 'yyyy-MM-dd', { zone: timezone });
  if (!parsed.isValid) {
    throw new ValidationError(`Invalid date format: ${dateStr} (expected YYYY-MM-DD)`);
  }

  const today = now.setZone(timezone).startOf('day');
  if (parsed < today) {
    throw new ValidationError(`Date cannot be in the past: ${dateStr}`);
  }

  return parsed;
}

export function validateTime(timeStr: string): { hours: number; minutes: number } {
  if (!timeStr) {
    throw new ValidationError('Time cannot be empty');
  }

  const match = TIME_PATTERN.exec(timeStr.trim());
  if (!match) {
    throw new ValidationError(`Invalid time format: ${timeStr} (expected HH:MM)`);
  }

  const hours = parseInt(match[1], 10);
  const minutes = parseInt(match[2], 10);

  if (hours < STUDIO.openingHour || hours >= STUDIO.closingHour) {
    throw new ValidationError(
      `Time must be within business hours (${STUDIO.openingHour}:00-${STUDIO.closingHour}:00): ${timeStr}`
    );
  }

  return { hours, minutes };
}

export function validatePrice(price: number): number {
  if (!Number.isFinite(price) || price <= 0) {
    throw new ValidationError(`Price must be positive: ${price}`);
  }
  if (price > STUDIO.maxPrice) {
    throw new ValidationError(`Price too high (max ${STUDIO.maxPrice}€): ${price}`);
  }
  return price;
}

/** Rounds up to the next 5-minute boundary. */
export function roundDurationToFiveMinutes(durationHours: number): number {
  const minutes = Math.ceil((durationHours * 60) / 5) * 5;
  return minutes / 60;
}

export function durationFromPrice(price: number): number {
  const minutes = Math.ceil((price * 60) / STUDIO.pricePerHour / 5) * 5;
  return minutes / 60;
}

/**
 * Resolves the appointment length: an explicit duration wins, otherwise it is
 * derived from the quoted price, otherwise the default of one hour.
 */
export function validateDuration(durationHours?: number | null, price?: number | null): number {
  if (durationHours !== undefined && durationHours !== null) {
    if (!Number.isFinite(durationHours) || durationHours <= 0) {
      throw new ValidationError(`Duration must be positive: ${durationHours}`);
    }
    if (durationHours > STUDIO.maxDurationHours) {
      throw new ValidationError(`Duration too long (max ${STUDIO.maxDurationHours} hours): ${durationHours}`);
    }
    return durationHours;
  }

  if (price === undefined || price === null) {
    return STUDIO.defaultDurationHours;
  }

  return durationFromPrice(validatePrice(price));
}

export function validateCustomerName(name: string): string {
  if (!name) {
    throw new ValidationError('Customer name cannot be empty');
  }

  const trimmed = name.trim();

  if (trimmed.length < 2) {
    throw new ValidationError(`Customer name too short: ${trimmed}`);
  }
  if (trimmed.length > 100) {
    throw new ValidationError(`Customer name too long (max 100 chars): ${trimmed.slice(0, 20)}...`);
  }
  if (!NAME_PATTERN.test(trimmed)) {
    throw new ValidationError(`Customer name contains invalid characters: ${trimmed}`);
  }

  return trimmed;
}

export function validateEventId(eventId: string): string {
  if (!eventId) {
    throw new ValidationError('Event ID cannot be empty');
  }
  if (eventId.length > 1024) {
    throw new ValidationError('Event ID too long');
  }
  if (!EVENT_ID_PATTERN.test(eventId)) {
    throw new ValidationError(`Invalid event ID format: ${eventId}`);
  }
  return eventId;
}

export function sanitizeTextInput(text: string | undefined, maxLength: number = 1000): string {
  if (!text) return '';

  const trimmed = text.trim();
  if (trimmed.length > maxLength) {
    throw new ValidationError(`Text too long (max ${maxLength} chars): ${trimmed.length} chars`);
  }

  return trimmed.replace(DISALLOWED_TEXT, '');
}

const CONTEXT_PHONE_PATTERNS = [
  /\+30\s?69\d{8}\b/,
  /\b69\d{8}\b/,
  /\+30\s?\d{10}\b/,
  /\b21\d{8}\b/,
  /\b\d{10}\b/,
];

/** Finds the most recent phone number mentioned in free-text messages. */
export function extractPhoneNumber(contents: string[]): string | null {
  for (const content of [...contents].reverse()) {
    for (const pattern of CONTEXT_PHONE_PATTERNS) {
      const match = pattern.exec(content);
      if (match) {
        const phone = match[0].replace('+30', '').replace(/\s/g, '');
        if (/^\d{10}$/.test(phone)) {
          return phone;
        }
      }
    }
  }
  return null;
}
