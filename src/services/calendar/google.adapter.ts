import { google, calendar_v3 } from 'googleapis';
import { GoogleAuth, OAuth2Client } from 'google-auth-library';
import { DateTime } from 'luxon';
import { z } from 'zod';
import { CalendarAdapter, CalendarEvent, EventDraft } from '../../types/calendar';
import { Env } from '../../config/env';
import { logger, errorMessage } from '../../utils/logger';
import { RescheduleIncompleteError, ServiceError, SlotUnavailableError, toError } from '../../utils/errors';
import { isTransientError } from '../../utils/retry';
import { parseIsoInZone, slotKeyFor, toIso } from '../../utils/time';
import { STUDIO } from '../../config/studio';

const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar'];
const REMINDER_MINUTES = 60;

const serviceAccountSchema = z.object({
  client_email: z.string().email(),
  private_key: z.string().min(1),
});

export interface GoogleCalendarOptions {
  calendarId: string;
  timezone: string;
  /** Parallel bookings the studio can take in one slot. */
  capacity: number;
}

/**
 * Builds the Calendar API client from a base64 service-account key, or from an
 * OAuth refresh token when no key is configured.
 */
export function createCalendarClient(config: Env): calendar_v3.Calendar {
  if (config.GOOGLE_CALENDAR_CREDENTIALS) {
    const decoded: unknown = JSON.parse(Buffer.from(config.GOOGLE_CALENDAR_CREDENTIALS, 'base64').toString('utf8'));
    const credentials = serviceAccountSchema.parse(decoded);
    const auth = new GoogleAuth({ credentials, scopes: CALENDAR_SCOPES });
    return google.calendar({ version: 'v3', auth });
  }

  if (config.GOOGLE_OAUTH_CLIENT_ID && config.GOOGLE_OAUTH_CLIENT_SECRET && config.GOOGLE_OAUTH_REFRESH_TOKEN) {
    const auth = new OAuth2Client(config.GOOGLE_OAUTH_CLIENT_ID, config.GOOGLE_OAUTH_CLIENT_SECRET);
    auth.setCredentials({ refresh_token: config.GOOGLE_OAUTH_REFRESH_TOKEN });
    return google.calendar({ version: 'v3', auth });
  }

  throw new Error('Google Calendar credentials not configured');
}

function toCalendarEvent(item: calendar_v3.Schema$Event): CalendarEvent | null {
  // All-day entries carry start.date only and never block a slot.
  if (!item.id || !item.start?.dateTime || !item.end?.dateTime) {
    return null;
  }
  return {
    id: item.id,
    title: item.summary ?? '',
    start: item.start.dateTime,
    end: item.end.dateTime,
    description: item.description ?? undefined,
  };
}

export class GoogleCalendarAdapter implements CalendarAdapter {
  readonly timezone: string;
  readonly capacity: number;
  private calendarId: string;

  constructor(private calendar: calendar_v3.Calendar, options: GoogleCalendarOptions) {
    this.calendarId = options.calendarId;
    this.timezone = options.timezone;
    this.capacity = options.capacity;
  }

  async listEvents(timeMin: string, timeMax: string, query?: string): Promise<CalendarEvent[]> {
    const result = await this.call('listEvents', () =>
      this.calendar.events.list({
        calendarId: this.calendarId,
        timeMin,
        timeMax,
        q: query,
        singleEvents: true,
        orderBy: 'startTime',
        maxResults: 250,
      })
    );

    return (result.data.items ?? [])
      .map(toCalendarEvent)
      .filter((event): event is CalendarEvent => event !== null);
  }

  async getEvent(eventId: string): Promise<CalendarEvent> {
    const result = await this.call('getEvent', () =>
      this.calendar.events.get({ calendarId: this.calendarId, eventId })
    );
    const event = toCalendarEvent(result.data);
    if (!event) {
      throw new ServiceError('GoogleCalendar', 'getEvent', new Error(`Event ${eventId} has no timed start`), false);
    }
    return event;
  }

  /** Full-text search narrows the list; the description check makes it exact. */
  async findEventsByPhone(phone: string, from: string): Promise<CalendarEvent[]> {
    const timeMin = parseIsoInZone(from, this.timezone);
    const timeMax = timeMin.plus({ days: STUDIO.bookingSearchDays });
    const events = await this.listEvents(toIso(timeMin), toIso(timeMax), phone);
    const matches = events.filter((event) => event.description?.includes(phone));

    logger.info('Bookings looked up by phone', { found: matches.length });
    return matches;
  }

  async countConflicts(start: string, end: string, excludeEventId?: string): Promise<number> {
    const slotStart = parseIsoInZone(start, this.timezone);
    const slotEnd = parseIsoInZone(end, this.timezone);
    const events = await this.listEvents(toIso(slotStart), toIso(slotEnd));

    return events.filter((event) => {
      if (event.id === excludeEventId) return false;
      const eventStart = DateTime.fromISO(event.start);
      const eventEnd = DateTime.fromISO(event.end);
      return eventStart < slotEnd && eventEnd > slotStart;
    }).length;
  }

  async isConflict(start: string, end: string): Promise<boolean> {
    return (await this.countConflicts(start, end)) >= this.capacity;
  }

  async createEvent(draft: EventDraft): Promise<CalendarEvent> {
    if (await this.isConflict(draft.start, draft.end)) {
      throw new SlotUnavailableError(slotKeyFor(parseIsoInZone(draft.start, this.timezone)));
    }
    return this.insert(draft);
  }

  async cancelEvent(eventId: string): Promise<void> {
    await this.call('cancelEvent', () =>
      this.calendar.events.delete({ calendarId: this.calendarId, eventId })
    );
    logger.info('Google Calendar event cancelled', { eventId });
  }

  /**
   * Cancel-then-create. If the delete succeeds and the insert fails, the
   * caller gets `RescheduleIncompleteError` carrying the cancelled event; the
   * insert is not retried here.
   */
  async rescheduleEvent(eventId: string, start: string, end: string, description?: string): Promise<CalendarEvent> {
    const existing = await this.getEvent(eventId);

    if ((await this.countConflicts(start, end, eventId)) >= this.capacity) {
      throw new SlotUnavailableError(slotKeyFor(parseIsoInZone(start, this.timezone)));
    }

    await this.cancelEvent(eventId);

    try {
      return await this.insert({
        title: existing.title,
        start,
        end,
        description: description ?? existing.description,
      });
    } catch (error: unknown) {
      logger.error('Reschedule left event cancelled without replacement', {
        eventId,
        error: errorMessage(error),
      });
      throw new RescheduleIncompleteError(existing, toError(error));
    }
  }

  private async insert(draft: EventDraft): Promise<CalendarEvent> {
    const result = await this.call('createEvent', () =>
      this.calendar.events.insert({
        calendarId: this.calendarId,
        requestBody: {
          summary: draft.title,
          description: draft.description,
          start: { dateTime: draft.start, timeZone: this.timezone },
          end: { dateTime: draft.end, timeZone: this.timezone },
          reminders: {
            useDefault: false,
            overrides: [{ method: 'popup', minutes: REMINDER_MINUTES }],
          },
        },
      })
    );

    const id = result.data.id;
    if (!id) {
      throw new ServiceError('GoogleCalendar', 'createEvent', new Error('Insert returned no event id'), false);
    }

    logger.info('Google Calendar event created', { eventId: id });
    return { id, ...draft };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error: unknown) {
      throw new ServiceError('GoogleCalendar', operation, toError(error), isTransientError(error));
    }
  }
}
