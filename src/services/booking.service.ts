import { DateTime } from 'luxon';
import { SlotArbiter } from './slot-arbiter.service';
import { CalendarAdapter, CalendarEvent } from '../types/calendar';
import { AvailableSlot, BookingResult, HoldToken } from '../types/booking';
import { STUDIO } from '../config/studio';
import { SlotUnavailableError, ValidationError } from '../utils/errors';
import { logger } from '../utils/logger';
import { slotKeyFor, toIso } from '../utils/time';
import { updateBookingDescription } from '../utils/formatting';
import {
  sanitizeTextInput,
  validateCustomerName,
  validateDate,
  validateDuration,
  validateEventId,
  validatePhoneNumber,
  validatePrice,
  validateTime,
} from '../utils/validation';

export interface AvailabilityQuery {
  startDate: string;
  endDate?: string;
  durationHours?: number;
  price?: number;
  /** HH:MM; on the first day, suggestions start here instead of at opening. */
  preferredTime?: string;
}

export interface SlotSuggestion {
  slots: AvailableSlot[];
  holds: HoldToken[];
  durationHours: number;
}

export interface CreateBookingInput {
  customerName: string;
  customerPhone: string;
  date: string;
  time: string;
  durationHours?: number;
  price?: number;
  tattooDescription?: string;
}

export interface RescheduleInput {
  eventId: string;
  newDate: string;
  newTime: string;
  durationHours?: number;
  price?: number;
}

const PREFERRED_TIME = /^(\d{1,2}):(\d{2})$/;

interface Interval {
  start: DateTime;
  end: DateTime;
}

export class BookingService {
  constructor(
    private calendar: CalendarAdapter,
    private arbiter: SlotArbiter,
    private clock: () => DateTime = () => DateTime.now()
  ) {}

  /**
   * Walks the requested days in hourly steps and holds the first few free
   * slots for `holder`. Slots another customer is holding are passed over.
   */
  async findAvailableSlots(holder: string, query: AvailabilityQuery): Promise<SlotSuggestion> {
    const tz = this.calendar.timezone;
    const now = this.clock();
    const firstDay = validateDate(query.startDate, tz, now);
    const lastDay = query.endDate ? validateDate(query.endDate, tz, now) : firstDay;
    if (lastDay < firstDay) {
      throw new ValidationError(`End date ${query.endDate} is before start date ${query.startDate}`);
    }
    if (lastDay.diff(firstDay, 'days').days > STUDIO.bookingSearchDays) {
      throw new ValidationError(`Date range too long (max ${STUDIO.bookingSearchDays} days)`);
    }

    const durationHours = validateDuration(query.durationHours, query.price);
    const events = await this.calendar.listEvents(toIso(firstDay), toIso(lastDay.endOf('day')));
    const busy: Interval[] = events.map((event) => ({
      start: DateTime.fromISO(event.start),
      end: DateTime.fromISO(event.end),
    }));

    const slots: AvailableSlot[] = [];
    const holds: HoldToken[] = [];

    for (let day = firstDay; day <= lastDay && holds.length < STUDIO.suggestedSlotCount; day = day.plus({ days: 1 })) {
      if (STUDIO.closedWeekdays.some((weekday) => weekday === day.weekday)) continue;

      const first = day.equals(firstDay) ? this.firstSlotOfDay(day, query.preferredTime) : this.openingOf(day);
      if (!first) continue;

      const closing = day.set({ hour: STUDIO.closingHour, minute: 0 });
      for (let cursor = first; holds.length < STUDIO.suggestedSlotCount; cursor = cursor.plus({ minutes: STUDIO.slotStepMinutes })) {
        const slotStart = cursor;
        const slotEnd = slotStart.plus({ minutes: Math.round(durationHours * 60) });
        if (slotEnd > closing) break;
        if (slotStart <= now) continue;

        const overlapping = busy.filter((b) => b.start < slotEnd && b.end > slotStart).length;
        if (overlapping >= this.calendar.capacity) continue;

        const hold = await this.tryHold(slotKeyFor(slotStart), holder);
        if (hold) {
          holds.push(hold);
          slots.push({
            date: slotStart.toFormat('yyyy-MM-dd'),
            startTime: slotStart.toFormat('HH:mm'),
            datetime: toIso(slotStart),
          });
        }
      }
    }

    logger.info('Availability searched', { holder, startDate: query.startDate, found: slots.length });
    return { slots, holds, durationHours };
  }

  /**
   * Takes (or re-enters) the hold for the requested slot, confirms it, then
   * releases the customer's other suggested holds.
   */
  async createBooking(holder: string, input: CreateBookingInput, draftHolds: HoldToken[] = []): Promise<BookingResult> {
    const customerName = validateCustomerName(input.customerName);
    const customerPhone = validatePhoneNumber(input.customerPhone);
    const price = input.price !== undefined ? validatePrice(input.price) : undefined;
    const durationHours = validateDuration(input.durationHours, price);
    const tattooDescription = sanitizeTextInput(input.tattooDescription) || undefined;
    const start = this.startOf(input.date, input.time);

    const token = await this.arbiter.requestHold(slotKeyFor(start), holder);
    const result = await this.arbiter.confirm(token, {
      start: toIso(start),
      customerName,
      customerPhone,
      tattooDescription,
      price,
      durationHours,
    });

    await Promise.all(
      draftHolds.filter((hold) => hold.slotKey !== token.slotKey).map((hold) => this.arbiter.release(hold))
    );

    return result;
  }

  async findBookingsByPhone(phone: string): Promise<CalendarEvent[]> {
    const normalized = validatePhoneNumber(phone);
    return this.calendar.findEventsByPhone(normalized, toIso(this.clock()));
  }

  async cancelBooking(eventId: string): Promise<void> {
    await this.calendar.cancelEvent(validateEventId(eventId));
  }

  /**
   * The new slot is held for the duration of the move so no other customer can
   * take it between the conflict check and the insert.
   */
  async rescheduleBooking(holder: string, input: RescheduleInput): Promise<CalendarEvent> {
    const eventId = validateEventId(input.eventId);
    const start = this.startOf(input.newDate, input.newTime);
    const price = input.price !== undefined ? validatePrice(input.price) : undefined;

    const existing = await this.calendar.getEvent(eventId);
    const durationHours =
      input.durationHours !== undefined || price !== undefined
        ? validateDuration(input.durationHours, price)
        : DateTime.fromISO(existing.end).diff(DateTime.fromISO(existing.start), 'hours').hours;
    const end = start.plus({ minutes: Math.round(durationHours * 60) });
    const description =
      price !== undefined ? updateBookingDescription(existing.description, price, durationHours) : undefined;

    const token = await this.arbiter.requestHold(slotKeyFor(start), holder);
    try {
      return await this.calendar.rescheduleEvent(eventId, toIso(start), toIso(end), description);
    } finally {
      await this.arbiter.release(token);
    }
  }

  private startOf(date: string, time: string): DateTime {
    const day = validateDate(date, this.calendar.timezone, this.clock());
    const { hours, minutes } = validateTime(time);
    return day.set({ hour: hours, minute: minutes });
  }

  private openingOf(day: DateTime): DateTime {
    return day.set({ hour: STUDIO.openingHour, minute: 0, second: 0, millisecond: 0 });
  }

  private firstSlotOfDay(day: DateTime, preferredTime?: string): DateTime | null {
    const match = preferredTime ? PREFERRED_TIME.exec(preferredTime.trim()) : null;
    if (!match) return this.openingOf(day);

    const hour = parseInt(match[1], 10);
    const minute = parseInt(match[2], 10);
    if (hour >= STUDIO.closingHour) return null;
    if (hour < STUDIO.openingHour) return this.openingOf(day);
    return day.set({ hour, minute: minute < 60 ? minute : 0, second: 0, millisecond: 0 });
  }

  private async tryHold(slotKey: string, holder: string): Promise<HoldToken | null> {
    try {
      return await this.arbiter.requestHold(slotKey, holder);
    } catch (error: unknown) {
      if (error instanceof SlotUnavailableError) {
        return null;
      }
      throw error;
    }
  }
}
