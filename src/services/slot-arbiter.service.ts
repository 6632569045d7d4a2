import { v4 as uuidv4 } from 'uuid';
import { HoldStore } from './holds/hold.store';
import { CalendarAdapter, CalendarEvent } from '../types/calendar';
import { Availability, BookingDetails, BookingResult, BookingSlot, HoldToken } from '../types/booking';
import { HoldExpiredError, SlotUnavailableError, ValidationError } from '../utils/errors';
import { logger, errorMessage } from '../utils/logger';
import { parseIsoInZone, slotKeyFor, toIso } from '../utils/time';
import { describeBooking } from '../utils/formatting';

export interface SlotArbiterOptions {
  holdTtlSeconds: number;
  now?: () => number;
}

/**
 * Single authority for who may book a slot. A hold is written with
 * set-if-absent, so between two users racing for the same slot exactly one
 * gets the token; confirmation only reaches the calendar while that token is
 * still the live hold.
 */
export class SlotArbiter {
  private now: () => number;

  constructor(
    private store: HoldStore,
    private calendar: CalendarAdapter,
    private options: SlotArbiterOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  async requestHold(slotKey: string, holder: string, ttlSeconds: number = this.options.holdTtlSeconds): Promise<HoldToken> {
    // A second pass covers a hold that expired between setIfAbsent and get.
    for (let pass = 0; pass < 2; pass++) {
      const createdAt = this.now();
      const id = uuidv4();
      const created = await this.store.setIfAbsent(
        slotKey,
        { token: id, holder, slotKey, createdAt, expiresAt: createdAt + ttlSeconds * 1000 },
        ttlSeconds * 1000
      );

      if (created) {
        logger.debug('Slot hold acquired', { slotKey, holder, ttlSeconds });
        return { slotKey, holder, id };
      }

      const existing = await this.store.get(slotKey);
      if (existing && existing.holder === holder) {
        return { slotKey, holder, id: existing.token };
      }
      if (existing) {
        break;
      }
    }

    throw new SlotUnavailableError(slotKey, 'Slot is held by another customer');
  }

  async confirm(token: HoldToken, details: BookingDetails): Promise<BookingResult> {
    const start = parseIsoInZone(details.start, this.calendar.timezone);
    if (slotKeyFor(start) !== token.slotKey) {
      throw new ValidationError(`Booking start ${details.start} does not match hold ${token.slotKey}`);
    }

    const current = await this.store.get(token.slotKey);
    if (!current || current.token !== token.id || current.holder !== token.holder) {
      logger.warn('Confirm rejected: hold no longer valid', { slotKey: token.slotKey, holder: token.holder });
      throw new HoldExpiredError(token.slotKey);
    }

    const end = start.plus({ minutes: Math.round(details.durationHours * 60) });

    let event: CalendarEvent;
    try {
      event = await this.calendar.createEvent({
        title: `Tattoo - ${details.customerName}`,
        start: toIso(start),
        end: toIso(end),
        description: describeBooking(details),
      });
    } catch (error: unknown) {
      if (error instanceof SlotUnavailableError) {
        await this.release(token);
      }
      throw error;
    }

    // The event exists now; a hold that fails to delete is left to its TTL.
    await this.release(token);
    logger.info('Booking confirmed', { slotKey: token.slotKey, eventId: event.id });
    return { status: 'confirmed', eventId: event.id, start: event.start, end: event.end };
  }

  /** Idempotent. Failures are logged, never thrown. */
  async release(token: HoldToken): Promise<void> {
    try {
      const removed = await this.store.deleteIfToken(token.slotKey, token.id);
      if (removed) {
        logger.debug('Slot hold released', { slotKey: token.slotKey, holder: token.holder });
      }
    } catch (error: unknown) {
      logger.error('Failed to release slot hold', { slotKey: token.slotKey, error: errorMessage(error) });
    }
  }

  /** Calendar conflicts only; holds are not consulted. */
  async checkAvailability(slot: BookingSlot): Promise<Availability> {
    const start = parseIsoInZone(slot.start, this.calendar.timezone);
    const end = start.plus({ minutes: Math.round(slot.durationHours * 60) });
    const conflict = await this.calendar.isConflict(toIso(start), toIso(end));
    return conflict ? 'busy' : 'free';
  }
}
