import { z } from 'zod';
import { BookingService } from '../booking.service';
import { ConversationStore } from '../conversation.service';
import { SlotArbiter } from '../slot-arbiter.service';
import { ToolCallRecord } from '../../types/conversation';
import {
  HoldExpiredError,
  RescheduleIncompleteError,
  ServiceError,
  SlotUnavailableError,
  ValidationError,
} from '../../utils/errors';
import { formatAvailableSlots, formatDuration } from '../../utils/formatting';
import { logger, errorMessage } from '../../utils/logger';

export type ToolErrorCode =
  | 'INVALID_ARGUMENTS'
  | 'UNKNOWN_TOOL'
  | 'VALIDATION_ERROR'
  | 'SLOT_UNAVAILABLE'
  | 'HOLD_EXPIRED'
  | 'RESCHEDULE_INCOMPLETE'
  | 'SERVICE_UNAVAILABLE'
  | 'INTERNAL_ERROR';

export type ToolResult =
  | { status: 'success'; message: string; [key: string]: unknown }
  | { status: 'not_found'; message: string }
  | { status: 'error'; code: ToolErrorCode; message: string };

const optionalNumber = z.number().nullish().transform((v) => v ?? undefined);
const optionalString = z.string().nullish().transform((v) => v ?? undefined);

const argumentSchemas = {
  check_calendar_availability: z.object({
    start_date: z.string(),
    end_date: optionalString,
    duration_hours: optionalNumber,
    tattoo_price: optionalNumber,
    preferred_time: optionalString,
  }),
  create_tattoo_booking: z.object({
    customer_name: z.string(),
    customer_phone: z.string(),
    date: z.string(),
    time: z.string(),
    duration_hours: optionalNumber,
    tattoo_price: optionalNumber,
    tattoo_description: optionalString,
  }),
  find_customer_booking: z.object({ phone_number: z.string() }),
  cancel_tattoo_booking: z.object({ event_id: z.string() }),
  reschedule_tattoo_booking: z.object({
    event_id: z.string(),
    new_date: z.string(),
    new_time: z.string(),
    duration_hours: optionalNumber,
    tattoo_price: optionalNumber,
  }),
};

type ToolName = keyof typeof argumentSchemas;

function isToolName(name: string): name is ToolName {
  return Object.prototype.hasOwnProperty.call(argumentSchemas, name);
}

function parseArguments(raw: string): unknown {
  try {
    return JSON.parse(raw || '{}');
  } catch {
    return undefined;
  }
}

/**
 * Maps failures to a result the model can act on. The model sees a code and a
 * customer-safe message, never a stack.
 */
export function toToolError(error: unknown): ToolResult {
  if (error instanceof ValidationError) {
    return { status: 'error', code: 'VALIDATION_ERROR', message: error.message };
  }
  if (error instanceof SlotUnavailableError) {
    return {
      status: 'error',
      code: 'SLOT_UNAVAILABLE',
      message: 'Η ώρα αυτή δεν είναι πλέον διαθέσιμη. Πρότεινε στον πελάτη να ελέγξουμε άλλες ώρες.',
    };
  }
  if (error instanceof HoldExpiredError) {
    return {
      status: 'error',
      code: 'HOLD_EXPIRED',
      message: 'Η κράτηση της ώρας έληξε. Έλεγξε ξανά τη διαθεσιμότητα πριν κλείσεις το ραντεβού.',
    };
  }
  if (error instanceof RescheduleIncompleteError) {
    return {
      status: 'error',
      code: 'RESCHEDULE_INCOMPLETE',
      message: `Το παλιό ραντεβού (${error.cancelledEvent.start}) ακυρώθηκε αλλά το νέο δεν καταχωρήθηκε. Ενημέρωσε τον πελάτη ότι το στούντιο θα επικοινωνήσει μαζί του.`,
    };
  }
  if (error instanceof ServiceError) {
    return {
      status: 'error',
      code: 'SERVICE_UNAVAILABLE',
      message: 'Το ημερολόγιο δεν είναι διαθέσιμο αυτή τη στιγμή. Ζήτησε από τον πελάτη να δοκιμάσει ξανά σε λίγο.',
    };
  }
  return { status: 'error', code: 'INTERNAL_ERROR', message: 'Κάτι πήγε στραβά με το ημερολόγιο.' };
}

export class ToolExecutor {
  constructor(
    private booking: BookingService,
    private arbiter: SlotArbiter,
    private conversations: ConversationStore
  ) {}

  async execute(call: ToolCallRecord, userId: string): Promise<ToolResult> {
    const name = call.function.name;
    if (!isToolName(name)) {
      logger.warn('Model called unknown tool', { userId, tool: name });
      return { status: 'error', code: 'UNKNOWN_TOOL', message: `Unknown tool: ${name}` };
    }

    try {
      const result = await this.dispatch(name, call.function.arguments, userId);
      logger.info('Tool executed', { userId, tool: name, status: result.status });
      return result;
    } catch (error: unknown) {
      logger.warn('Tool failed', { userId, tool: name, error: errorMessage(error) });
      return toToolError(error);
    }
  }

  private async dispatch(name: ToolName, rawArguments: string, userId: string): Promise<ToolResult> {
    const input = parseArguments(rawArguments);

    switch (name) {
      case 'check_calendar_availability': {
        const args = argumentSchemas[name].safeParse(input);
        if (!args.success) return invalidArguments(name);
        return this.checkAvailability(userId, args.data);
      }
      case 'create_tattoo_booking': {
        const args = argumentSchemas[name].safeParse(input);
        if (!args.success) return invalidArguments(name);
        return this.createBooking(userId, args.data);
      }
      case 'find_customer_booking': {
        const args = argumentSchemas[name].safeParse(input);
        if (!args.success) return invalidArguments(name);
        const events = await this.booking.findBookingsByPhone(args.data.phone_number);
        if (events.length === 0) {
          return { status: 'not_found', message: 'Δεν βρέθηκαν ραντεβού με αυτό το τηλέφωνο.' };
        }
        return {
          status: 'success',
          message: `Βρέθηκαν ${events.length} ραντεβού.`,
          count: events.length,
          bookings: events.map((e) => ({ event_id: e.id, title: e.title, start: e.start, end: e.end })),
        };
      }
      case 'cancel_tattoo_booking': {
        const args = argumentSchemas[name].safeParse(input);
        if (!args.success) return invalidArguments(name);
        await this.booking.cancelBooking(args.data.event_id);
        return { status: 'success', message: 'Το ραντεβού ακυρώθηκε επιτυχώς.' };
      }
      case 'reschedule_tattoo_booking': {
        const args = argumentSchemas[name].safeParse(input);
        if (!args.success) return invalidArguments(name);
        const event = await this.booking.rescheduleBooking(userId, {
          eventId: args.data.event_id,
          newDate: args.data.new_date,
          newTime: args.data.new_time,
          durationHours: args.data.duration_hours,
          price: args.data.tattoo_price,
        });
        return {
          status: 'success',
          message: 'Το ραντεβού μεταφέρθηκε επιτυχώς!',
          event_id: event.id,
          start: event.start,
          end: event.end,
        };
      }
    }
  }

  private async checkAvailability(
    userId: string,
    args: z.infer<(typeof argumentSchemas)['check_calendar_availability']>
  ): Promise<ToolResult> {
    const suggestion = await this.booking.findAvailableSlots(userId, {
      startDate: args.start_date,
      endDate: args.end_date,
      durationHours: args.duration_hours,
      price: args.tattoo_price,
      preferredTime: args.preferred_time,
    });

    // Suggestions from an earlier search are stale once new ones are held.
    const context = await this.conversations.getContext(userId);
    const kept = new Set(suggestion.holds.map((h) => h.slotKey));
    const stale = (context.draft?.holds ?? []).filter((h) => !kept.has(h.slotKey));
    await Promise.all(stale.map((hold) => this.arbiter.release(hold)));
    await this.conversations.setDraft(userId, { holds: suggestion.holds });

    return {
      status: 'success',
      message: formatAvailableSlots(suggestion.slots),
      slots: suggestion.slots,
      duration_display: formatDuration(suggestion.durationHours),
    };
  }

  private async createBooking(
    userId: string,
    args: z.infer<(typeof argumentSchemas)['create_tattoo_booking']>
  ): Promise<ToolResult> {
    const context = await this.conversations.getContext(userId);
    const result = await this.booking.createBooking(
      userId,
      {
        customerName: args.customer_name,
        customerPhone: args.customer_phone,
        date: args.date,
        time: args.time,
        durationHours: args.duration_hours,
        price: args.tattoo_price,
        tattooDescription: args.tattoo_description,
      },
      context.draft?.holds ?? []
    );
    await this.conversations.setDraft(userId, null);

    return {
      status: 'success',
      message: 'Το ραντεβού δημιουργήθηκε επιτυχώς!',
      event_id: result.eventId,
      start: result.start,
      end: result.end,
    };
  }
}

function invalidArguments(tool: ToolName): ToolResult {
  return { status: 'error', code: 'INVALID_ARGUMENTS', message: `Invalid arguments for ${tool}` };
}
