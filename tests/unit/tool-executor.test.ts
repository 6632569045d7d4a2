jest.mock('../../src/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

import { DateTime } from 'luxon';
import { ToolExecutor, toToolError } from '../../src/services/tools/executor';
import { CALENDAR_TOOLS } from '../../src/services/tools/definitions';
import { BookingService } from '../../src/services/booking.service';
import { SlotArbiter } from '../../src/services/slot-arbiter.service';
import { InMemoryHoldStore } from '../../src/services/holds/memory.store';
import { ConversationStore } from '../../src/services/conversation.service';
import { ServiceError } from '../../src/utils/errors';
import { FakeCalendar } from '../helpers/fake-calendar';
import { FakeRedis } from '../helpers/fake-redis';

const TZ = 'Europe/Athens';
const USER = 'user-1';

function call(name: string, args: unknown) {
  return {
    id: `call_${name}`,
    type: 'function' as const,
    function: { name, arguments: typeof args === 'string' ? args : JSON.stringify(args) },
  };
}

describe('ToolExecutor', () => {
  const now = DateTime.fromISO('2026-10-19T09:00:00', { zone: TZ });
  let store: InMemoryHoldStore;
  let calendar: FakeCalendar;
  let arbiter: SlotArbiter;
  let conversations: ConversationStore;
  let executor: ToolExecutor;

  beforeEach(() => {
    store = new InMemoryHoldStore(() => now.toMillis());
    calendar = new FakeCalendar(TZ, 2);
    arbiter = new SlotArbiter(store, calendar, { holdTtlSeconds: 1800, now: () => now.toMillis() });
    conversations = new ConversationStore(new FakeRedis(() => now.toMillis()).asClient(), 20);
    executor = new ToolExecutor(new BookingService(calendar, arbiter, () => now), arbiter, conversations);
  });

  it('should describe every tool it can run', () => {
    expect(CALENDAR_TOOLS.map((t) => t.function.name)).toEqual([
      'check_calendar_availability',
      'create_tattoo_booking',
      'find_customer_booking',
      'cancel_tattoo_booking',
      'reschedule_tattoo_booking',
    ]);
  });

  it('should reject unknown tools', async () => {
    expect(await executor.execute(call('delete_everything', {}), USER)).toEqual({
      status: 'error',
      code: 'UNKNOWN_TOOL',
      message: 'Unknown tool: delete_everything',
    });
  });

  it('should reject unparseable or incomplete arguments', async () => {
    const invalid = {
      status: 'error',
      code: 'INVALID_ARGUMENTS',
      message: 'Invalid arguments for check_calendar_availability',
    };

    expect(await executor.execute(call('check_calendar_availability', '{not json'), USER)).toEqual(invalid);
    expect(await executor.execute(call('check_calendar_availability', { end_date: '2026-10-21' }), USER)).toEqual(invalid);
  });

  describe('check_calendar_availability', () => {
    it('should list and hold slots for the customer', async () => {
      const result = await executor.execute(
        call('check_calendar_availability', { start_date: '2026-10-20', end_date: null, tattoo_price: null }),
        USER
      );

      expect(result).toMatchObject({
        status: 'success',
        message: 'Διαθέσιμες ώρες:\n\n📅 Τρίτη, 20 Οκτωβρίου:\n   ⏰ 11:00, 12:00, 13:00',
        duration_display: '1 ώρα',
      });
      const draft = (await conversations.getContext(USER)).draft;
      expect(draft?.holds.map((h) => h.slotKey)).toEqual([
        'hold:2026-10-20T11:00',
        'hold:2026-10-20T12:00',
        'hold:2026-10-20T13:00',
      ]);
    });

    it('should release holds from an earlier search', async () => {
      await executor.execute(call('check_calendar_availability', { start_date: '2026-10-20' }), USER);
      await executor.execute(call('check_calendar_availability', { start_date: '2026-10-21' }), USER);

      expect(await store.get('hold:2026-10-20T11:00')).toBeNull();
      expect(await store.get('hold:2026-10-21T11:00')).not.toBeNull();
    });

    it('should report validation problems to the model', async () => {
      expect(await executor.execute(call('check_calendar_availability', { start_date: '2026-10-01' }), USER)).toEqual({
        status: 'error',
        code: 'VALIDATION_ERROR',
        message: 'Date cannot be in the past: 2026-10-01',
      });
    });
  });

  describe('create_tattoo_booking', () => {
    const args = {
      customer_name: 'Μαρία',
      customer_phone: '6941234567',
      date: '2026-10-20',
      time: '12:00',
      tattoo_price: 150,
    };

    it('should book, clear the draft and release other holds', async () => {
      await executor.execute(call('check_calendar_availability', { start_date: '2026-10-20' }), USER);

      const result = await executor.execute(call('create_tattoo_booking', args), USER);

      expect(result).toEqual({
        status: 'success',
        message: 'Το ραντεβού δημιουργήθηκε επιτυχώς!',
        event_id: 'evt1',
        start: '2026-10-20T12:00:00+03:00',
        end: '2026-10-20T13:30:00+03:00',
      });
      expect((await conversations.getContext(USER)).draft).toBeNull();
      expect(await store.get('hold:2026-10-20T11:00')).toBeNull();
    });

    it('should explain a slot someone else is holding', async () => {
      await arbiter.requestHold('hold:2026-10-20T12:00', 'user-2');

      expect(await executor.execute(call('create_tattoo_booking', args), USER)).toEqual({
        status: 'error',
        code: 'SLOT_UNAVAILABLE',
        message: 'Η ώρα αυτή δεν είναι πλέον διαθέσιμη. Πρότεινε στον πελάτη να ελέγξουμε άλλες ώρες.',
      });
    });
  });

  describe('find and cancel', () => {
    it('should report when no booking matches', async () => {
      expect(await executor.execute(call('find_customer_booking', { phone_number: '6941234567' }), USER)).toEqual({
        status: 'not_found',
        message: 'Δεν βρέθηκαν ραντεβού με αυτό το τηλέφωνο.',
      });
    });

    it('should list matching bookings', async () => {
      calendar.add({
        id: 'evt_a',
        title: 'Tattoo - Μαρία',
        start: '2026-10-21T14:00:00+03:00',
        end: '2026-10-21T15:00:00+03:00',
        description: 'Τηλέφωνο: 6941234567',
      });

      expect(await executor.execute(call('find_customer_booking', { phone_number: '+30 6941234567' }), USER)).toEqual({
        status: 'success',
        message: 'Βρέθηκαν 1 ραντεβού.',
        count: 1,
        bookings: [
          { event_id: 'evt_a', title: 'Tattoo - Μαρία', start: '2026-10-21T14:00:00+03:00', end: '2026-10-21T15:00:00+03:00' },
        ],
      });
    });

    it('should cancel by event id', async () => {
      calendar.add({ id: 'evt_a', title: 'Tattoo - Μαρία', start: '2026-10-21T14:00:00+03:00', end: '2026-10-21T15:00:00+03:00' });

      expect(await executor.execute(call('cancel_tattoo_booking', { event_id: 'evt_a' }), USER)).toEqual({
        status: 'success',
        message: 'Το ραντεβού ακυρώθηκε επιτυχώς.',
      });
      expect(calendar.events).toEqual([]);
    });

    it('should refuse malformed event ids', async () => {
      expect(await executor.execute(call('cancel_tattoo_booking', { event_id: 'bad-id' }), USER)).toEqual({
        status: 'error',
        code: 'VALIDATION_ERROR',
        message: 'Invalid event ID format: bad-id',
      });
    });
  });

  it('should move a booking', async () => {
    calendar.add({ id: 'evt_a', title: 'Tattoo - Μαρία', start: '2026-10-21T14:00:00+03:00', end: '2026-10-21T15:00:00+03:00' });

    const result = await executor.execute(
      call('reschedule_tattoo_booking', { event_id: 'evt_a', new_date: '2026-10-23', new_time: '16:00' }),
      USER
    );

    expect(result).toEqual({
      status: 'success',
      message: 'Το ραντεβού μεταφέρθηκε επιτυχώς!',
      event_id: 'evt1',
      start: '2026-10-23T16:00:00+03:00',
      end: '2026-10-23T17:00:00+03:00',
    });
  });
});

describe('toToolError', () => {
  it('should hide service failures behind a retry message', () => {
    expect(toToolError(new ServiceError('GoogleCalendar', 'listEvents', new Error('socket hang up')))).toEqual({
      status: 'error',
      code: 'SERVICE_UNAVAILABLE',
      message: 'Το ημερολόγιο δεν είναι διαθέσιμο αυτή τη στιγμή. Ζήτησε από τον πελάτη να δοκιμάσει ξανά σε λίγο.',
    });
  });

  it('should treat anything else as internal', () => {
    expect(toToolError(new Error('boom'))).toEqual({
      status: 'error',
      code: 'INTERNAL_ERROR',
      message: 'Κάτι πήγε στραβά με το ημερολόγιο.',
    });
  });
});
