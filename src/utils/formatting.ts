import { DateTime } from 'luxon';
import { AvailableSlot, BookingDetails } from '../types/booking';

const DAYS_EL = ['Δευτέρα', 'Τρίτη', 'Τετάρτη', 'Πέμπτη', 'Παρασκευή', 'Σάββατο', 'Κυριακή'];
const MONTHS_EL = [
  'Ιανουαρίου', 'Φεβρουαρίου', 'Μαρτίου', 'Απριλίου', 'Μαΐου', 'Ιουνίου',
  'Ιουλίου', 'Αυγούστου', 'Σεπτεμβρίου', 'Οκτωβρίου', 'Νοεμβρίου', 'Δεκεμβρίου',
];
const TIMES_PER_DAY = 3;

const PRICE_LINE = 'Εκτιμώμενη τιμή:';
const DURATION_LINE = 'Διάρκεια:';

/** "1 ώρα", "2 ώρες", "45 λεπτά", "1 ώρα και 30 λεπτά" */
export function formatDuration(durationHours: number): string {
  const totalMinutes = Math.floor(durationHours * 60 + 1e-9);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  if (hours === 0) return `${minutes} λεπτά`;
  const hoursText = hours === 1 ? '1 ώρα' : `${hours} ώρες`;
  return minutes === 0 ? hoursText : `${hoursText} και ${minutes} λεπτά`;
}

export function formatAvailableSlots(slots: AvailableSlot[]): string {
  if (slots.length === 0) {
    return 'Δυστυχώς δεν υπάρχουν διαθέσιμες ώρες για τις ημερομηνίες που ζητήσατε.';
  }

  const byDate = new Map<string, string[]>();
  for (const slot of slots) {
    const times = byDate.get(slot.date) ?? [];
    times.push(slot.startTime);
    byDate.set(slot.date, times);
  }

  const blocks: string[] = [];
  for (const [date, times] of byDate) {
    const day = DateTime.fromISO(date);
    let block = `📅 ${DAYS_EL[day.weekday - 1]}, ${day.day} ${MONTHS_EL[day.month - 1]}:\n   ⏰ ${times.slice(0, TIMES_PER_DAY).join(', ')}`;
    if (times.length > TIMES_PER_DAY) {
      block += ` και άλλες ${times.length - TIMES_PER_DAY}`;
    }
    blocks.push(block);
  }

  return `Διαθέσιμες ώρες:\n\n${blocks.join('\n\n')}`;
}

export function describeBooking(details: BookingDetails): string {
  const lines = [`Πελάτης: ${details.customerName}`, `Τηλέφωνο: ${details.customerPhone}`];
  if (details.tattooDescription) {
    lines.push(`Τατουάζ: ${details.tattooDescription}`);
  }
  if (details.price !== undefined) {
    lines.push(`${PRICE_LINE} ${details.price}€`);
  }
  lines.push(`${DURATION_LINE} ${formatDuration(details.durationHours)}`);
  return lines.join('\n');
}

/** Rewrites the price and duration lines of an existing event description. */
export function updateBookingDescription(description: string | undefined, price: number, durationHours: number): string {
  const priceLine = `${PRICE_LINE} ${price}€`;
  const durationLine = `${DURATION_LINE} ${formatDuration(durationHours)}`;
  let hasPrice = false;
  let hasDuration = false;

  const lines = (description ?? '')
    .split('\n')
    .filter((line) => line.length > 0)
    .map((line) => {
      if (line.startsWith(PRICE_LINE)) {
        hasPrice = true;
        return priceLine;
      }
      if (line.startsWith(DURATION_LINE)) {
        hasDuration = true;
        return durationLine;
      }
      return line;
    });

  if (!hasPrice) lines.push(priceLine);
  if (!hasDuration) lines.push(durationLine);
  return lines.join('\n');
}
