import { DateTime } from 'luxon';

export function toIso(dt: DateTime): string {
  const iso = dt.toISO({ suppressMilliseconds: true });
  if (iso === null) {
    throw new Error(`Invalid DateTime: ${dt.invalidReason ?? 'unknown reason'}`);
  }
  return iso;
}

/**
 * Parses an ISO timestamp into the studio zone. An explicit offset is honoured;
 * a timestamp without one is read as studio-local time.
 */
export function parseIsoInZone(iso: string, timezone: string): DateTime {
  const dt = DateTime.fromISO(iso, { zone: timezone });
  if (!dt.isValid) {
    throw new Error(`Invalid ISO timestamp: ${iso}`);
  }
  return dt;
}

export function slotKeyFor(start: DateTime): string {
  return `hold:${start.toFormat("yyyy-MM-dd'T'HH:mm")}`;
}
