import { HoldRecord } from '../../types/booking';

/**
 * Storage for short-lived slot holds. `setIfAbsent` is the only way a hold is
 * created and must be atomic: of two concurrent writers for the same key,
 * exactly one sees `true`.
 */
export interface HoldStore {
  setIfAbsent(key: string, record: HoldRecord, ttlMs: number): Promise<boolean>;
  get(key: string): Promise<HoldRecord | null>;
  /** Deletes the hold only if it still carries `token`. */
  deleteIfToken(key: string, token: string): Promise<boolean>;
}

export function parseHoldRecord(raw: string | null): HoldRecord | null {
  if (!raw) return null;
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === 'object' &&
      value !== null &&
      'token' in value &&
      'holder' in value &&
      'slotKey' in value &&
      'createdAt' in value &&
      'expiresAt' in value &&
      typeof value.token === 'string' &&
      typeof value.holder === 'string' &&
      typeof value.slotKey === 'string' &&
      typeof value.createdAt === 'number' &&
      typeof value.expiresAt === 'number'
    ) {
      return {
        token: value.token,
        holder: value.holder,
        slotKey: value.slotKey,
        createdAt: value.createdAt,
        expiresAt: value.expiresAt,
      };
    }
  } catch {
    return null;
  }
  return null;
}
