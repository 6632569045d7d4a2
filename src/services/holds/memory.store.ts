import { HoldRecord } from '../../types/booking';
import { HoldStore } from './hold.store';

/**
 * Process-local hold store for single-instance runs and tests. There is no
 * native key expiry here, so each read compares `expiresAt` with the clock and
 * drops stale records.
 */
export class InMemoryHoldStore implements HoldStore {
  private records = new Map<string, HoldRecord>();

  constructor(private now: () => number = Date.now) {}

  async setIfAbsent(key: string, record: HoldRecord, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.records.set(key, { ...record, expiresAt: this.now() + ttlMs });
    return true;
  }

  async get(key: string): Promise<HoldRecord | null> {
    return this.live(key);
  }

  async deleteIfToken(key: string, token: string): Promise<boolean> {
    const record = this.live(key);
    if (!record || record.token !== token) {
      return false;
    }
    this.records.delete(key);
    return true;
  }

  private live(key: string): HoldRecord | null {
    const record = this.records.get(key);
    if (!record) return null;
    if (record.expiresAt <= this.now()) {
      this.records.delete(key);
      return null;
    }
    return record;
  }
}
