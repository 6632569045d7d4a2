import { RedisClient } from '../../config/redis';
import { HoldRecord } from '../../types/booking';
import { HoldStore, parseHoldRecord } from './hold.store';

const COMPARE_AND_DELETE = `
local raw = redis.call('GET', KEYS[1])
if not raw then return 0 end
local ok, record = pcall(cjson.decode, raw)
if ok and record.token == ARGV[1] then
  return redis.call('DEL', KEYS[1])
end
return 0
`;

/** Expiry is left to Redis (`PX`); nothing sweeps. */
export class RedisHoldStore implements HoldStore {
  constructor(private redis: RedisClient) {}

  async setIfAbsent(key: string, record: HoldRecord, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(key, JSON.stringify(record), { NX: true, PX: ttlMs });
    return result === 'OK';
  }

  async get(key: string): Promise<HoldRecord | null> {
    return parseHoldRecord(await this.redis.get(key));
  }

  async deleteIfToken(key: string, token: string): Promise<boolean> {
    const deleted = await this.redis.eval(COMPARE_AND_DELETE, { keys: [key], arguments: [token] });
    return Number(deleted) === 1;
  }
}
