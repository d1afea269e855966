/**
 * In-memory stand-in for the leaderboard's Redis commands. TTLs are
 * recorded, not enforced; `expireAll()` simulates them lapsing.
 */

import type { LeaderboardRedis } from '../../src/cache/redis';

export class FakeRedis implements LeaderboardRedis {
  readonly strings = new Map<string, string>();
  readonly zsets = new Map<string, Map<string, number>>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly ttls = new Map<string, number>();
  /** When true every command rejects, like a dropped connection. */
  down = false;

  private async command(): Promise<void> {
    await Promise.resolve();
    if (this.down) {
      throw new Error('Connection is closed.');
    }
  }

  expireAll(): void {
    this.strings.clear();
    this.zsets.clear();
    this.hashes.clear();
    this.ttls.clear();
  }

  async get(key: string): Promise<string | null> {
    await this.command();
    return this.strings.get(key) ?? null;
  }

  async setex(key: string, seconds: number, value: string): Promise<'OK'> {
    await this.command();
    this.strings.set(key, value);
    this.ttls.set(key, seconds);
    return 'OK';
  }

  async zadd(key: string, score: number, member: string): Promise<number> {
    await this.command();
    const zset = this.zsets.get(key) ?? new Map<string, number>();
    const added = zset.has(member) ? 0 : 1;
    zset.set(member, score);
    this.zsets.set(key, zset);
    return added;
  }

  async zrevrangeWithScores(key: string, start: number, stop: number): Promise<string[]> {
    await this.command();
    // ZREVRANGE: score descending, equal scores in reverse member order.
    const sorted = [...(this.zsets.get(key) ?? new Map<string, number>())].sort(
      ([ma, sa], [mb, sb]) => sb - sa || (ma < mb ? 1 : ma > mb ? -1 : 0)
    );
    return sorted.slice(start, stop + 1).flatMap(([member, score]) => [member, String(score)]);
  }

  async zrangebyscore(key: string, min: string, max: string): Promise<string[]> {
    await this.command();
    const lo = Number(min);
    const hi = Number(max);
    return [...(this.zsets.get(key) ?? new Map<string, number>())]
      .filter(([, score]) => score >= lo && score <= hi)
      .sort(([ma, sa], [mb, sb]) => sa - sb || (ma < mb ? -1 : ma > mb ? 1 : 0))
      .map(([member]) => member);
  }

  async hset(key: string, field: string, value: string): Promise<number> {
    await this.command();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    const added = hash.has(field) ? 0 : 1;
    hash.set(field, value);
    this.hashes.set(key, hash);
    return added;
  }

  async hmget(key: string, fields: string[]): Promise<(string | null)[]> {
    await this.command();
    const hash = this.hashes.get(key);
    return fields.map((field) => hash?.get(field) ?? null);
  }

  async expire(key: string, seconds: number): Promise<number> {
    await this.command();
    const exists = this.strings.has(key) || this.zsets.has(key) || this.hashes.has(key);
    if (exists) this.ttls.set(key, seconds);
    return exists ? 1 : 0;
  }

  async del(keys: string[]): Promise<number> {
    await this.command();
    let removed = 0;
    for (const key of keys) {
      if (this.strings.delete(key) || this.zsets.delete(key) || this.hashes.delete(key)) {
        removed += 1;
      }
      this.ttls.delete(key);
    }
    return removed;
  }
}
