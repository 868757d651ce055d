import type { Redis } from 'ioredis';

type Value = string | Map<string, string> | string[] | Map<string, number>;

type ExecReply = [Error | null, unknown][];

interface QueuedCommand {
  run: () => unknown;
}

/**
 * In-process stand-in for the subset of ioredis the job store and queue
 * broker use. Supports WATCH/MULTI/EXEC with per-key versions, so a write
 * made between WATCH and EXEC aborts the transaction like Redis does.
 */
export class FakeRedis {
  readonly status = 'ready';
  readonly published: Array<{ channel: string; message: string }> = [];
  /** Fail every command with this error while set. */
  failWith: Error | null = null;
  /** Runs right before a transaction commits; lets a test interleave a write or a failure. */
  beforeExec: (() => void) | null = null;

  private readonly data = new Map<string, Value>();
  private readonly versions = new Map<string, number>();
  private watched = new Map<string, number>();

  asRedis(): Redis {
    return this as unknown as Redis;
  }

  // connection

  async ping(): Promise<string> {
    this.guard();
    return 'PONG';
  }

  async quit(): Promise<string> {
    return 'OK';
  }

  disconnect(): void {
    return;
  }

  // transactions

  async watch(...keys: string[]): Promise<string> {
    this.guard();
    for (const key of keys) {
      this.watched.set(key, this.version(key));
    }
    return 'OK';
  }

  async unwatch(): Promise<string> {
    this.watched = new Map();
    return 'OK';
  }

  multi(): FakeTransaction {
    return new FakeTransaction(this);
  }

  async commit(commands: QueuedCommand[]): Promise<ExecReply | null> {
    const hook = this.beforeExec;
    this.beforeExec = null;
    hook?.();
    this.guard();

    const watched = this.watched;
    this.watched = new Map();
    for (const [key, version] of watched) {
      if (this.version(key) !== version) {
        return null;
      }
    }

    return commands.map((command): [Error | null, unknown] => {
      try {
        return [null, command.run()];
      } catch (error) {
        return [error instanceof Error ? error : new Error(String(error)), null];
      }
    });
  }

  // strings

  async get(key: string): Promise<string | null> {
    this.guard();
    return this.getSync(key);
  }

  async set(key: string, value: string): Promise<string> {
    this.guard();
    return this.setSync(key, value);
  }

  async del(...keys: string[]): Promise<number> {
    this.guard();
    return this.delSync(keys);
  }

  getSync(key: string): string | null {
    const value = this.data.get(key);
    return typeof value === 'string' ? value : null;
  }

  setSync(key: string, value: string): string {
    this.write(key, value);
    return 'OK';
  }

  delSync(keys: string[]): number {
    let removed = 0;
    for (const key of keys) {
      if (this.data.delete(key)) {
        this.touch(key);
        removed += 1;
      }
    }
    return removed;
  }

  // hashes

  async hgetall(key: string): Promise<Record<string, string>> {
    this.guard();
    return Object.fromEntries(this.hash(key) ?? new Map<string, string>());
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.guard();
    return this.hash(key)?.get(field) ?? null;
  }

  async hset(key: string, values: Record<string, string>): Promise<number> {
    this.guard();
    return this.hsetSync(key, values);
  }

  hsetSync(key: string, values: Record<string, string>): number {
    const hash = this.hash(key) ?? new Map<string, string>();
    let added = 0;
    for (const [field, value] of Object.entries(values)) {
      if (!hash.has(field)) {
        added += 1;
      }
      hash.set(field, value);
    }
    this.write(key, hash);
    return added;
  }

  hdelSync(key: string, fields: string[]): number {
    const hash = this.hash(key);
    if (!hash) {
      return 0;
    }
    let removed = 0;
    for (const field of fields) {
      if (hash.delete(field)) {
        removed += 1;
      }
    }
    this.touch(key);
    return removed;
  }

  // lists

  async lpush(key: string, ...values: string[]): Promise<number> {
    this.guard();
    return this.lpushSync(key, values);
  }

  lpushSync(key: string, values: string[]): number {
    const list = this.list(key);
    for (const value of values) {
      list.unshift(value);
    }
    this.write(key, list);
    return list.length;
  }

  async llen(key: string): Promise<number> {
    this.guard();
    return this.list(key).length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.guard();
    const list = this.list(key);
    return list.slice(start, stop < 0 ? list.length + stop + 1 : stop + 1);
  }

  async lrem(key: string, count: number, value: string): Promise<number> {
    this.guard();
    return this.lremSync(key, count, value);
  }

  lremSync(key: string, count: number, value: string): number {
    const list = this.list(key);
    let removed = 0;
    for (let index = 0; index < list.length && (count === 0 || removed < count); ) {
      if (list[index] === value) {
        list.splice(index, 1);
        removed += 1;
      } else {
        index += 1;
      }
    }
    this.write(key, list);
    return removed;
  }

  async lmove(source: string, destination: string, from: 'LEFT' | 'RIGHT', to: 'LEFT' | 'RIGHT'): Promise<string | null> {
    this.guard();
    const sourceList = this.list(source);
    const value = from === 'LEFT' ? sourceList.shift() : sourceList.pop();
    if (value === undefined) {
      return null;
    }
    this.write(source, sourceList);
    const destinationList = this.list(destination);
    if (to === 'LEFT') {
      destinationList.unshift(value);
    } else {
      destinationList.push(value);
    }
    this.write(destination, destinationList);
    return value;
  }

  /** Waits at most a few milliseconds on an empty source before resolving null. */
  async blmove(
    source: string,
    destination: string,
    from: 'LEFT' | 'RIGHT',
    to: 'LEFT' | 'RIGHT',
    timeoutSeconds: number
  ): Promise<string | null> {
    const moved = await this.lmove(source, destination, from, to);
    if (moved !== null) {
      return moved;
    }
    await new Promise((resolve) => setTimeout(resolve, Math.min(timeoutSeconds * 1000, 5)));
    return this.lmove(source, destination, from, to);
  }

  // sorted sets

  async zadd(key: string, ...args: Array<string | number>): Promise<number> {
    this.guard();
    return this.zaddSync(key, args);
  }

  zaddSync(key: string, args: Array<string | number>): number {
    const onlyNew = args[0] === 'NX';
    const rest = onlyNew ? args.slice(1) : args;
    const zset = this.zset(key);
    let added = 0;
    for (let index = 0; index + 1 < rest.length; index += 2) {
      const score = Number(rest[index]);
      const member = String(rest[index + 1]);
      const exists = zset.has(member);
      if (exists && onlyNew) {
        continue;
      }
      if (!exists) {
        added += 1;
      }
      zset.set(member, score);
    }
    this.write(key, zset);
    return added;
  }

  async zcard(key: string): Promise<number> {
    this.guard();
    return this.zset(key).size;
  }

  async zrange(key: string, start: number, stop: number): Promise<string[]> {
    this.guard();
    const members = this.sortedMembers(key).map(([member]) => member);
    return members.slice(start, stop < 0 ? members.length + stop + 1 : stop + 1);
  }

  async zrangebyscore(key: string, min: number | string, max: number | string): Promise<string[]> {
    this.guard();
    const low = min === '-inf' ? Number.NEGATIVE_INFINITY : Number(min);
    const high = max === '+inf' ? Number.POSITIVE_INFINITY : Number(max);
    return this.sortedMembers(key)
      .filter(([, score]) => score >= low && score <= high)
      .map(([member]) => member);
  }

  async zrem(key: string, ...members: string[]): Promise<number> {
    this.guard();
    return this.zremSync(key, members);
  }

  zremSync(key: string, members: string[]): number {
    const zset = this.zset(key);
    let removed = 0;
    for (const member of members) {
      if (zset.delete(member)) {
        removed += 1;
      }
    }
    this.write(key, zset);
    return removed;
  }

  async zscore(key: string, member: string): Promise<string | null> {
    this.guard();
    const score = this.zset(key).get(member);
    return score === undefined ? null : String(score);
  }

  // pub/sub

  async publish(channel: string, message: string): Promise<number> {
    this.guard();
    return this.publishSync(channel, message);
  }

  publishSync(channel: string, message: string): number {
    this.published.push({ channel, message });
    return 0;
  }

  // internals

  keys(): string[] {
    return [...this.data.keys()];
  }

  private guard(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }

  private version(key: string): number {
    return this.versions.get(key) ?? 0;
  }

  private touch(key: string): void {
    this.versions.set(key, this.version(key) + 1);
  }

  private write(key: string, value: Value): void {
    const empty =
      (value instanceof Map && value.size === 0) || (Array.isArray(value) && value.length === 0);
    if (empty) {
      this.data.delete(key);
    } else {
      this.data.set(key, value);
    }
    this.touch(key);
  }

  private hash(key: string): Map<string, string> | undefined {
    const value = this.data.get(key);
    if (value === undefined) {
      return undefined;
    }
    if (value instanceof Map && isStringMap(value)) {
      return value;
    }
    throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
  }

  private list(key: string): string[] {
    const value = this.data.get(key);
    if (value === undefined) {
      return [];
    }
    if (Array.isArray(value)) {
      return value;
    }
    throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
  }

  private zset(key: string): Map<string, number> {
    const value = this.data.get(key);
    if (value === undefined) {
      return new Map();
    }
    if (value instanceof Map && isNumberMap(value)) {
      return value;
    }
    throw new Error('WRONGTYPE Operation against a key holding the wrong kind of value');
  }

  private sortedMembers(key: string): Array<[string, number]> {
    return [...this.zset(key).entries()].sort((a, b) => a[1] - b[1] || a[0].localeCompare(b[0]));
  }
}

function isStringMap(value: Map<string, string> | Map<string, number>): value is Map<string, string> {
  for (const entry of value.values()) {
    return typeof entry === 'string';
  }
  return true;
}

function isNumberMap(value: Map<string, string> | Map<string, number>): value is Map<string, number> {
  for (const entry of value.values()) {
    return typeof entry === 'number';
  }
  return true;
}

/** Queues commands and applies them atomically on exec. */
export class FakeTransaction {
  private readonly commands: QueuedCommand[] = [];

  constructor(private readonly redis: FakeRedis) {}

  hset(key: string, values: Record<string, string>): this {
    return this.queue(() => this.redis.hsetSync(key, values));
  }

  hdel(key: string, ...fields: string[]): this {
    return this.queue(() => this.redis.hdelSync(key, fields));
  }

  set(key: string, value: string): this {
    return this.queue(() => this.redis.setSync(key, value));
  }

  del(...keys: string[]): this {
    return this.queue(() => this.redis.delSync(keys));
  }

  zadd(key: string, ...args: Array<string | number>): this {
    return this.queue(() => this.redis.zaddSync(key, args));
  }

  zrem(key: string, ...members: string[]): this {
    return this.queue(() => this.redis.zremSync(key, members));
  }

  lpush(key: string, ...values: string[]): this {
    return this.queue(() => this.redis.lpushSync(key, values));
  }

  lrem(key: string, count: number, value: string): this {
    return this.queue(() => this.redis.lremSync(key, count, value));
  }

  publish(channel: string, message: string): this {
    return this.queue(() => this.redis.publishSync(channel, message));
  }

  exec(): Promise<ExecReply | null> {
    return this.redis.commit(this.commands);
  }

  private queue(run: () => unknown): this {
    this.commands.push({ run });
    return this;
  }
}
