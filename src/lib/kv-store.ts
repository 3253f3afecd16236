import type Redis from 'ioredis';
import type { z } from 'zod';
import { CorruptRecordError } from './errors';

export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Minimal key-value contract behind the draft store and the extraction cache.
 * Writes are per key; no operation spans keys atomically.
 */
export interface KeyValueStore<T> {
  /** Stores the value only if the key is absent. Resolves false if it exists. */
  insert(key: string, value: T): Promise<boolean>;
  get(key: string): Promise<T | null>;
  /** Replaces an existing value. Resolves false if the key is absent. */
  update(key: string, value: T): Promise<boolean>;
  list(): Promise<T[]>;
  size(): Promise<number>;
  /** Removes every value and resolves with how many were removed. */
  clear(): Promise<number>;
}

function decode<T>(schema: RecordSchema<T>, key: string, raw: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new CorruptRecordError(key, error instanceof Error ? error.message : 'invalid JSON');
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new CorruptRecordError(key, result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}

/**
 * Stores each value as a JSON string under `<namespace>:<key>` and tracks the
 * keys of the namespace in the set `index:<namespace>`.
 */
export class RedisKeyValueStore<T> implements KeyValueStore<T> {
  private readonly indexKey: string;

  constructor(
    private readonly client: Redis,
    private readonly namespace: string,
    private readonly schema: RecordSchema<T>
  ) {
    this.indexKey = `index:${namespace}`;
  }

  private keyFor(key: string): string {
    return `${this.namespace}:${key}`;
  }

  async insert(key: string, value: T): Promise<boolean> {
    // SET NX keeps concurrent inserts for the same key from overwriting each other
    const created = await this.client.set(this.keyFor(key), JSON.stringify(value), 'NX');
    if (created !== 'OK') {
      return false;
    }
    await this.client.sadd(this.indexKey, key);
    return true;
  }

  async get(key: string): Promise<T | null> {
    const raw = await this.client.get(this.keyFor(key));
    return raw === null ? null : decode(this.schema, this.keyFor(key), raw);
  }

  async update(key: string, value: T): Promise<boolean> {
    const updated = await this.client.set(this.keyFor(key), JSON.stringify(value), 'XX');
    return updated === 'OK';
  }

  async list(): Promise<T[]> {
    const keys = await this.client.smembers(this.indexKey);
    if (keys.length === 0) {
      return [];
    }

    const storageKeys = keys.map((key) => this.keyFor(key));
    const values = await this.client.mget(...storageKeys);
    const records: T[] = [];
    values.forEach((raw, index) => {
      // Index entries can outlive their value if a delete was interrupted
      if (raw !== null) {
        records.push(decode(this.schema, storageKeys[index], raw));
      }
    });
    return records;
  }

  async size(): Promise<number> {
    return this.client.scard(this.indexKey);
  }

  async clear(): Promise<number> {
    const keys = await this.client.smembers(this.indexKey);
    const removed = keys.length > 0 ? await this.client.del(...keys.map((key) => this.keyFor(key))) : 0;
    await this.client.del(this.indexKey);
    return removed;
  }
}

/**
 * Process-local store. Values are copied on the way in and out so callers
 * never share references with the stored state.
 */
export class MemoryKeyValueStore<T> implements KeyValueStore<T> {
  private readonly entries = new Map<string, T>();

  async insert(key: string, value: T): Promise<boolean> {
    if (this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, structuredClone(value));
    return true;
  }

  async get(key: string): Promise<T | null> {
    const value = this.entries.get(key);
    return value === undefined ? null : structuredClone(value);
  }

  async update(key: string, value: T): Promise<boolean> {
    if (!this.entries.has(key)) {
      return false;
    }
    this.entries.set(key, structuredClone(value));
    return true;
  }

  async list(): Promise<T[]> {
    return Array.from(this.entries.values(), (value) => structuredClone(value));
  }

  async size(): Promise<number> {
    return this.entries.size;
  }

  async clear(): Promise<number> {
    const removed = this.entries.size;
    this.entries.clear();
    return removed;
  }
}
