/**
 * Memory Store
 * In-process KeyValueStore with lazy TTL expiry.
 * Values are encoded the way Redis encodes them, so reads match across drivers.
 */

import { KeyValueStore, StoredValue } from './store.types';
import { StoreUnavailableError } from './store.errors';

type MemoryEntry =
  | { kind: 'string'; value: Buffer; expiresAt?: number }
  | { kind: 'list'; items: string[]; expiresAt?: number };

const INTEGER_PATTERN = /^-?\d+$/;

export function encodeValue(value: StoredValue): Buffer {
  if (Buffer.isBuffer(value)) {
    return Buffer.from(value);
  }
  return Buffer.from(String(value), 'utf8');
}

export class MemoryStore implements KeyValueStore {
  private entries: Map<string, MemoryEntry>;

  constructor() {
    this.entries = new Map();
  }

  async set(key: string, value: StoredValue): Promise<void> {
    this.entries.set(key, { kind: 'string', value: encodeValue(value) });
  }

  async get(key: string): Promise<Buffer | null> {
    const entry = this.lookup(key);
    if (!entry) {
      return null;
    }
    if (entry.kind !== 'string') {
      throw wrongType(key);
    }
    return Buffer.from(entry.value);
  }

  async increment(key: string): Promise<number> {
    const entry = this.lookup(key);
    if (entry && entry.kind !== 'string') {
      throw wrongType(key);
    }

    const current = entry ? entry.value.toString('utf8') : '0';
    if (!INTEGER_PATTERN.test(current)) {
      throw new StoreUnavailableError(`Store increment failed for ${key}: value is not an integer`);
    }

    const next = parseInt(current, 10) + 1;
    // INCR keeps an existing expiry
    this.entries.set(key, {
      kind: 'string',
      value: Buffer.from(String(next), 'utf8'),
      expiresAt: entry?.expiresAt,
    });
    return next;
  }

  async appendToList(key: string, value: StoredValue): Promise<number> {
    const entry = this.lookup(key);
    if (!entry) {
      this.entries.set(key, { kind: 'list', items: [encodeValue(value).toString('utf8')] });
      return 1;
    }
    if (entry.kind !== 'list') {
      throw wrongType(key);
    }
    entry.items.push(encodeValue(value).toString('utf8'));
    return entry.items.length;
  }

  async readListRange(key: string, start: number, end: number): Promise<string[]> {
    const entry = this.lookup(key);
    if (!entry) {
      return [];
    }
    if (entry.kind !== 'list') {
      throw wrongType(key);
    }

    const length = entry.items.length;
    const from = Math.max(start < 0 ? length + start : start, 0);
    const to = Math.min(end < 0 ? length + end : end, length - 1);
    if (from > to) {
      return [];
    }
    return entry.items.slice(from, to + 1);
  }

  async setWithExpiry(key: string, value: StoredValue, ttlSeconds: number): Promise<void> {
    if (!Number.isInteger(ttlSeconds) || ttlSeconds <= 0) {
      throw new StoreUnavailableError(`Store setWithExpiry failed for ${key}: invalid expire time ${ttlSeconds}`);
    }
    this.entries.set(key, {
      kind: 'string',
      value: encodeValue(value),
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async flush(): Promise<void> {
    this.entries.clear();
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  private lookup(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== undefined && Date.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    return entry;
  }
}

function wrongType(key: string): StoreUnavailableError {
  return new StoreUnavailableError(`Store operation against ${key} holding the wrong kind of value`);
}
