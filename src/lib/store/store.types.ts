/**
 * Store Types
 * Store protocol consumed by the instrumentation and caching layer
 */

/**
 * Scalar accepted by the value store: text, bytes, integer or float
 */
export type StoredValue = string | Buffer | number;

/**
 * Primitive operations of the external key-value store.
 * Each primitive is expected to be atomic with respect to concurrent callers.
 */
export interface KeyValueStore {
  set(key: string, value: StoredValue): Promise<void>;
  get(key: string): Promise<Buffer | null>;
  increment(key: string): Promise<number>;
  appendToList(key: string, value: StoredValue): Promise<number>;
  /** Inclusive range; negative indexes count from the tail */
  readListRange(key: string, start: number, end: number): Promise<string[]>;
  setWithExpiry(key: string, value: StoredValue, ttlSeconds: number): Promise<void>;
  flush(): Promise<void>;
  close(): Promise<void>;
}

/**
 * A store handle plus the teardown for whatever connection backs it
 */
export interface StoreHandle {
  store: KeyValueStore;
  shutdown: () => Promise<void>;
}
