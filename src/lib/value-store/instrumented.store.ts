/**
 * Instrumented Store
 * Stores scalars under generated identifiers and counts/records every store() call
 */

import { randomUUID } from 'crypto';
import { env } from '../../config/env';
import { DecodeError, InvalidValueError, KeyValueStore, StoredValue } from '../store';
import { AsyncOperation, countCalls, recordHistory } from '../instrumentation';

export interface InstrumentedStoreConfig {
  store: KeyValueStore;
  operationName?: string;
  flushOnInit?: boolean;
  generateId?: () => string;
}

export type Decoder<T> = (raw: Buffer) => T;

const INTEGER_PATTERN = /^[+-]?\d+$/;
const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

export class InstrumentedStore {
  readonly operationName: string;
  private readonly backend: KeyValueStore;
  private readonly flushOnInit: boolean;
  private readonly generateId: () => string;
  private readonly trackedStore: AsyncOperation<[StoredValue], string>;

  constructor(config: InstrumentedStoreConfig) {
    this.backend = config.store;
    this.operationName = config.operationName ?? env.STORE_OPERATION_NAME;
    this.flushOnInit = config.flushOnInit ?? env.FLUSH_ON_INIT;
    this.generateId = config.generateId ?? randomUUID;

    // Counter first, then history around the body
    this.trackedStore = countCalls(
      this.backend,
      this.operationName,
      recordHistory(this.backend, this.operationName, (value: StoredValue) => this.persist(value))
    );
  }

  /**
   * Start from an empty database when configured to
   */
  async init(): Promise<void> {
    if (this.flushOnInit) {
      console.warn(`InstrumentedStore: flushing store for ${this.operationName}`);
      await this.backend.flush();
    }
  }

  /**
   * Persist a value under a fresh identifier and return the identifier
   */
  async store(value: StoredValue): Promise<string> {
    if (typeof value === 'number' && !Number.isFinite(value)) {
      throw new InvalidValueError(`Cannot store non-finite number ${value}`);
    }
    return this.trackedStore(value);
  }

  retrieve(identifier: string): Promise<Buffer | null>;
  retrieve<T>(identifier: string, decode: Decoder<T>): Promise<T | null>;
  async retrieve<T>(identifier: string, decode?: Decoder<T>): Promise<Buffer | T | null> {
    const raw = await this.backend.get(identifier);
    if (raw === null) {
      return null;
    }
    return decode ? decode(raw) : raw;
  }

  async retrieveAsText(identifier: string): Promise<string | null> {
    return this.retrieve(identifier, (raw) => raw.toString('utf8'));
  }

  async retrieveAsInteger(identifier: string): Promise<number | null> {
    return this.retrieve(identifier, (raw) => {
      const text = raw.toString('utf8').trim();
      if (!INTEGER_PATTERN.test(text)) {
        throw new DecodeError(identifier, text, 'integer');
      }
      const value = parseInt(text, 10);
      if (!Number.isSafeInteger(value)) {
        throw new DecodeError(identifier, text, 'safe integer (use retrieveAsBigInt)');
      }
      return value;
    });
  }

  /**
   * Exact integer decoding for values beyond Number.MAX_SAFE_INTEGER
   */
  async retrieveAsBigInt(identifier: string): Promise<bigint | null> {
    return this.retrieve(identifier, (raw) => {
      const text = raw.toString('utf8').trim();
      if (!INTEGER_PATTERN.test(text)) {
        throw new DecodeError(identifier, text, 'integer');
      }
      return BigInt(text);
    });
  }

  async retrieveAsFloat(identifier: string): Promise<number | null> {
    return this.retrieve(identifier, (raw) => {
      const text = raw.toString('utf8').trim();
      if (!FLOAT_PATTERN.test(text)) {
        throw new DecodeError(identifier, text, 'number');
      }
      return parseFloat(text);
    });
  }

  /**
   * Calls recorded so far for this store's operation
   */
  async callCount(): Promise<number> {
    const count = await this.retrieveAsInteger(this.operationName);
    return count ?? 0;
  }

  private async persist(value: StoredValue): Promise<string> {
    const identifier = this.generateId();
    await this.backend.set(identifier, value);
    return identifier;
  }
}
