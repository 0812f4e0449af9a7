/**
 * Call Tracking
 * Wrappers that count calls and record input/output history for an operation in the store
 */

import type { KeyValueStore } from '../store';
import type { AsyncOperation, HistoryKeys } from './instrumentation.types';

export function historyKeys(operationName: string): HistoryKeys {
  return {
    inputs: `${operationName}:inputs`,
    outputs: `${operationName}:outputs`,
  };
}

/**
 * Increment the operation's counter before every call
 */
export function countCalls<A extends unknown[], R>(
  store: KeyValueStore,
  operationName: string,
  operation: AsyncOperation<A, R>
): AsyncOperation<A, R> {
  return async (...args: A): Promise<R> => {
    await store.increment(operationName);
    return operation(...args);
  };
}

/**
 * Append the call's arguments before it runs and its result after it returns.
 * A call that throws leaves an input without an output.
 */
export function recordHistory<A extends unknown[], R>(
  store: KeyValueStore,
  operationName: string,
  operation: AsyncOperation<A, R>
): AsyncOperation<A, R> {
  const keys = historyKeys(operationName);

  return async (...args: A): Promise<R> => {
    await store.appendToList(keys.inputs, formatCallArguments(args));
    const output = await operation(...args);
    await store.appendToList(keys.outputs, String(output));
    return output;
  };
}

/**
 * Render an argument list in tuple notation: `()`, `('foo',)`, `('a', 1)`
 */
export function formatCallArguments(args: readonly unknown[]): string {
  const parts = args.map(formatArgument);
  if (parts.length === 1) {
    return `(${parts[0]},)`;
  }
  return `(${parts.join(', ')})`;
}

function formatArgument(value: unknown): string {
  if (typeof value === 'string') {
    return quoteText(value);
  }
  if (Buffer.isBuffer(value)) {
    return `b${quoteBytes(value)}`;
  }
  return String(value);
}

const NAMED_ESCAPES: Record<string, string> = {
  '\\': '\\\\',
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

// Single quotes unless the text holds a single quote and no double quote
function pickQuote(text: string): string {
  return text.includes("'") && !text.includes('"') ? '"' : "'";
}

function hexEscape(code: number): string {
  return `\\x${code.toString(16).padStart(2, '0')}`;
}

function quoteText(text: string): string {
  const quote = pickQuote(text);
  let body = '';
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    if (char in NAMED_ESCAPES) {
      body += NAMED_ESCAPES[char];
    } else if (char === quote) {
      body += `\\${char}`;
    } else if (code < 0x20 || (code >= 0x7f && code <= 0x9f)) {
      body += hexEscape(code);
    } else {
      body += char;
    }
  }
  return `${quote}${body}${quote}`;
}

function quoteBytes(bytes: Buffer): string {
  const quote = pickQuote(bytes.toString('latin1'));
  let body = '';
  for (const byte of bytes) {
    const char = String.fromCharCode(byte);
    if (char in NAMED_ESCAPES) {
      body += NAMED_ESCAPES[char];
    } else if (char === quote) {
      body += `\\${char}`;
    } else if (byte < 0x20 || byte > 0x7e) {
      body += hexEscape(byte);
    } else {
      body += char;
    }
  }
  return `${quote}${body}${quote}`;
}
