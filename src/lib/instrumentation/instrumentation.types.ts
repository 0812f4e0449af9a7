/**
 * Instrumentation Types
 */

export type AsyncOperation<A extends unknown[], R> = (...args: A) => Promise<R>;

/**
 * List keys holding an operation's recorded inputs and outputs
 */
export interface HistoryKeys {
  inputs: string;
  outputs: string;
}

export interface CallRecord {
  input: string;
  output: string;
}

export interface CallHistory {
  operationName: string;
  count: number;
  calls: CallRecord[];
}

export type ReportSink = (line: string) => void;
