/**
 * Call History Reporter
 * Replays an operation's recorded calls from the store as an ordered report
 */

import type { KeyValueStore } from '../store';
import { historyKeys } from './call-tracking';
import type { CallHistory, CallRecord, ReportSink } from './instrumentation.types';

export interface CallHistoryReporterConfig {
  store: KeyValueStore;
  sink?: ReportSink;
}

export class CallHistoryReporter {
  private readonly store: KeyValueStore;
  private readonly sink: ReportSink;

  constructor(config: CallHistoryReporterConfig) {
    this.store = config.store;
    this.sink = config.sink ?? ((line: string) => console.log(line));
  }

  /**
   * Read the counter and the paired input/output history.
   * Lists shorter than the counter are paired up to the shorter length.
   */
  async readHistory(operationName: string): Promise<CallHistory> {
    const count = await this.readCount(operationName);
    if (count === 0) {
      return { operationName, count, calls: [] };
    }

    const keys = historyKeys(operationName);
    const [inputs, outputs] = await Promise.all([
      this.store.readListRange(keys.inputs, 0, -1),
      this.store.readListRange(keys.outputs, 0, -1),
    ]);

    const calls: CallRecord[] = [];
    const paired = Math.min(inputs.length, outputs.length);
    for (let i = 0; i < paired; i++) {
      calls.push({ input: inputs[i], output: outputs[i] });
    }

    return { operationName, count, calls };
  }

  /**
   * Write the report line by line to the sink and return it as one text block
   */
  async report(operationName: string): Promise<string> {
    const history = await this.readHistory(operationName);
    const lines = formatReport(history);
    for (const line of lines) {
      this.sink(line);
    }
    return lines.join('\n');
  }

  private async readCount(operationName: string): Promise<number> {
    const raw = await this.store.get(operationName);
    if (!raw) {
      return 0;
    }
    const count = parseInt(raw.toString('utf8'), 10);
    return Number.isNaN(count) ? 0 : count;
  }
}

export function formatReport(history: CallHistory): string[] {
  const { operationName, count, calls } = history;
  return [
    `${operationName} was called ${count} times:`,
    ...calls.map(({ input, output }) => `${operationName}(*${input}) -> ${output}`),
  ];
}
