/**
 * Instrumentation Module
 */

export * from './instrumentation.types';
export { countCalls, recordHistory, historyKeys, formatCallArguments } from './call-tracking';
export { CallHistoryReporter, formatReport } from './call-history.reporter';
export type { CallHistoryReporterConfig } from './call-history.reporter';
