export { InstrumentedStore } from './instrumented.store';
export type { InstrumentedStoreConfig, Decoder } from './instrumented.store';
