export { startConsumer, processEntries } from './stream-consumer.js';
export type { ConsumerOptions, ConsumerDeps, EntryProcessorDeps, RawEntry } from './stream-consumer.js';
