export { MockSink } from './mock-sink.js';
export type { MockSinkOptions, FailurePredicate } from './mock-sink.js';
export { RedisStreamSink, classifyRedisError, DEFAULT_MAX_RECORD_BYTES, DEFAULT_MAX_BATCH_BYTES } from './redis-stream-sink.js';
export type { RedisStreamSinkOptions } from './redis-stream-sink.js';
export { createSink } from './create-sink.js';
export type { SinkSettings } from './create-sink.js';
export { SINK_KINDS } from './types.js';
export type { DeliverySink, SinkKind } from './types.js';
