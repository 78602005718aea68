export { redisPlugin } from './redis/index.js';
export type { RedisPluginOptions } from './redis/index.js';
export { deliveryPlugin } from './delivery/index.js';
export type { DeliveryPluginOptions, DeliveryServices } from './delivery/index.js';
export { loadConfig } from './config/index.js';
export type { AppConfig, DeliveryConfig } from './config/index.js';
export { MockSink, RedisStreamSink, createSink, classifyRedisError } from './sink/index.js';
export type { DeliverySink, SinkKind, MockSinkOptions } from './sink/index.js';
