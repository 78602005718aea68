export {
  installEventSchema,
  purchaseEventSchema,
  taggedEventSchema,
  eventBatchSchema,
  toEventRecord,
} from './event-schema.js';
export type { EventInput, InstallEventInput, PurchaseEventInput } from './event-schema.js';
export { RetryPolicy, createSeededRandom } from './retry-policy.js';
export type { RetryDecision, RetryPolicyOptions, RandomSource } from './retry-policy.js';
export { CircuitBreaker } from './circuit-breaker.js';
export type { CircuitBreakerOptions, CircuitPermit, CircuitMetrics } from './circuit-breaker.js';
export { DeadLetterBuffer } from './dead-letter-buffer.js';
export type { DeadLetterBufferOptions, ReplayLease } from './dead-letter-buffer.js';
export { DeliveryCoordinator, splitBatch, sleep } from './delivery-coordinator.js';
export type {
  DeliveryCoordinatorDeps,
  DeliveryStatus,
  HandleOptions,
  ReplayReport,
  Sleeper,
} from './delivery-coordinator.js';
export { DeliveryQueue } from './delivery-queue.js';
export type { DeliveryQueueOptions, DeliveryQueueStats, SubmissionHandler } from './delivery-queue.js';
export type { Log } from './log.js';
