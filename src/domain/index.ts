export { EVENT_TYPES } from './event.js';
export type { EventType, EventFieldValue, EventFields, EventRecord, Batch } from './event.js';
export { isRetryable } from './delivery.js';
export type {
  SinkErrorKind,
  SinkError,
  SinkResult,
  LocalFailure,
  DeliveryFailure,
  SubmissionStatus,
  SubmissionOutcome,
  CircuitState,
  DeadLetterEntry,
} from './delivery.js';
