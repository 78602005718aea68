export { EventRelayClient } from './client.js';
export type { EventRelayClientOptions } from './client.js';
export { createInstallEvent, createPurchaseEvent } from './events.js';
export type {
  EventContext,
  EventFactoryOptions,
  EventPayload,
  InstallDetails,
  InstallEventPayload,
  PurchaseDetails,
  PurchaseEventPayload,
} from './events.js';
export { healthResponseSchema } from './types.js';
export type { HealthResponse } from './types.js';
