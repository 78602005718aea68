/**
 * Core domain types for the event relay.
 *
 * These types define the canonical shape of an event as it flows
 * through the delivery core. They carry no framework dependencies.
 */

/** Closed set of event kinds accepted at ingestion. */
export const EVENT_TYPES = ['install', 'purchase'] as const;

export type EventType = (typeof EVENT_TYPES)[number];

/** Scalar value allowed in an event field. */
export type EventFieldValue = string | number | boolean | null;

/** Flat field/value mapping carried by every event. */
export type EventFields = Readonly<Record<string, EventFieldValue>>;

/**
 * Canonical event record.
 *
 * `event_id` is generated by the producer and is the downstream
 * deduplication key — delivery is at-least-once, so the same record
 * may reach the sink more than once.
 */
export interface EventRecord {
  readonly event_id: string;
  readonly event_type: EventType;
  readonly fields: EventFields;
}

/** Ordered group of records submitted together. Never re-ordered. */
export type Batch = readonly EventRecord[];
