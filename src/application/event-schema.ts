import { z } from 'zod';
import type { EventFieldValue, EventRecord } from '../domain/index.js';

/**
 * Zod schemas for inbound app events.
 *
 * `event_id` is generated by the producer and must be present. It is the
 * downstream deduplication key; the relay never invents one.
 *
 * Timestamps may omit the offset (naive UTC, as many producers send them).
 * Optional fields may be absent or null.
 */
const baseEventShape = {
  event_id: z.string().min(1).max(255),
  user_id: z.string().min(1).max(255),
  game_id: z.string().min(1).max(255),
  timestamp: z.string().datetime({ offset: true, local: true, message: 'Must be a valid ISO-8601 datetime' }),
  platform: z.string().min(1).max(64),
  app_version: z.string().min(1).max(64),
  session_id: z.string().min(1).max(255),
};

const installShape = {
  ...baseEventShape,
  source: z.string().max(255).nullish(),
  country: z.string().max(64).nullish(),
};

const purchaseShape = {
  ...baseEventShape,
  product_id: z.string().min(1).max(255),
  product_name: z.string().min(1).max(255),
  price: z.number().finite().min(0),
  currency: z.string().min(1).max(16),
  quantity: z.number().int().positive().default(1),
  store: z.string().max(255).nullish(),
  transaction_id: z.string().max(255).nullish(),
};

/** Single-event routes: the tag is implied by the route and may be omitted. */
export const installEventSchema = z.object({
  ...installShape,
  event_type: z.literal('install').default('install'),
});

export const purchaseEventSchema = z.object({
  ...purchaseShape,
  event_type: z.literal('purchase').default('purchase'),
});

/** Batch items must carry their tag. */
export const taggedEventSchema = z.discriminatedUnion('event_type', [
  z.object({ ...installShape, event_type: z.literal('install') }),
  z.object({ ...purchaseShape, event_type: z.literal('purchase') }),
]);

export function eventBatchSchema(maxSize: number) {
  return z
    .array(taggedEventSchema)
    .min(1, 'Batch must contain at least one event')
    .max(maxSize, `Batch must contain at most ${maxSize} events`);
}

export type InstallEventInput = z.infer<typeof installEventSchema>;
export type PurchaseEventInput = z.infer<typeof purchaseEventSchema>;
export type EventInput = InstallEventInput | PurchaseEventInput;

/**
 * Flattens a validated event into the record the delivery core carries.
 * Optional fields the producer left out are omitted from `fields`; explicit
 * nulls are kept.
 */
export function toEventRecord(input: EventInput): EventRecord {
  const { event_id, event_type, ...rest } = input;
  const fields: Record<string, EventFieldValue> = {};
  for (const [key, value] of Object.entries(rest)) {
    fields[key] = value ?? null;
  }
  return { event_id, event_type, fields };
}
