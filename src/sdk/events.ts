import { randomUUID } from 'node:crypto';

/** Who and where: carried by every event. */
export interface EventContext {
  user_id: string;
  game_id: string;
  platform: string;
  app_version: string;
  session_id: string;
}

export interface InstallDetails {
  source?: string | null;
  country?: string | null;
}

export interface PurchaseDetails {
  product_id: string;
  product_name: string;
  price: number;
  currency: string;
  quantity?: number;
  store?: string | null;
}

interface EventEnvelope extends EventContext {
  event_id: string;
  timestamp: string;
}

export interface InstallEventPayload extends EventEnvelope {
  event_type: 'install';
  source: string | null;
  country: string | null;
}

export interface PurchaseEventPayload extends EventEnvelope {
  event_type: 'purchase';
  product_id: string;
  product_name: string;
  price: number;
  currency: string;
  quantity: number;
  store: string | null;
  transaction_id: string;
}

export type EventPayload = InstallEventPayload | PurchaseEventPayload;

export interface EventFactoryOptions {
  nowFn?: () => number;
  idFn?: () => string;
}

function envelope(context: EventContext, opts: EventFactoryOptions): EventEnvelope {
  return {
    event_id: (opts.idFn ?? randomUUID)(),
    user_id: context.user_id,
    game_id: context.game_id,
    platform: context.platform,
    app_version: context.app_version,
    session_id: context.session_id,
    timestamp: new Date((opts.nowFn ?? Date.now)()).toISOString(),
  };
}

export function createInstallEvent(
  input: EventContext & InstallDetails,
  opts: EventFactoryOptions = {},
): InstallEventPayload {
  return {
    ...envelope(input, opts),
    event_type: 'install',
    source: input.source ?? null,
    country: input.country ?? null,
  };
}

/**
 * Builds a purchase event. `transaction_id` is derived from the generated
 * `event_id`, so a resend of the same payload keeps both.
 *
 * @throws Error on an empty product_id, a negative price or a non-positive quantity.
 */
export function createPurchaseEvent(
  input: EventContext & PurchaseDetails,
  opts: EventFactoryOptions = {},
): PurchaseEventPayload {
  const quantity = input.quantity ?? 1;
  if (!input.product_id) throw new Error('product_id is required');
  if (input.price < 0) throw new Error('price cannot be negative');
  if (quantity <= 0) throw new Error('quantity must be positive');

  const base = envelope(input, opts);
  return {
    ...base,
    event_type: 'purchase',
    product_id: input.product_id,
    product_name: input.product_name,
    price: input.price,
    currency: input.currency,
    quantity,
    store: input.store ?? null,
    transaction_id: `txn_${base.event_id}`,
  };
}
