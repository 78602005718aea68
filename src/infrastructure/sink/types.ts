import type { Batch, SinkResult } from '../../domain/index.js';

/**
 * Uniform interface over the streaming destination.
 *
 * Implementations report failures as values, never by throwing.
 */
export interface DeliverySink {
  readonly name: string;
  submit(batch: Batch): Promise<SinkResult>;
  healthCheck(): Promise<boolean>;
}

export const SINK_KINDS = ['redis', 'mock'] as const;

export type SinkKind = (typeof SINK_KINDS)[number];
