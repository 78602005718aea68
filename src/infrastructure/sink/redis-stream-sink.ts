import { Buffer } from 'node:buffer';
import type { Redis } from 'ioredis';
import type { Log } from '../../application/log.js';
import type { Batch, EventRecord, SinkErrorKind, SinkResult } from '../../domain/index.js';
import type { DeliverySink } from './types.js';

const SOURCE = 'event-relay';

export const DEFAULT_MAX_RECORD_BYTES = 1000 * 1024;
export const DEFAULT_MAX_BATCH_BYTES = 4 * 1024 * 1024;

// Server is alive but refusing work for now.
const THROTTLED_REPLIES = ['OOM', 'BUSY', 'LOADING', 'TRYAGAIN', 'MASTERDOWN'];
// The command itself is wrong; resending it cannot help.
const PERMANENT_REPLIES = ['WRONGTYPE', 'NOSCRIPT', 'EXECABORT', 'ERR'];

export interface RedisStreamSinkOptions {
  redis: Redis;
  streamKey: string;
  log: Log;
  /** Approximate MAXLEN trim applied on every XADD. */
  maxLen?: number | undefined;
  maxRecordBytes?: number;
  maxBatchBytes?: number;
  nowFn?: () => number;
}

/**
 * Maps an ioredis failure onto the sink error taxonomy.
 *
 * Reply errors carry the server's error prefix as the first word of the
 * message. Anything else (refused connections, command timeouts, dropped
 * sockets) is transient.
 */
export function classifyRedisError(err: unknown): SinkErrorKind {
  if (!(err instanceof Error)) return 'transient';

  // EXECABORT wraps the errors raised while queueing the transaction.
  const previous: unknown = Reflect.get(err, 'previousErrors');
  if (Array.isArray(previous) && previous.length > 0) {
    return classifyRedisError(previous[0]);
  }

  const prefix = err.message.split(' ', 1)[0] ?? '';
  if (THROTTLED_REPLIES.includes(prefix)) return 'throttled';
  if (err.name === 'ReplyError' && PERMANENT_REPLIES.includes(prefix)) return 'permanent';
  return 'transient';
}

/**
 * Delivers batches to a Redis Stream.
 *
 * The whole batch is sent as one MULTI/EXEC transaction of XADD commands,
 * so entries land contiguously and in batch order. Values are flat
 * field/value lists of strings, so the event fields are JSON-serialized
 * into `data`.
 */
export class RedisStreamSink implements DeliverySink {
  readonly name = 'redis';

  private readonly redis: Redis;
  private readonly streamKey: string;
  private readonly log: Log;
  private readonly maxLen: number | undefined;
  private readonly maxRecordBytes: number;
  private readonly maxBatchBytes: number;
  private readonly nowFn: () => number;

  constructor(opts: RedisStreamSinkOptions) {
    this.redis = opts.redis;
    this.streamKey = opts.streamKey;
    this.log = opts.log;
    this.maxLen = opts.maxLen;
    this.maxRecordBytes = opts.maxRecordBytes ?? DEFAULT_MAX_RECORD_BYTES;
    this.maxBatchBytes = opts.maxBatchBytes ?? DEFAULT_MAX_BATCH_BYTES;
    this.nowFn = opts.nowFn ?? (() => Date.now());
  }

  async submit(batch: Batch): Promise<SinkResult> {
    const ingestedAt = new Date(this.nowFn()).toISOString();
    const entries = batch.map((record) => toStreamFields(record, ingestedAt));

    let batchBytes = 0;
    for (const [i, fields] of entries.entries()) {
      const bytes = byteLength(fields);
      if (bytes > this.maxRecordBytes) {
        return {
          ok: false,
          error: {
            kind: 'permanent',
            message: `record ${batch[i]?.event_id ?? i} is ${bytes} bytes, limit is ${this.maxRecordBytes}`,
          },
        };
      }
      batchBytes += bytes;
    }
    if (batchBytes > this.maxBatchBytes) {
      return {
        ok: false,
        error: { kind: 'permanent', message: `batch is ${batchBytes} bytes, limit is ${this.maxBatchBytes}` },
      };
    }

    try {
      const tx = this.redis.multi();
      for (const fields of entries) {
        if (this.maxLen === undefined) {
          tx.xadd(this.streamKey, '*', ...fields);
        } else {
          tx.xadd(this.streamKey, 'MAXLEN', '~', this.maxLen, '*', ...fields);
        }
      }

      const replies = await tx.exec();

      // null = transaction discarded (e.g. connection dropped mid-EXEC)
      if (replies === null) {
        return { ok: false, error: { kind: 'transient', message: 'redis transaction aborted' } };
      }

      for (const [err] of replies) {
        if (err) {
          return { ok: false, error: { kind: classifyRedisError(err), message: err.message } };
        }
      }

      this.log.debug({ stream: this.streamKey, records: batch.length }, 'Batch appended to stream');
      return { ok: true };
    } catch (err: unknown) {
      const kind = classifyRedisError(err);
      const message = err instanceof Error ? err.message : String(err);
      this.log.debug({ err, kind, stream: this.streamKey }, 'Redis stream append failed');
      return { ok: false, error: { kind, message } };
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      return (await this.redis.ping()) === 'PONG';
    } catch (err: unknown) {
      this.log.warn({ err }, 'Redis health check failed');
      return false;
    }
  }
}

function toStreamFields(record: EventRecord, ingestedAt: string): string[] {
  return [
    'event_id', record.event_id,
    'event_type', record.event_type,
    'source', SOURCE,
    'ingestion_timestamp', ingestedAt,
    'data', JSON.stringify(record.fields),
  ];
}

function byteLength(fields: readonly string[]): number {
  let total = 0;
  for (const f of fields) total += Buffer.byteLength(f, 'utf8');
  return total;
}
