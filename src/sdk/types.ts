import { z } from 'zod';

/* ── Responses of the relay's public routes ─────────────────────── */

export const healthResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded']),
  sink: z.object({ name: z.string(), healthy: z.boolean() }),
  circuit: z.enum(['closed', 'open', 'half_open']),
  dead_letters: z.number().int(),
  version: z.string(),
  timestamp: z.string(),
});

export type HealthResponse = z.infer<typeof healthResponseSchema>;
