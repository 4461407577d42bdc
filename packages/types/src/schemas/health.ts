import { z } from 'zod/v4';

export const HealthSchema = z.object({
  ok: z.boolean(),
  service: z.string(),
  time: z.object({
    server: z.string(),
    uptimeSec: z.number(),
  }),
  db: z.object({
    ok: z.boolean(),
    latencyMs: z.number().nullable(),
  }),
  lastCompletedRun: z.object({
    runId: z.number().int().nullable(),
    completedAt: z.string().nullable(),
  }),
  durationMs: z.number(),
});
