import { z } from 'zod/v4';
import { createSelectSchema } from 'drizzle-zod';
import { runsTable } from '@aa-savings/db';

export const RunSelectSchema = createSelectSchema(runsTable);

export const RunStatsSchema = z.object({
  processed: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
});

export const RunIdParamSchema = z.object({
  runId: z.coerce.number().int().positive(),
});

export const RunsListQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(20),
});

export const RunsListResponseSchema = z.array(RunSelectSchema);

export const RunDetailResponseSchema = z.object({
  run: RunSelectSchema,
  stats: RunStatsSchema,
});
