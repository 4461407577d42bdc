import { z } from 'zod/v4';
import { RunSelectSchema, RunStatsSchema, RunsListQuerySchema } from '../schemas/runs.js';

export type Run = z.infer<typeof RunSelectSchema>;
export type RunStats = z.infer<typeof RunStatsSchema>;
export type RunsListQuery = z.infer<typeof RunsListQuerySchema>;
