import { z } from 'zod/v4';
import { HealthSchema } from '../schemas/health.js';

export type Health = z.infer<typeof HealthSchema>;
