import { pushSchema } from 'drizzle-kit/api';
import type { Database } from './client.js';
import { clusterVariantEnum, resultStatusEnum, runStatusEnum } from './enums.js';
import { schema } from './schemas/index.js';

export const schemaObjects = {
  runStatusEnum,
  resultStatusEnum,
  clusterVariantEnum,
  ...schema,
};

/**
 * Brings the database in line with the drizzle tables and returns the statements it ran.
 * Changes drizzle-kit flags as destructive are refused.
 */
export async function applySchema(db: Database): Promise<string[]> {
  const { hasDataLoss, warnings, statementsToExecute, apply } = await pushSchema(
    schemaObjects,
    db
  );
  if (hasDataLoss) {
    throw new Error(`Schema change would lose data: ${warnings.join('; ')}`);
  }
  if (statementsToExecute.length > 0) await apply();
  return statementsToExecute;
}
