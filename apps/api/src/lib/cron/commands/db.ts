import { applySchema } from '@aa-savings/db';
import { validateDatabaseEnv } from '../../env.js';
import { logger } from '../../logger.js';
import { type Command, withDatabase } from '../runtime.js';

export const dbInit: Command = async () => {
  const { databaseUrl } = validateDatabaseEnv();
  const statements = await withDatabase(databaseUrl, (db) => applySchema(db));
  logger.info({ statements: statements.length }, 'schema applied');
};
