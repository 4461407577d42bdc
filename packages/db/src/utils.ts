import { type PgTimestampConfig } from 'drizzle-orm/pg-core';

export const defaultTimestampOptions = {
  withTimezone: true,
  mode: 'date',
} as const satisfies PgTimestampConfig;
