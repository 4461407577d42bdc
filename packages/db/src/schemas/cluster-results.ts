import {
  doublePrecision,
  index,
  integer,
  pgTable,
  serial,
  text,
  timestamp,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';
import { resultStatusEnum } from '../enums.js';
import { defaultTimestampOptions } from '../utils.js';
import { runsTable } from './runs.js';

export const clusterResultsTable = pgTable(
  'cluster_results',
  {
    resultId: serial('result_id').primaryKey(),
    runId: integer('run_id')
      .notNull()
      .references(() => runsTable.runId),
    mcUid: varchar('mc_uid', { length: 128 }).notNull(),
    processedAt: timestamp('processed_at', defaultTimestampOptions).notNull().defaultNow(),
    status: resultStatusEnum('status').notNull(),
    errorMessage: text('error_message'),
    // current total minus optimal total, fixed at write time
    totalSavings: doublePrecision('total_savings'),
    savingsPercent: doublePrecision('savings_percent'),
  },
  (t) => ({
    runUnitUq: uniqueIndex('cluster_results_run_unit_uq').on(t.runId, t.mcUid),
    idxUnit: index('cluster_results_mc_uid_idx').on(t.mcUid),
    idxRunStatus: index('cluster_results_run_status_idx').on(t.runId, t.status),
    idxSavings: index('cluster_results_savings_idx').on(t.totalSavings),
  })
);
