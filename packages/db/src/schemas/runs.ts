import { index, integer, pgTable, serial, text, timestamp, varchar } from 'drizzle-orm/pg-core';
import { runStatusEnum } from '../enums.js';
import { defaultTimestampOptions } from '../utils.js';

export const runsTable = pgTable(
  'runs',
  {
    runId: serial('run_id').primaryKey(),
    runTimestamp: timestamp('run_timestamp', defaultTimestampOptions).notNull().defaultNow(),
    label: varchar('label', { length: 128 }), // ticket / operator label
    totalClusters: integer('total_clusters').notNull().default(0),
    processedClusters: integer('processed_clusters').notNull().default(0),
    failedClusters: integer('failed_clusters').notNull().default(0),
    status: runStatusEnum('status').notNull().default('in_progress'),
    completedAt: timestamp('completed_at', defaultTimestampOptions),
    artifactPath: text('artifact_path'),
  },
  (t) => ({
    idxTimestamp: index('runs_timestamp_idx').on(t.runTimestamp),
    idxStatusTimestamp: index('runs_status_timestamp_idx').on(t.status, t.runTimestamp),
  })
);
