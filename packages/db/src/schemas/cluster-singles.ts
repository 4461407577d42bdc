import {
  doublePrecision,
  index,
  integer,
  jsonb,
  pgTable,
  serial,
  uniqueIndex,
  varchar,
} from 'drizzle-orm/pg-core';
import { clusterVariantEnum } from '../enums.js';
import { clusterResultsTable } from './cluster-results.js';

export const clusterSinglesTable = pgTable(
  'cluster_singles',
  {
    singleId: serial('single_id').primaryKey(),
    resultId: integer('result_id')
      .notNull()
      .references(() => clusterResultsTable.resultId, { onDelete: 'cascade' }),
    clusterUid: varchar('cluster_uid', { length: 128 }).notNull(),
    variant: clusterVariantEnum('variant').notNull(),
    infra: jsonb('infra').$type<Record<string, number>>().notNull(),
    instancePrice: doublePrecision('instance_price').notNull(),
    storagePrice: doublePrecision('storage_price').notNull(),
    totalPrice: doublePrecision('total_price').notNull(),
    totalInstances: integer('total_instances').notNull(),
  },
  (t) => ({
    resultClusterVariantUq: uniqueIndex('cluster_singles_result_cluster_variant_uq').on(
      t.resultId,
      t.clusterUid,
      t.variant
    ),
    idxResultVariant: index('cluster_singles_result_variant_idx').on(t.resultId, t.variant),
  })
);
