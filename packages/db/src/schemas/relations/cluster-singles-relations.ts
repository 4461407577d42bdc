import { relations } from 'drizzle-orm';
import { clusterResultsTable } from '../cluster-results.js';
import { clusterSinglesTable } from '../cluster-singles.js';

export const clusterSinglesRelations = relations(clusterSinglesTable, ({ one }) => ({
  result: one(clusterResultsTable, {
    fields: [clusterSinglesTable.resultId],
    references: [clusterResultsTable.resultId],
  }),
}));
