import { relations } from 'drizzle-orm';
import { clusterResultsTable } from '../cluster-results.js';
import { clusterSinglesTable } from '../cluster-singles.js';

export const clusterResultsRelations = relations(clusterResultsTable, ({ many }) => ({
  singles: many(clusterSinglesTable),
}));
