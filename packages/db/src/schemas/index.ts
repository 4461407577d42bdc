import { clusterMetadataTable } from './cluster-metadata.js';
import { clusterResultsTable } from './cluster-results.js';
import { clusterSinglesTable } from './cluster-singles.js';
import { runsTable } from './runs.js';
import { clusterResultsRelations } from './relations/cluster-results-relations.js';
import { clusterSinglesRelations } from './relations/cluster-singles-relations.js';

export {
  clusterMetadataTable,
  clusterResultsRelations,
  clusterResultsTable,
  clusterSinglesRelations,
  clusterSinglesTable,
  runsTable,
};

export const schema = {
  runsTable,
  clusterResultsTable,
  clusterSinglesTable,
  clusterMetadataTable,
  clusterResultsRelations,
  clusterSinglesRelations,
};
