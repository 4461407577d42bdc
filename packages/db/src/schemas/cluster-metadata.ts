import {
  boolean,
  index,
  integer,
  pgTable,
  text,
  timestamp,
  varchar,
} from 'drizzle-orm/pg-core';
import { defaultTimestampOptions } from '../utils.js';

// Latest known attributes per unit; overwritten on every fetch, no history kept.
export const clusterMetadataTable = pgTable(
  'cluster_metadata',
  {
    mcUid: varchar('mc_uid', { length: 128 }).primaryKey(),
    clusterName: text('cluster_name'),
    cloudProvider: varchar('cloud_provider', { length: 16 }),
    region: varchar('region', { length: 64 }),
    accountId: varchar('account_id', { length: 128 }),
    engineVersion: varchar('engine_version', { length: 32 }),
    softwareVersion: varchar('software_version', { length: 32 }),
    multiAz: boolean('multi_az'),
    availabilityZones: text('availability_zones'), // comma-joined, sorted
    storageType: text('storage_type'), // comma-joined, sorted
    creationDate: varchar('creation_date', { length: 32 }), // YYYY-MM-DD
    shardsCount: integer('shards_count'),
    maxShardsCount: integer('max_shards_count'),
    totalStorageGb: integer('total_storage_gb'),
    dataNodesCount: integer('data_nodes_count'),
    quorumNodesCount: integer('quorum_nodes_count'),
    totalNodesCount: integer('total_nodes_count'),
    osVersion: varchar('os_version', { length: 64 }),
    rofEnabled: boolean('rof_enabled'),
    lastUpdated: timestamp('last_updated', defaultTimestampOptions).notNull().defaultNow(),
  },
  (t) => ({
    idxProvider: index('cluster_metadata_provider_idx').on(t.cloudProvider),
    idxRegion: index('cluster_metadata_region_idx').on(t.region),
  })
);
