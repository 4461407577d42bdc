import { z } from 'zod/v4';
import { cloudProviders } from '@aa-savings/db';

export const InfraMapSchema = z.record(z.string(), z.number().int().nonnegative());

export const PriceSchema = z.object({
  instance: z.number(),
  storage: z.number(),
  total: z.number(),
});

export const ClusterSingleSchema = z.object({
  uid: z.string(),
  infra: InfraMapSchema,
  price: PriceSchema,
});

export const ClusterPairSchema = z.object({
  current: ClusterSingleSchema,
  optimal: ClusterSingleSchema,
});

export const MultiClusterResultSchema = z.object({
  uid: z.string(),
  pairs: z.array(ClusterPairSchema),
});

export const MultiClusterResultsResponseSchema = z.array(MultiClusterResultSchema);

/** Full metadata record; every field is present, unknown values are null. */
export const ClusterMetadataFieldsSchema = z.object({
  clusterName: z.string().nullable(),
  cloudProvider: z.enum(cloudProviders).nullable(),
  region: z.string().nullable(),
  accountId: z.string().nullable(),
  engineVersion: z.string().nullable(),
  softwareVersion: z.string().nullable(),
  multiAz: z.boolean().nullable(),
  availabilityZones: z.string().nullable(),
  storageType: z.string().nullable(),
  creationDate: z.string().nullable(),
  shardsCount: z.number().int().nullable(),
  maxShardsCount: z.number().int().nullable(),
  totalStorageGb: z.number().int().nullable(),
  dataNodesCount: z.number().int().nullable(),
  quorumNodesCount: z.number().int().nullable(),
  totalNodesCount: z.number().int().nullable(),
  osVersion: z.string().nullable(),
  rofEnabled: z.boolean().nullable(),
});

export const McUidParamSchema = z.object({
  mcUid: z.string().min(1).max(128),
});

export const HistoryQuerySchema = z.object({
  limit: z.coerce.number().int().positive().max(500).default(10),
});

export const HistoryPointSchema = z.object({
  runId: z.number().int(),
  timestamp: z.date(),
  label: z.string().nullable(),
  currentPrice: z.number(),
  optimalPrice: z.number(),
  savings: z.number(),
  savingsPercent: z.number(),
});

export const HistoryResponseSchema = z.array(HistoryPointSchema);
