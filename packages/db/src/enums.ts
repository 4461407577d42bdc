import { pgEnum } from 'drizzle-orm/pg-core';

/** Runs */
export const runStatusEnum = pgEnum('run_status', ['in_progress', 'completed']);
export type RunStatus = (typeof runStatusEnum.enumValues)[number];

/** Per-unit outcome inside a run */
export const resultStatusEnum = pgEnum('result_status', ['success', 'failed']);
export type ResultStatus = (typeof resultStatusEnum.enumValues)[number];

/** Which side of the comparison a single-cluster snapshot describes */
export const clusterVariantEnum = pgEnum('cluster_variant', ['current', 'optimal']);
export type ClusterVariant = (typeof clusterVariantEnum.enumValues)[number];

/** Canonical cloud provider names stored in metadata */
export const cloudProviders = ['AWS', 'GCP', 'Azure'] as const;
export type CloudProvider = (typeof cloudProviders)[number];
