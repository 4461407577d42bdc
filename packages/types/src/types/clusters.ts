import { z } from 'zod/v4';
import {
  ClusterMetadataFieldsSchema,
  ClusterPairSchema,
  ClusterSingleSchema,
  HistoryPointSchema,
  HistoryQuerySchema,
  InfraMapSchema,
  MultiClusterResultSchema,
  PriceSchema,
} from '../schemas/clusters.js';

export type InfraMap = z.infer<typeof InfraMapSchema>;
export type Price = z.infer<typeof PriceSchema>;
export type ClusterSingle = z.infer<typeof ClusterSingleSchema>;
export type ClusterPair = z.infer<typeof ClusterPairSchema>;
export type MultiClusterResult = z.infer<typeof MultiClusterResultSchema>;
export type ClusterMetadataFields = z.infer<typeof ClusterMetadataFieldsSchema>;
export type HistoryQuery = z.infer<typeof HistoryQuerySchema>;
export type HistoryPoint = z.infer<typeof HistoryPointSchema>;
