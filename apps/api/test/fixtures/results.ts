import type { ClusterMetadataFields } from '@aa-savings/types';
import { EMPTY_METADATA } from '../../src/modules/clusters/metadata.js';
import {
  type ClusterPair,
  type InfraMap,
  makePrice,
  type MultiClusterResult,
} from '../../src/modules/clusters/values.js';

type Side = { instance: number; storage: number; infra?: InfraMap };

export function pairOf(clusterUid: string, current: Side, optimal: Side): ClusterPair {
  return {
    current: {
      uid: clusterUid,
      infra: current.infra ?? { 'm5.xlarge': 3 },
      price: makePrice(current.instance, current.storage),
    },
    optimal: {
      uid: clusterUid,
      infra: optimal.infra ?? { 'm5.large': 2 },
      price: makePrice(optimal.instance, optimal.storage),
    },
  };
}

/** One-cluster unit whose whole price is instance cost. */
export function unitResult(
  mcUid: string,
  currentTotal: number,
  optimalTotal: number
): MultiClusterResult {
  const current = { instance: currentTotal, storage: 0 };
  const optimal = { instance: optimalTotal, storage: 0 };
  return { uid: mcUid, pairs: [pairOf(`${mcUid}-c1`, current, optimal)] };
}

export function metadata(overrides: Partial<ClusterMetadataFields> = {}): ClusterMetadataFields {
  return { ...EMPTY_METADATA, ...overrides };
}
