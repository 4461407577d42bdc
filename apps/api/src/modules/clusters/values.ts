import type { ClusterSingle, InfraMap, Price } from '@aa-savings/types';

export type { ClusterPair, ClusterSingle, InfraMap, MultiClusterResult, Price } from '@aa-savings/types';

/** One side of the comparison: every physical cluster of a unit, current or optimal. */
export type MultiCluster = {
  uid: string;
  clusters: ClusterSingle[];
};

export function roundMoney(n: number): number {
  return Math.round(n * 100) / 100;
}

/** `total` is fixed here and stored as-is; nothing downstream re-adds the parts. */
export function makePrice(instance: number, storage: number): Price {
  return { instance, storage, total: instance + storage };
}

export function totalInstances(infra: InfraMap): number {
  let n = 0;
  for (const count of Object.values(infra)) n += count;
  return n;
}

/** Instance-type histogram of a node list. */
export function countInstanceTypes(instanceTypes: Iterable<string>): InfraMap {
  const infra: InfraMap = {};
  for (const t of instanceTypes) infra[t] = (infra[t] ?? 0) + 1;
  return infra;
}
