import { PairingError } from './errors.js';
import type { MultiCluster, MultiClusterResult } from './values.js';

/**
 * Matches each current physical cluster with the optimal one of the same uid.
 * A cluster present on only one side fails the whole unit.
 */
export function pairClusters(current: MultiCluster, optimal: MultiCluster): MultiClusterResult {
  const pairs = current.clusters.map((c) => {
    const match = optimal.clusters.find((o) => o.uid === c.uid);
    if (!match) {
      throw new PairingError(
        `Optimal plan for ${current.uid} has no entry for cluster ${c.uid}`,
        current.uid,
        c.uid
      );
    }
    return { current: c, optimal: match };
  });

  const known = new Set(current.clusters.map((c) => c.uid));
  const orphan = optimal.clusters.find((o) => !known.has(o.uid));
  if (orphan) {
    throw new PairingError(
      `Optimal plan for ${current.uid} lists cluster ${orphan.uid} missing from the current blueprint`,
      current.uid,
      orphan.uid
    );
  }

  return { uid: current.uid, pairs };
}
