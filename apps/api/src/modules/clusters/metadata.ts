import type { CloudProvider } from '@aa-savings/db';
import type { ClusterMetadataFields } from '@aa-savings/types';

type Obj = Record<string, unknown>;

const PROVIDERS: Record<string, CloudProvider> = {
  aws: 'AWS',
  gcp: 'GCP',
  azure: 'Azure',
};

function isObj(v: unknown): v is Obj {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

const obj = (v: unknown): Obj => (isObj(v) ? v : {});
const list = (v: unknown): unknown[] => (Array.isArray(v) ? v : []);

function str(v: unknown): string | null {
  if (typeof v === 'string') return v.trim() ? v : null;
  if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  return null;
}

function int(v: unknown): number | null {
  return typeof v === 'number' && Number.isFinite(v) ? Math.trunc(v) : null;
}

function num(v: unknown): number {
  return typeof v === 'number' && Number.isFinite(v) ? v : 0;
}

function bool(v: unknown, fallback: boolean): boolean {
  return typeof v === 'boolean' ? v : fallback;
}

function joinSorted(values: Set<string>): string | null {
  return values.size ? [...values].sort().join(',') : null;
}

export function normalizeProvider(raw: unknown): CloudProvider | null {
  return typeof raw === 'string' ? (PROVIDERS[raw.trim().toLowerCase()] ?? null) : null;
}

export const EMPTY_METADATA: Readonly<ClusterMetadataFields> = Object.freeze({
  clusterName: null,
  cloudProvider: null,
  region: null,
  accountId: null,
  engineVersion: null,
  softwareVersion: null,
  multiAz: null,
  availabilityZones: null,
  storageType: null,
  creationDate: null,
  shardsCount: null,
  maxShardsCount: null,
  totalStorageGb: null,
  dataNodesCount: null,
  quorumNodesCount: null,
  totalNodesCount: null,
  osVersion: null,
  rofEnabled: null,
});

function regionFor(provider: CloudProvider | null, cloud: Obj): string | null {
  switch (provider) {
    case 'AWS':
      return str(cloud.region);
    case 'GCP':
      return str(obj(cloud.gcp).region);
    case 'Azure':
      return str(obj(cloud.azure).region);
    default:
      return null;
  }
}

/** Disk descriptors of one node as `{ type, size }`, wherever the provider keeps them. */
function disksFor(provider: CloudProvider | null, node: Obj): Array<{ type: unknown; size: unknown }> {
  switch (provider) {
    case 'AWS': {
      const ebs = obj(node.ebs_volume);
      return [{ type: ebs.volume_type, size: ebs.volume_size }];
    }
    case 'GCP':
      return list(node.gcp_disks).map((d) => ({ type: obj(d).type, size: obj(d).size }));
    case 'Azure':
      return list(node.azure_disks).map((d) => ({ type: obj(d).type, size: obj(d).size }));
    default:
      return [];
  }
}

/**
 * Flattens the first physical cluster of a blueprint into a metadata record.
 * Missing structure yields nulls; only an absent document is an error.
 */
export function extractClusterMetadata(doc: unknown): ClusterMetadataFields {
  if (doc === null || doc === undefined) {
    throw new Error('Cannot extract cluster metadata: blueprint document is missing');
  }

  const first = list(obj(doc).blueprints)[0];
  if (first === undefined) return { ...EMPTY_METADATA };

  const bp = obj(obj(first).blueprint);
  const cloud = obj(bp.cloud);
  const cluster = obj(bp.cluster);
  const provider = normalizeProvider(cloud.provider);

  const creationTime = str(obj(bp.metadata).creation_time);
  const creationDate = creationTime ? (creationTime.split('T')[0] ?? creationTime) : null;

  const zones = new Set<string>();
  const storageTypes = new Set<string>();
  let storageGb = 0;
  let dataNodes = 0;
  let quorumNodes = 0;

  for (const raw of list(bp.nodes)) {
    const node = obj(raw);
    const zone = str(node.availability_zone);
    if (zone) zones.add(zone);

    if (node.quorum_only === true) quorumNodes += 1;
    else dataNodes += 1;

    for (const disk of disksFor(provider, node)) {
      const type = str(disk.type);
      if (type) storageTypes.add(type);
      storageGb += num(disk.size);
    }
  }

  return {
    clusterName: str(cluster.name),
    cloudProvider: provider,
    region: regionFor(provider, cloud),
    accountId: str(cloud.account_id),
    engineVersion: str(cluster.redis_version),
    softwareVersion: str(cluster.desired_software_version),
    multiAz: bool(cluster.multi_az, false),
    availabilityZones: joinSorted(zones),
    storageType: joinSorted(storageTypes),
    creationDate,
    shardsCount: int(cluster.shards_count),
    maxShardsCount: int(cluster.max_shards_count),
    totalStorageGb: storageGb > 0 ? Math.round(storageGb) : null,
    dataNodesCount: dataNodes,
    quorumNodesCount: quorumNodes,
    totalNodesCount: dataNodes + quorumNodes,
    osVersion: str(cluster.desired_os_version),
    rofEnabled: bool(cluster.rof, false),
  };
}
