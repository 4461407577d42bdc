import { z } from 'zod/v4';
import { httpFetch } from '../../lib/http.js';
import { ClusterApiError } from './errors.js';

export type MultiClusterRef = {
  uid: string;
  name: string | null;
};

/** Remote cluster-management API, as the report driver sees it. */
export interface ClusterApi {
  listMultiClusters(): Promise<MultiClusterRef[]>;
  getMultiClusterStatus(mcUid: string): Promise<string>;
  getMultiClusterBlueprint(mcUid: string): Promise<unknown>;
  planOptimalMultiCluster(mcUid: string): Promise<unknown>;
}

export type HttpClusterApiOptions = {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
  fetchImpl?: typeof fetch;
};

const ListResponseSchema = z.array(
  z.object({
    multi_cluster_uid: z.string().min(1),
    name: z.string().nullish(),
  })
);
const StatusResponseSchema = z.object({ status: z.string() });
const PlanResponseSchema = z.object({ result: z.unknown() });

const USER_AGENT = 'aa-savings-collector';

export class HttpClusterApi implements ClusterApi {
  private readonly authorization: string;

  constructor(private readonly opts: HttpClusterApiOptions) {
    const token = Buffer.from(`${opts.username}:${opts.password}`).toString('base64');
    this.authorization = `Basic ${token}`;
  }

  async listMultiClusters(): Promise<MultiClusterRef[]> {
    const rows = ListResponseSchema.parse(await this.request('GET', '/v1/multi-clusters'));
    return rows.map((r) => ({ uid: r.multi_cluster_uid, name: r.name ?? null }));
  }

  async getMultiClusterStatus(mcUid: string): Promise<string> {
    const body = await this.request('GET', `/v1/multi-clusters/${encodeURIComponent(mcUid)}/status`);
    return StatusResponseSchema.parse(body).status;
  }

  async getMultiClusterBlueprint(mcUid: string): Promise<unknown> {
    return this.request('GET', `/v1/multi-clusters/${encodeURIComponent(mcUid)}/blueprint`);
  }

  async planOptimalMultiCluster(mcUid: string): Promise<unknown> {
    const body = await this.request(
      'POST',
      `/v1/multi-clusters/${encodeURIComponent(mcUid)}/optimal-plan?fetch_db_specs=true`,
      {}
    );
    return PlanResponseSchema.parse(body).result;
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<unknown> {
    const res = await httpFetch(`${this.opts.baseUrl}${path}`, {
      method,
      timeoutMs: this.opts.timeoutMs,
      fetchImpl: this.opts.fetchImpl,
      headers: {
        accept: 'application/json',
        authorization: this.authorization,
        'user-agent': USER_AGENT,
        ...(body === undefined ? {} : { 'content-type': 'application/json' }),
      },
      body: body === undefined ? undefined : JSON.stringify(body),
    });

    if (!res.ok) {
      const text = await res.text().catch(() => '');
      throw new ClusterApiError(
        `${method} ${path} failed: ${res.status} ${res.statusText}${text ? ` – ${text.slice(0, 200)}` : ''}`,
        res.status,
        path
      );
    }

    return res.json();
  }
}
