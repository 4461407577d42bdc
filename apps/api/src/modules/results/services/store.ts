import {
  clusterMetadataTable,
  clusterResultsTable,
  clusterSinglesTable,
  type ClusterVariant,
  type Database,
  runsTable,
} from '@aa-savings/db';
import type { ClusterMetadataFields, RunStats } from '@aa-savings/types';
import { and, asc, count, desc, eq } from 'drizzle-orm';
import { type Logger, logger as rootLogger } from '../../../lib/logger.js';
import type { ClusterPair, ClusterSingle, MultiClusterResult } from '../../clusters/values.js';
import { totalInstances } from '../../clusters/values.js';
import { RunNotFoundError } from '../errors.js';

export type Run = typeof runsTable.$inferSelect;
export type ClusterMetadataRow = typeof clusterMetadataTable.$inferSelect;

type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];
type SingleRow = typeof clusterSinglesTable.$inferSelect;

export type StoreOptions = {
  logger?: Logger;
  /** Clock for run, result and metadata timestamps. */
  now?: () => Date;
};

export type SavingsFigures = {
  totalSavings: number;
  savingsPercent: number;
};

/** Canonical savings of a unit; a zero current total yields 0%. */
export function computeSavings(pairs: readonly ClusterPair[]): SavingsFigures {
  let current = 0;
  let optimal = 0;
  for (const pair of pairs) {
    current += pair.current.price.total;
    optimal += pair.optimal.price.total;
  }
  const totalSavings = current - optimal;
  return { totalSavings, savingsPercent: current === 0 ? 0 : (totalSavings / current) * 100 };
}

function singleRow(resultId: number, variant: ClusterVariant, single: ClusterSingle) {
  return {
    resultId,
    clusterUid: single.uid,
    variant,
    infra: single.infra,
    instancePrice: single.price.instance,
    storagePrice: single.price.storage,
    totalPrice: single.price.total,
    totalInstances: totalInstances(single.infra),
  };
}

function toSingle(row: SingleRow): ClusterSingle {
  return {
    uid: row.clusterUid,
    infra: row.infra,
    price: { instance: row.instancePrice, storage: row.storagePrice, total: row.totalPrice },
  };
}

/** Rebuilds complete pairs; a current single without its optimal twin is left out. */
function toPairs(rows: SingleRow[]): ClusterPair[] {
  const optimal = new Map<string, SingleRow>();
  for (const r of rows) {
    if (r.variant === 'optimal' && !optimal.has(r.clusterUid)) optimal.set(r.clusterUid, r);
  }
  const pairs: ClusterPair[] = [];
  for (const r of rows) {
    if (r.variant !== 'current') continue;
    const twin = optimal.get(r.clusterUid);
    if (twin) pairs.push({ current: toSingle(r), optimal: toSingle(twin) });
  }
  return pairs;
}

/**
 * Writer side of the history store. Every multi-row write runs in one transaction;
 * run counters are always derived from result rows, never incremented.
 */
export class ResultStore {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    readonly db: Database,
    opts: StoreOptions = {}
  ) {
    this.log = (opts.logger ?? rootLogger).child({ component: 'result-store' });
    this.now = opts.now ?? (() => new Date());
  }

  private async inTransaction<T>(op: string, fn: (tx: Tx) => Promise<T>): Promise<T> {
    try {
      return await this.db.transaction(fn);
    } catch (err) {
      this.log.error({ err, op }, 'transaction rolled back');
      throw err;
    }
  }

  async beginRun(label: string | null, expectedClusters: number): Promise<number> {
    const [row] = await this.db
      .insert(runsTable)
      .values({
        runTimestamp: this.now(),
        label,
        totalClusters: expectedClusters,
        status: 'in_progress',
      })
      .returning({ runId: runsTable.runId });
    if (!row) throw new Error('beginRun: insert returned no rows');
    this.log.info({ runId: row.runId, label, expectedClusters }, 'run started');
    return row.runId;
  }

  /** Only a successful result counts; failed attempts are retried on resume. */
  async isAlreadyProcessed(runId: number, mcUid: string): Promise<boolean> {
    const rows = await this.db
      .select({ resultId: clusterResultsTable.resultId })
      .from(clusterResultsTable)
      .where(
        and(
          eq(clusterResultsTable.runId, runId),
          eq(clusterResultsTable.mcUid, mcUid),
          eq(clusterResultsTable.status, 'success')
        )
      )
      .limit(1);
    return rows.length > 0;
  }

  async saveSuccess(runId: number, result: MultiClusterResult): Promise<SavingsFigures> {
    const figures = computeSavings(result.pairs);
    const processedAt = this.now();

    await this.inTransaction('saveSuccess', async (tx) => {
      const [row] = await tx
        .insert(clusterResultsTable)
        .values({
          runId,
          mcUid: result.uid,
          processedAt,
          status: 'success',
          errorMessage: null,
          ...figures,
        })
        .onConflictDoUpdate({
          target: [clusterResultsTable.runId, clusterResultsTable.mcUid],
          set: { processedAt, status: 'success', errorMessage: null, ...figures },
        })
        .returning({ resultId: clusterResultsTable.resultId });
      if (!row) throw new Error(`saveSuccess: upsert returned no rows for ${result.uid}`);

      // replaced results must not keep singles from an earlier attempt
      await tx.delete(clusterSinglesTable).where(eq(clusterSinglesTable.resultId, row.resultId));

      const singles = result.pairs.flatMap((pair) => [
        singleRow(row.resultId, 'current', pair.current),
        singleRow(row.resultId, 'optimal', pair.optimal),
      ]);
      if (singles.length) await tx.insert(clusterSinglesTable).values(singles);
    });

    return figures;
  }

  async saveFailure(runId: number, mcUid: string, error: string): Promise<void> {
    const processedAt = this.now();
    const failed = {
      processedAt,
      status: 'failed' as const,
      errorMessage: error,
      totalSavings: null,
      savingsPercent: null,
    };
    await this.inTransaction('saveFailure', async (tx) => {
      await tx
        .insert(clusterResultsTable)
        .values({ runId, mcUid, ...failed })
        .onConflictDoUpdate({
          target: [clusterResultsTable.runId, clusterResultsTable.mcUid],
          set: failed,
        });
    });
  }

  /** Result rows of a run by outcome, without touching the run row. */
  async countResults(runId: number, executor: Database = this.db): Promise<RunStats> {
    const rows = await executor
      .select({ status: clusterResultsTable.status, n: count() })
      .from(clusterResultsTable)
      .where(eq(clusterResultsTable.runId, runId))
      .groupBy(clusterResultsTable.status);

    const stats: RunStats = { processed: 0, failed: 0 };
    for (const r of rows) {
      if (r.status === 'success') stats.processed = r.n;
      else stats.failed = r.n;
    }
    return stats;
  }

  async recomputeRunStats(runId: number, executor: Database = this.db): Promise<RunStats> {
    const stats = await this.countResults(runId, executor);
    const updated = await executor
      .update(runsTable)
      .set({ processedClusters: stats.processed, failedClusters: stats.failed })
      .where(eq(runsTable.runId, runId))
      .returning({ runId: runsTable.runId });
    if (!updated.length) throw new RunNotFoundError(runId);

    return stats;
  }

  /** Safe to repeat; each call re-stamps `completedAt`. */
  async finalizeRun(runId: number, artifactPath: string | null): Promise<RunStats> {
    const stats = await this.inTransaction('finalizeRun', async (tx) => {
      const s = await this.recomputeRunStats(runId, tx);
      await tx
        .update(runsTable)
        .set({ status: 'completed', completedAt: this.now(), artifactPath })
        .where(eq(runsTable.runId, runId));
      return s;
    });
    this.log.info({ runId, ...stats }, 'run completed');
    return stats;
  }

  /** Full replace: fields given as null overwrite whatever was stored before. */
  async upsertMetadata(mcUid: string, fields: ClusterMetadataFields): Promise<void> {
    const lastUpdated = this.now();
    await this.db
      .insert(clusterMetadataTable)
      .values({ mcUid, ...fields, lastUpdated })
      .onConflictDoUpdate({
        target: clusterMetadataTable.mcUid,
        set: { ...fields, lastUpdated },
      });
  }

  async getMetadata(mcUid: string): Promise<ClusterMetadataRow | null> {
    const [row] = await this.db
      .select()
      .from(clusterMetadataTable)
      .where(eq(clusterMetadataTable.mcUid, mcUid))
      .limit(1);
    return row ?? null;
  }

  async getRun(runId: number): Promise<Run | null> {
    const [row] = await this.db.select().from(runsTable).where(eq(runsTable.runId, runId)).limit(1);
    return row ?? null;
  }

  async listRuns(limit: number): Promise<Run[]> {
    return this.db
      .select()
      .from(runsTable)
      .orderBy(desc(runsTable.runTimestamp), desc(runsTable.runId))
      .limit(limit);
  }

  async loadResult(runId: number, mcUid: string): Promise<MultiClusterResult | null> {
    const results = await this.loadResults(runId, mcUid);
    return results[0] ?? null;
  }

  async loadRunResults(runId: number): Promise<MultiClusterResult[]> {
    return this.loadResults(runId);
  }

  private async loadResults(runId: number, mcUid?: string): Promise<MultiClusterResult[]> {
    const rows = await this.db.query.clusterResultsTable.findMany({
      columns: { mcUid: true },
      where: and(
        eq(clusterResultsTable.runId, runId),
        eq(clusterResultsTable.status, 'success'),
        mcUid === undefined ? undefined : eq(clusterResultsTable.mcUid, mcUid)
      ),
      orderBy: asc(clusterResultsTable.mcUid),
      with: { singles: { orderBy: asc(clusterSinglesTable.singleId) } },
    });
    return rows.map((r) => ({ uid: r.mcUid, pairs: toPairs(r.singles) }));
  }
}
