import { validateDatabaseEnv, validateReportEnv } from '../../env.js';
import { logger, setLogLevel } from '../../logger.js';
import { runReport } from '../../../modules/report/services/run-report.js';
import { history, savingsTrend, topOpportunities } from '../../../modules/results/services/queries.js';
import { ResultStore } from '../../../modules/results/services/store.js';
import { buildClusterApi, type Command, printJson, withDatabase } from '../runtime.js';
import {
  flagBool,
  flagCSV,
  flagPositiveInt,
  flagStr,
  type Flags,
  parseFlags,
  requireFlag,
} from '../utils.js';

const DEFAULT_LIMIT = 10;

function applyLogLevel(flags: Flags, fallback?: string) {
  const level = flagStr(flags, 'log-level') ?? fallback;
  if (level) setLogLevel(level);
}

export const reportRun: Command = async (args) => {
  const flags = parseFlags(args);
  const env = validateReportEnv();
  applyLogLevel(flags, env.logLevel);

  const log = logger.child({ command: 'report:run' });
  const api = buildClusterApi(env, log);

  const summary = await withDatabase(env.databaseUrl, (db) =>
    runReport(
      { api, store: new ResultStore(db, { logger: log }), log },
      {
        runId: flagPositiveInt(flags, 'run-id'),
        label: flagStr(flags, 'label'),
        artifactPath: flagStr(flags, 'artifact') ?? null,
        limit: flagPositiveInt(flags, 'limit'),
        excludeUids: [...env.excludeUids, ...flagCSV(flags, 'exclude')],
        parallel: env.parallel || flagBool(flags, 'parallel'),
        maxWorkers: flagPositiveInt(flags, 'workers') ?? env.maxWorkers,
      }
    )
  );
  printJson(summary);
};

export const reportFinalize: Command = async (args) => {
  const flags = parseFlags(args);
  applyLogLevel(flags);
  const runId = flagPositiveInt(flags, 'run-id');
  if (runId === undefined) throw new Error('Missing required flag --run-id');
  const { databaseUrl } = validateDatabaseEnv();

  const stats = await withDatabase(databaseUrl, (db) =>
    new ResultStore(db, { logger }).finalizeRun(runId, flagStr(flags, 'artifact') ?? null)
  );
  printJson({ runId, ...stats });
};

export const reportHistory: Command = async (args) => {
  const flags = parseFlags(args);
  const mcUid = requireFlag(flags, 'mc-uid');
  const limit = flagPositiveInt(flags, 'limit') ?? DEFAULT_LIMIT;
  const { databaseUrl } = validateDatabaseEnv();

  printJson(await withDatabase(databaseUrl, (db) => history(db, mcUid, limit)));
};

export const reportTrend: Command = async (args) => {
  const flags = parseFlags(args);
  const limit = flagPositiveInt(flags, 'limit') ?? DEFAULT_LIMIT;
  const { databaseUrl } = validateDatabaseEnv();

  printJson(await withDatabase(databaseUrl, (db) => savingsTrend(db, limit)));
};

export const reportTop: Command = async (args) => {
  const flags = parseFlags(args);
  const runId = flagPositiveInt(flags, 'run-id');
  const limit = flagPositiveInt(flags, 'limit') ?? DEFAULT_LIMIT;
  const { databaseUrl } = validateDatabaseEnv();

  printJson(await withDatabase(databaseUrl, (db) => topOpportunities(db, runId, limit)));
};
