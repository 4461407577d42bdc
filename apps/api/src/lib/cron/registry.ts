import type { Command } from './runtime.js';
import { dbInit } from './commands/db.js';
import {
  reportFinalize,
  reportHistory,
  reportRun,
  reportTop,
  reportTrend,
} from './commands/report.js';

export const commands: Record<string, Command> = {
  'db:init': dbInit,

  'report:run': reportRun,
  'report:finalize': reportFinalize,

  'report:history': reportHistory,
  'report:trend': reportTrend,
  'report:top': reportTop,
};
