import { statSync } from 'node:fs';
import { createLogger, type Logger } from '@workspace/logger';
import { z } from 'zod';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { JsonRecordStore } from '../pipeline/record-store.js';
import {
  DEFAULT_OUTPUT_FILE,
  DEFAULT_PROGRESS_FILE,
  booleanOption,
  pathOption,
} from './options.js';

export const statusArgsSchema = z.object({
  outputFile: pathOption(DEFAULT_OUTPUT_FILE, 'outputFile'),
  progressFile: pathOption(DEFAULT_PROGRESS_FILE, 'progressFile'),
  pretty: booleanOption(false),
});

type StatusArgs = z.infer<typeof statusArgsSchema>;

type StatusReport = {
  checkpoint: {
    path: string;
    currentTimestamp: number;
    currentTime: string | null;
    totalRecords: number;
    lastSaveTime: number;
  } | null;
  store: {
    path: string;
    exists: boolean;
    sizeBytes?: number;
    modifiedAt?: string;
    records?: number;
    skipped?: number;
  };
};

function toIsoString(timestamp: number): string | null {
  const date = new Date(timestamp);
  return Number.isNaN(date.getTime()) ? null : date.toISOString();
}

export function collectStatus(options: StatusArgs, logger: Logger): StatusReport {
  const checkpoints = new CheckpointStore(options.progressFile, logger);
  const store = new JsonRecordStore(options.outputFile, logger);
  const progress = checkpoints.load();

  const report: StatusReport = {
    checkpoint: progress
      ? {
          path: checkpoints.path,
          currentTimestamp: progress.currentTimestamp,
          currentTime: toIsoString(progress.currentTimestamp),
          totalRecords: progress.totalRecords,
          lastSaveTime: progress.lastSaveTime,
        }
      : null,
    store: { path: store.path, exists: store.exists() },
  };

  if (report.store.exists) {
    const stats = statSync(store.path);
    const { records, skipped } = store.readRecords();
    report.store = {
      ...report.store,
      sizeBytes: stats.size,
      modifiedAt: stats.mtime.toISOString(),
      records: records.length,
      skipped,
    };
  }

  return report;
}

/**
 * Prints where the last run stopped and what the store currently holds.
 */
export async function runStatusAction(
  options: StatusArgs,
  logger: Logger,
  print: (output: string) => void = console.log,
): Promise<number> {
  const report = collectStatus(options, createLogger(logger, 'status'));
  print(
    options.pretty ? JSON.stringify(report, null, 2) : JSON.stringify(report),
  );
  return 0;
}

export type { StatusArgs, StatusReport };
