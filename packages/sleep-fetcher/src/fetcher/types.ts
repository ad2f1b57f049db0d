import type { Logger } from '@workspace/logger';
import type { SleepRecordSource } from '../client/types.js';
import type { FetchMetrics } from '../observability/metrics.js';
import type { CheckpointStore } from '../pipeline/checkpoint-store.js';
import type { RecordStore } from '../pipeline/types.js';
import type { Sleep } from '../utils/sleep.js';

type FetchLoopConfig = {
  /** Lower bound (epoch ms); the loop stops once the cursor reaches it */
  startTime: number;
  /** First cursor of a fresh run (epoch ms) */
  endTime: number;
  chunkSize: number;
  maxRetries: number;
  retryDelayMs: number;
  requestDelayMs: number;
};

type FetchStatus = 'done' | 'interrupted';

type FetchStopReason =
  | 'reached-start'
  | 'no-more-records'
  | 'retries-exhausted'
  | 'interrupted';

type FetchOutcome = {
  status: FetchStatus;
  reason: FetchStopReason;
  resumed: boolean;
  cursor: number;
  totalRecords: number;
  flushedChunks: number;
};

type FetchControllerOptions = {
  source: SleepRecordSource;
  checkpoints: CheckpointStore;
  store: RecordStore;
  logger: Logger;
  config: Pick<FetchLoopConfig, 'startTime' | 'endTime'> &
    Partial<FetchLoopConfig>;
  metrics?: FetchMetrics;
  sleep?: Sleep;
  now?: () => number;
};

export type {
  FetchLoopConfig,
  FetchStatus,
  FetchStopReason,
  FetchOutcome,
  FetchControllerOptions,
};
