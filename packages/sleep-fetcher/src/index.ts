export { SleepCloudClient } from './client/sleep-cloud-client.js';
export { loadEnvConfig } from './config/env.js';
export {
  FetcherError,
  ConfigurationError,
  InvalidCursorError,
  StoreWriteError,
  StalledCursorError,
} from './errors.js';
export { FetchController, exitCodeFor } from './fetcher/fetch-controller.js';
export { FetchMetrics } from './observability/metrics.js';
export { CheckpointStore } from './pipeline/checkpoint-store.js';
export { JsonRecordStore } from './pipeline/record-store.js';
export {
  filterValidRecords,
  validateSleepRecord,
} from './records/record-validator.js';
export { RetryStrategy } from './retry/retry-strategy.js';

export type {
  FetchError,
  FetchErrorCode,
  FetchMetadata,
  FetchResult,
  FetchSuccess,
  SleepRecordSource,
} from './client/types.js';
export type { EnvConfig } from './config/env.js';
export type { FetcherErrorCode } from './errors.js';
export type {
  FetchControllerOptions,
  FetchLoopConfig,
  FetchOutcome,
  FetchStatus,
  FetchStopReason,
} from './fetcher/types.js';
export type {
  ChunkWriter,
  ProgressState,
  RecordStore,
  StoreContents,
} from './pipeline/types.js';
export type { FilteredRecords, SleepRecord } from './records/types.js';
