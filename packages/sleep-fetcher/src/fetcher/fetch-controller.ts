import type { Logger } from '@workspace/logger';
import type { FetchResult, SleepRecordSource } from '../client/types.js';
import { InvalidCursorError, StalledCursorError } from '../errors.js';
import { FetchMetrics } from '../observability/metrics.js';
import type { CheckpointStore } from '../pipeline/checkpoint-store.js';
import type { RecordStore } from '../pipeline/types.js';
import type { SleepRecord } from '../records/types.js';
import { RetryStrategy } from '../retry/retry-strategy.js';
import { sleep as defaultSleep, type Sleep } from '../utils/sleep.js';
import type {
  FetchControllerOptions,
  FetchLoopConfig,
  FetchOutcome,
  FetchStopReason,
} from './types.js';

const DEFAULT_CONFIG: Omit<FetchLoopConfig, 'startTime' | 'endTime'> = {
  chunkSize: 100,
  maxRetries: 3,
  retryDelayMs: 5000,
  requestDelayMs: 1000,
};

/**
 * Walks the remote history backward from the newest cursor, buffering pages
 * into chunks and checkpointing after every flush so an interrupted run can
 * pick up where the last flush left off.
 *
 * Stop conditions:
 * - the cursor reaches `startTime`
 * - `maxRetries` consecutive empty (or failed) pages
 * - `maxRetries` consecutive unexpected errors
 * - the abort signal, checked between iterations
 *
 * Only the signal yields `interrupted`; it keeps the checkpoint. Every other
 * stop is `done` and removes it. Store write failures, bad cursors and a
 * stalled cursor are thrown. Time bounds and a resumed cursor are checked
 * before the store is touched.
 */
export class FetchController {
  private readonly source: SleepRecordSource;
  private readonly checkpoints: CheckpointStore;
  private readonly store: RecordStore;
  private readonly logger: Logger;
  private readonly config: FetchLoopConfig;
  private readonly metrics: FetchMetrics;
  private readonly retryStrategy: RetryStrategy;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(options: FetchControllerOptions) {
    this.source = options.source;
    this.checkpoints = options.checkpoints;
    this.store = options.store;
    this.logger = options.logger;
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.metrics = options.metrics ?? new FetchMetrics();
    this.retryStrategy = new RetryStrategy({
      maxRetries: this.config.maxRetries,
      delayMs: this.config.retryDelayMs,
    });
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  async run(signal?: AbortSignal): Promise<FetchOutcome> {
    const { startTime, endTime, chunkSize, requestDelayMs } = this.config;
    const maxRetries = this.retryStrategy.maxRetries;

    if (!Number.isSafeInteger(startTime) || startTime < 0) {
      throw new InvalidCursorError(startTime);
    }

    const previous = this.checkpoints.load();
    let cursor = previous?.currentTimestamp ?? endTime;
    let total = previous?.totalRecords ?? 0;

    if (!Number.isSafeInteger(cursor) || cursor <= 0) {
      throw new InvalidCursorError(cursor);
    }

    if (previous) {
      this.logger.info(
        `[Fetch] Resuming from previous session (timestamp: ${cursor}, records: ${total})`,
      );
    } else {
      this.logger.info(`[Fetch] Starting fresh run at ${formatCursor(cursor)}`);
    }

    this.store.backup();
    if (!previous) {
      this.store.rewrite([]);
    }

    let buffer: SleepRecord[] = [];
    let flushedChunks = 0;
    let emptyRetries = 0;
    let errorRetries = 0;
    let reason: FetchStopReason = 'reached-start';

    const flush = (): void => {
      if (buffer.length === 0) {
        return;
      }

      this.store.append(buffer);
      flushedChunks += 1;
      this.metrics.increment('chunks.flushed');
      this.metrics.increment('records.saved', buffer.length);
      this.logger.debug(`[Fetch] Flushed ${buffer.length} records`);
      buffer = [];
      this.metrics.gauge('buffer.size', 0);
    };

    const saveCheckpoint = (): void => {
      this.checkpoints.save({
        currentTimestamp: cursor,
        totalRecords: total,
        lastSaveTime: this.now() / 1000,
      });
    };

    while (cursor > startTime) {
      if (signal?.aborted) {
        reason = 'interrupted';
        break;
      }

      try {
        const result = await this.fetchPage(cursor);
        const records = result.success ? result.records : [];

        if (records.length === 0) {
          emptyRetries += 1;
          const decision = this.retryStrategy.decide('empty-batch', emptyRetries);

          if (!decision.shouldRetry) {
            this.logger.info('[Fetch] No more records found after retries.');
            reason = 'no-more-records';
            break;
          }

          this.metrics.increment('retries.empty');
          this.logger.warn(
            `[Fetch] No records found at ${cursor}. Retry ${emptyRetries}/${maxRetries}`,
          );
          await this.sleep(decision.delayMs, signal);
          continue;
        }

        emptyRetries = 0;
        errorRetries = 0;

        const nextCursor = Math.floor(minFromTime(records));
        if (nextCursor >= cursor) {
          throw new StalledCursorError(cursor, nextCursor);
        }

        buffer.push(...records);
        total += records.length;
        this.metrics.gauge('buffer.size', buffer.length);

        this.logger.info(
          `[Fetch] Fetched ${records.length} records. Total so far: ${total}`,
        );

        // the checkpoint keeps the cursor this chunk's last page was fetched at
        if (buffer.length >= chunkSize) {
          flush();
          saveCheckpoint();
        }

        cursor = nextCursor;
        this.metrics.gauge('cursor', cursor);
        this.logger.info(`[Fetch] Next timestamp: ${formatCursor(cursor)}`);

        await this.sleep(requestDelayMs, signal);
      } catch (error) {
        if (error instanceof StalledCursorError) {
          flush();
          saveCheckpoint();
        }

        if (this.retryStrategy.classify(error) === 'fatal') {
          this.metrics.log(this.logger);
          throw error;
        }

        errorRetries += 1;
        const decision = this.retryStrategy.decide(
          'unexpected-error',
          errorRetries,
        );
        this.logger.error(
          `[Fetch] Unexpected error at ${cursor} (${errorRetries}/${maxRetries}):`,
          error,
        );

        if (!decision.shouldRetry) {
          reason = 'retries-exhausted';
          break;
        }

        this.metrics.increment('retries.error');
        await this.sleep(decision.delayMs, signal);
      }
    }

    flush();

    const outcome: FetchOutcome = {
      status: reason === 'interrupted' ? 'interrupted' : 'done',
      reason,
      resumed: previous !== undefined,
      cursor,
      totalRecords: total,
      flushedChunks,
    };

    if (outcome.status === 'interrupted') {
      this.logger.warn(
        `[Fetch] Interrupted at ${cursor}. Progress has been saved; run again to resume.`,
      );
    } else {
      this.checkpoints.clear();
      this.logger.info(
        `[Fetch] Successfully completed (${reason}). Total records saved: ${total}`,
      );
    }

    this.metrics.log(this.logger);
    return outcome;
  }

  private async fetchPage(cursor: number): Promise<FetchResult> {
    const result = await this.source.fetch(cursor);

    this.metrics.increment('requests.total');
    this.metrics.recordDuration(result.metadata.duration);

    if (!result.success) {
      this.metrics.increment('requests.failed');
      this.logger.warn(
        `[Fetch] Request failed (${result.errorCode}), counting page as empty`,
      );
      return result;
    }

    if (result.dropped > 0) {
      this.metrics.increment('records.dropped', result.dropped);
    }

    return result;
  }
}

function minFromTime(records: readonly SleepRecord[]): number {
  return records.reduce(
    (min, record) => Math.min(min, record.fromTime),
    Number.POSITIVE_INFINITY,
  );
}

function formatCursor(cursor: number): string {
  const date = new Date(cursor);
  return Number.isNaN(date.getTime())
    ? String(cursor)
    : `${date.toISOString()} (${cursor})`;
}

export function exitCodeFor(outcome: FetchOutcome): number {
  return outcome.status === 'done' ? 0 : 1;
}
