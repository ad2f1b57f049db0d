import type { SleepRecord } from '../records/types.js';

type ProgressState = {
  currentTimestamp: number;
  totalRecords: number;
  /** Epoch seconds, diagnostic only */
  lastSaveTime: number;
};

/**
 * Persistence for fetched chunks.
 *
 * `rewrite` replaces the store atomically with a single `{"sleeps":[...]}`
 * document. `append` adds one JSON record per line after the existing bytes
 * and is not atomic: between an append and the next `rewrite` the file is a
 * wrapper line followed by record lines, not one JSON document. Each line
 * still parses on its own.
 *
 * Both throw `StoreWriteError` when the write fails.
 */
interface ChunkWriter {
  rewrite(records: readonly SleepRecord[]): void;
  append(records: readonly SleepRecord[]): void;
}

/**
 * A chunk writer that can also snapshot the store before a run mutates it.
 */
interface RecordStore extends ChunkWriter {
  backup(): string | undefined;
}

type StoreContents = {
  records: SleepRecord[];
  skipped: number;
};

export type { ProgressState, ChunkWriter, RecordStore, StoreContents };
