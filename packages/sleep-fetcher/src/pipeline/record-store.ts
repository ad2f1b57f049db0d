import {
  appendFileSync,
  copyFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import type { Logger } from '@workspace/logger';
import { StoreWriteError } from '../errors.js';
import type { SleepRecord } from '../records/types.js';
import { validateSleepRecord } from '../records/record-validator.js';
import { atomicWriteFileSync } from '../utils/atomic-write.js';
import type { RecordStore, StoreContents } from './types.js';

type StoreWrapper = {
  sleeps: SleepRecord[];
};

/**
 * The on-disk record store.
 *
 * Layout: an optional first line holding the `{"sleeps":[...]}` wrapper,
 * then one record per line for every append since the last rewrite.
 * `finalize` folds everything back into the wrapper. A store that is already
 * a single document (pretty-printed or not) reads as that document.
 */
export class JsonRecordStore implements RecordStore {
  private readonly outputPath: string;
  private readonly logger: Logger;

  constructor(outputPath: string, logger: Logger) {
    this.outputPath = outputPath;
    this.logger = logger;
  }

  get path(): string {
    return this.outputPath;
  }

  get backupPath(): string {
    return `${this.outputPath}.backup`;
  }

  exists(): boolean {
    return existsSync(this.outputPath);
  }

  rewrite(records: readonly SleepRecord[]): void {
    const wrapper: StoreWrapper = { sleeps: [...records] };

    try {
      atomicWriteFileSync(this.outputPath, JSON.stringify(wrapper) + '\n');
    } catch (error) {
      throw new StoreWriteError(this.outputPath, { cause: error });
    }
  }

  append(records: readonly SleepRecord[]): void {
    if (records.length === 0) {
      return;
    }

    const lines = records.map((record) => JSON.stringify(record) + '\n');

    try {
      mkdirSync(dirname(this.outputPath), { recursive: true });
      appendFileSync(this.outputPath, lines.join(''), 'utf-8');
    } catch (error) {
      throw new StoreWriteError(this.outputPath, { cause: error });
    }
  }

  /**
   * Byte copy to `<store>.backup`. Returns the backup path, or undefined when
   * there was nothing to copy or the copy failed.
   */
  backup(): string | undefined {
    if (!this.exists()) {
      return undefined;
    }

    try {
      copyFileSync(this.outputPath, this.backupPath);
      this.logger.info(`[Store] Created backup at ${this.backupPath}`);
      return this.backupPath;
    } catch (error) {
      this.logger.error('[Store] Failed to create backup:', error);
      return undefined;
    }
  }

  readRecords(): StoreContents {
    if (!this.exists()) {
      return { records: [], skipped: 0 };
    }

    const content = readFileSync(this.outputPath, 'utf-8');
    const whole = parseDocument(content);
    if (whole) {
      const valid = whole.sleeps.filter(validateSleepRecord);
      return { records: valid, skipped: whole.sleeps.length - valid.length };
    }

    const records: SleepRecord[] = [];
    let skipped = 0;

    const lines = content.split('\n');
    for (const [index, line] of lines.entries()) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch {
        skipped += 1;
        continue;
      }

      if (index === 0 && isStoreWrapper(parsed)) {
        const valid = parsed.sleeps.filter(validateSleepRecord);
        records.push(...valid);
        skipped += parsed.sleeps.length - valid.length;
        continue;
      }

      if (validateSleepRecord(parsed)) {
        records.push(parsed);
      } else {
        skipped += 1;
      }
    }

    return { records, skipped };
  }

  /**
   * Closing rewrite: folds appended lines into a single `{"sleeps":[...]}`
   * document. Returns the number of records written.
   */
  finalize(): number {
    const { records, skipped } = this.readRecords();

    if (skipped > 0) {
      this.logger.warn(
        `[Store] Skipped ${skipped} unreadable entries in ${this.outputPath}`,
      );
    }

    this.rewrite(records);
    return records.length;
  }
}

function parseDocument(content: string): { sleeps: unknown[] } | undefined {
  try {
    const parsed: unknown = JSON.parse(content);
    return isStoreWrapper(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function isStoreWrapper(value: unknown): value is { sleeps: unknown[] } {
  return (
    typeof value === 'object' &&
    value !== null &&
    'sleeps' in value &&
    Array.isArray(value.sleeps)
  );
}
