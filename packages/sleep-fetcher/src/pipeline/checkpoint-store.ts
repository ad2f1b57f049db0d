import { existsSync, readFileSync, rmSync } from 'node:fs';
import { z } from 'zod';
import type { Logger } from '@workspace/logger';
import { atomicWriteFileSync } from '../utils/atomic-write.js';
import type { ProgressState } from './types.js';

const checkpointFileSchema = z
  .object({
    current_timestamp: z.number().int().safe(),
    total_records: z.number().int().min(0),
    last_save_time: z.number(),
  })
  .strict();

type CheckpointFile = z.infer<typeof checkpointFileSchema>;

export class CheckpointStore {
  private readonly checkpointPath: string;
  private readonly logger: Logger;

  constructor(checkpointPath: string, logger: Logger) {
    this.checkpointPath = checkpointPath;
    this.logger = logger;
  }

  get path(): string {
    return this.checkpointPath;
  }

  /**
   * Missing, unreadable and malformed checkpoints all read as "no prior run".
   */
  load(): ProgressState | undefined {
    if (!existsSync(this.checkpointPath)) {
      return undefined;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.checkpointPath, 'utf-8'));
    } catch (error) {
      this.logger.warn(
        `[Checkpoint] Ignoring unreadable checkpoint ${this.checkpointPath}:`,
        error,
      );
      return undefined;
    }

    const parsed = checkpointFileSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn(
        `[Checkpoint] Ignoring malformed checkpoint ${this.checkpointPath}`,
      );
      return undefined;
    }

    return {
      currentTimestamp: parsed.data.current_timestamp,
      totalRecords: parsed.data.total_records,
      lastSaveTime: parsed.data.last_save_time,
    };
  }

  /**
   * Returns false when the file could not be written. The run goes on; it
   * just cannot resume past the previous checkpoint.
   */
  save(state: ProgressState): boolean {
    const file: CheckpointFile = {
      current_timestamp: state.currentTimestamp,
      total_records: state.totalRecords,
      last_save_time: state.lastSaveTime,
    };

    try {
      atomicWriteFileSync(this.checkpointPath, JSON.stringify(file));
      return true;
    } catch (error) {
      this.logger.error(
        `[Checkpoint] Failed to save checkpoint ${this.checkpointPath}:`,
        error,
      );
      return false;
    }
  }

  /**
   * Returns true when a checkpoint file was removed.
   */
  clear(): boolean {
    if (!existsSync(this.checkpointPath)) {
      return false;
    }

    rmSync(this.checkpointPath);
    return true;
  }
}
