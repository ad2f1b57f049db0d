import { z } from 'zod';
import type { FilteredRecords, SleepRecord } from './types.js';

const sleepRecordSchema = z
  .object({
    fromTime: z.number().finite(),
    toTime: z.number().finite(),
    quality: z.number().finite().min(0).max(100),
  })
  .passthrough()
  .refine((record) => record.fromTime < record.toTime);

export function validateSleepRecord(record: unknown): record is SleepRecord {
  try {
    return sleepRecordSchema.safeParse(record).success;
  } catch {
    // throwing getters or proxies on the payload
    return false;
  }
}

export function filterValidRecords(records: readonly unknown[]): FilteredRecords {
  const valid: SleepRecord[] = [];

  for (const record of records) {
    if (validateSleepRecord(record)) {
      valid.push(record);
    }
  }

  return { valid, dropped: records.length - valid.length };
}
