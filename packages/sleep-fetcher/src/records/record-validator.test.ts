import { describe, it, expect } from 'vitest';
import { filterValidRecords, validateSleepRecord } from './record-validator.js';

function makeRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state * 1664525 + 1013904223) % 4294967296;
    return state / 4294967296;
  };
}

const BASE = {
  fromTime: 1699999000000,
  toTime: 1699999500000,
  quality: 80,
};

describe('validateSleepRecord', () => {
  it('accepts a well-formed record', () => {
    expect(validateSleepRecord(BASE)).toBe(true);
  });

  it('keeps extra fields on valid records', () => {
    const record = { ...BASE, tz: 'Europe/Moscow', cycles: 4 };
    expect(validateSleepRecord(record)).toBe(true);
  });

  it('accepts quality at both bounds', () => {
    expect(validateSleepRecord({ ...BASE, quality: 0 })).toBe(true);
    expect(validateSleepRecord({ ...BASE, quality: 100 })).toBe(true);
  });

  it('rejects fromTime equal to toTime', () => {
    expect(
      validateSleepRecord({ ...BASE, toTime: BASE.fromTime }),
    ).toBe(false);
  });

  it('rejects quality above 100', () => {
    expect(validateSleepRecord({ ...BASE, quality: 150 })).toBe(false);
  });

  it('rejects non-numeric timestamps', () => {
    expect(validateSleepRecord({ ...BASE, fromTime: '1699999000000' })).toBe(
      false,
    );
    expect(validateSleepRecord({ ...BASE, toTime: null })).toBe(false);
  });

  it('rejects NaN quality', () => {
    expect(validateSleepRecord({ ...BASE, quality: Number.NaN })).toBe(false);
  });

  it('rejects non-object input', () => {
    expect(validateSleepRecord(null)).toBe(false);
    expect(validateSleepRecord('record')).toBe(false);
    expect(validateSleepRecord([BASE])).toBe(false);
  });

  it('treats a throwing field accessor as invalid', () => {
    const record = {
      toTime: BASE.toTime,
      quality: BASE.quality,
      get fromTime(): number {
        throw new Error('boom');
      },
    };

    expect(validateSleepRecord(record)).toBe(false);
  });

  it('rejects randomized malformed records', () => {
    const random = makeRandom(42);
    const fields = ['fromTime', 'toTime', 'quality'] as const;

    for (let index = 0; index < 500; index++) {
      const fromTime = Math.floor(random() * 1_700_000_000_000) + 1;
      const record: Record<string, unknown> = {
        fromTime,
        toTime: fromTime + Math.floor(random() * 36_000_000) + 1,
        quality: Math.floor(random() * 101),
      };

      const mutation = index % 3;
      if (mutation === 0) {
        const missing = fields[Math.floor(random() * fields.length)] ?? 'quality';
        delete record[missing];
      } else if (mutation === 1) {
        record.toTime = fromTime - Math.floor(random() * 1_000_000);
      } else {
        record.quality =
          random() < 0.5
            ? -1 - Math.floor(random() * 1000)
            : 101 + Math.floor(random() * 1000);
      }

      expect(validateSleepRecord(record)).toBe(false);
    }
  });
});

describe('filterValidRecords', () => {
  it('returns valid records and a drop count', () => {
    const result = filterValidRecords([
      BASE,
      { ...BASE, quality: 150 },
      { fromTime: 1, toTime: 2 },
    ]);

    expect(result.valid).toEqual([BASE]);
    expect(result.dropped).toBe(2);
  });

  it('handles an empty batch', () => {
    expect(filterValidRecords([])).toEqual({ valid: [], dropped: 0 });
  });
});
