import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { join } from 'node:path';
import { JsonRecordStore } from './record-store.js';
import { StoreWriteError } from '../errors.js';
import type { SleepRecord } from '../records/types.js';
import { createRecordingLogger } from '../testing/recording-logger.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-record-store');
const OUTPUT_PATH = join(TEST_DIR, 'sleep_data.json');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function makeRecord(fromTime: number, extra?: Record<string, unknown>): SleepRecord {
  return { fromTime, toTime: fromTime + 28_800_000, quality: 70, ...extra };
}

describe('JsonRecordStore', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('rewrite produces a parseable sleeps document', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    const records = [makeRecord(3000), makeRecord(2000, { tz: 'UTC' })];

    store.rewrite(records);

    const parsed = JSON.parse(readFileSync(OUTPUT_PATH, 'utf-8'));
    expect(parsed).toEqual({ sleeps: records });
    expect(existsSync(`${OUTPUT_PATH}.tmp`)).toBe(false);
  });

  it('rewrite with no records establishes an empty store', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([]);

    expect(readFileSync(OUTPUT_PATH, 'utf-8')).toBe('{"sleeps":[]}\n');
  });

  it('rewrite replaces previous content', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([makeRecord(1000)]);
    store.append([makeRecord(900)]);

    store.rewrite([]);

    expect(JSON.parse(readFileSync(OUTPUT_PATH, 'utf-8'))).toEqual({ sleeps: [] });
  });

  it('append writes one record per line after existing bytes', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([]);

    store.append([makeRecord(3000), makeRecord(2000)]);
    store.append([makeRecord(1000)]);

    const lines = readFileSync(OUTPUT_PATH, 'utf-8').trimEnd().split('\n');
    expect(lines).toEqual([
      '{"sleeps":[]}',
      JSON.stringify(makeRecord(3000)),
      JSON.stringify(makeRecord(2000)),
      JSON.stringify(makeRecord(1000)),
    ]);
  });

  it('append of an empty chunk leaves the file untouched', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.append([]);

    expect(existsSync(OUTPUT_PATH)).toBe(false);
  });

  it('appended lines wrapped in a closing document match a full rewrite', () => {
    const records = [makeRecord(5000), makeRecord(4000), makeRecord(3000)];

    const appended = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    appended.append(records.slice(0, 2));
    appended.append(records.slice(2));
    const lines = readFileSync(OUTPUT_PATH, 'utf-8').trimEnd().split('\n');
    const wrapped = JSON.parse(`{"sleeps":[${lines.join(',')}]}`);

    const rewrittenPath = join(TEST_DIR, 'rewritten.json');
    new JsonRecordStore(rewrittenPath, createRecordingLogger()).rewrite(records);
    const rewritten = JSON.parse(readFileSync(rewrittenPath, 'utf-8'));

    expect(wrapped).toEqual(rewritten);
  });

  it('readRecords returns wrapper records followed by appended ones', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([makeRecord(9000)]);
    store.append([makeRecord(8000), makeRecord(7000)]);

    const { records, skipped } = store.readRecords();

    expect(records.map((record) => record.fromTime)).toEqual([9000, 8000, 7000]);
    expect(skipped).toBe(0);
  });

  it('readRecords skips a torn trailing line', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([]);
    store.append([makeRecord(8000)]);
    appendFileSync(OUTPUT_PATH, '{"fromTime":70', 'utf-8');

    const { records, skipped } = store.readRecords();

    expect(records).toEqual([makeRecord(8000)]);
    expect(skipped).toBe(1);
  });

  it('readRecords returns nothing for a missing store', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    expect(store.readRecords()).toEqual({ records: [], skipped: 0 });
  });

  it('finalize folds appended lines into one document', () => {
    const logger = createRecordingLogger();
    const store = new JsonRecordStore(OUTPUT_PATH, logger);
    store.rewrite([]);
    store.append([makeRecord(8000)]);
    store.append([makeRecord(7000), makeRecord(6000)]);

    const count = store.finalize();

    expect(count).toBe(3);
    expect(JSON.parse(readFileSync(OUTPUT_PATH, 'utf-8'))).toEqual({
      sleeps: [makeRecord(8000), makeRecord(7000), makeRecord(6000)],
    });
    expect(logger.messages('warn')).toEqual([]);
  });

  it('finalize keeps a pretty-printed document written by another tool', () => {
    writeFileSync(
      OUTPUT_PATH,
      JSON.stringify({ sleeps: [makeRecord(1000)] }, null, 2),
      'utf-8',
    );
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());

    expect(store.finalize()).toBe(1);
    expect(readFileSync(OUTPUT_PATH, 'utf-8')).toBe(
      `${JSON.stringify({ sleeps: [makeRecord(1000)] })}\n`,
    );
  });

  it('backup copies the store byte for byte', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());
    store.rewrite([makeRecord(1000)]);
    store.append([makeRecord(500)]);

    const backupPath = store.backup();

    expect(backupPath).toBe(`${OUTPUT_PATH}.backup`);
    expect(readFileSync(`${OUTPUT_PATH}.backup`, 'utf-8')).toBe(
      readFileSync(OUTPUT_PATH, 'utf-8'),
    );
  });

  it('backup is skipped when the store does not exist', () => {
    const store = new JsonRecordStore(OUTPUT_PATH, createRecordingLogger());

    expect(store.backup()).toBeUndefined();
    expect(existsSync(`${OUTPUT_PATH}.backup`)).toBe(false);
  });

  it('rewrite failure raises StoreWriteError and leaves no temp file', () => {
    const blockedPath = join(TEST_DIR, 'blocked.json');
    mkdirSync(blockedPath);
    const store = new JsonRecordStore(blockedPath, createRecordingLogger());

    expect(() => store.rewrite([makeRecord(1000)])).toThrow(StoreWriteError);
    expect(existsSync(`${blockedPath}.tmp`)).toBe(false);
  });

  it('append failure raises StoreWriteError', () => {
    const store = new JsonRecordStore(
      '/dev/null/impossible-path/sleep_data.json',
      createRecordingLogger(),
    );

    expect(() => store.append([makeRecord(1000)])).toThrow(StoreWriteError);
  });
});
