import type { SleepRecord } from '../records/types.js';

type FetchErrorCode = 'timeout' | 'http' | 'network' | 'parse';

type FetchMetadata = {
  duration: number;
  method: string;
  cursor: number;
  responseStatus?: number;
};

type FetchSuccess = {
  success: true;
  records: SleepRecord[];
  dropped: number;
  metadata: FetchMetadata;
};

type FetchError = {
  success: false;
  error: string;
  errorCode: FetchErrorCode;
  metadata: FetchMetadata;
};

type FetchResult = FetchSuccess | FetchError;

/**
 * One page of history ending at `cursor`. Implementations never throw for
 * remote or payload failures; those come back as a `FetchError`.
 */
interface SleepRecordSource {
  fetch(cursor: number): Promise<FetchResult>;
}

export type {
  FetchErrorCode,
  FetchMetadata,
  FetchSuccess,
  FetchError,
  FetchResult,
  SleepRecordSource,
};
