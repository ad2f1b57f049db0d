type SleepRecord = {
  fromTime: number;
  toTime: number;
  quality: number;
  [field: string]: unknown;
};

type FilteredRecords = {
  valid: SleepRecord[];
  dropped: number;
};

export type { SleepRecord, FilteredRecords };
