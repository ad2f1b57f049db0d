import { z } from 'zod';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const DEFAULT_OUTPUT_FILE = 'sleep_data_2016_to_2025.json';
export const DEFAULT_PROGRESS_FILE = '.sleep_fetch_progress';
/** 2016-01-01T00:00:00.000Z */
export const DEFAULT_START_TIME = 1451606400000;
/** 2025-03-31T23:59:59.000Z */
export const DEFAULT_END_TIME = 1743465599000;

export function pathOption(defaultValue: string, flag: string) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return defaultValue;
        }

        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : defaultValue;
        }

        return value;
      },
      z.string().min(1, `Invalid --${flag} path`),
    )
    .default(defaultValue);
}

export function integerOption(
  defaultValue: number,
  min: number,
  message: string,
) {
  return z
    .preprocess(
      (value) => {
        if (value === undefined) {
          return defaultValue;
        }

        if (typeof value === 'string') {
          const parsedValue = Number(value);
          return Number.isFinite(parsedValue) ? parsedValue : value;
        }

        return value;
      },
      z
        .number({ invalid_type_error: message })
        .int(message)
        .safe(message)
        .min(min, message),
    )
    .default(defaultValue);
}

export function booleanOption(defaultValue: boolean) {
  return z
    .preprocess((value) => {
      if (value === undefined) {
        return String(defaultValue);
      }

      if (typeof value === 'string') {
        return value.toLowerCase();
      }

      return value;
    }, booleanFromCliSchema);
}
