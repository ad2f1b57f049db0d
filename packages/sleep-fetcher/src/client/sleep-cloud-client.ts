import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Logger } from '@workspace/logger';
import { ConfigurationError, InvalidCursorError } from '../errors.js';
import { filterValidRecords } from '../records/record-validator.js';
import type {
  FetchErrorCode,
  FetchResult,
  SleepRecordSource,
} from './types.js';

const DEFAULT_BASE_URL = 'https://sleep-cloud.appspot.com/fetchRecords';
const DEFAULT_TIMEOUT_MS = 30_000;

const responseSchema = z
  .object({
    sleeps: z.array(z.unknown()).optional(),
  })
  .passthrough();

type SendOutcome =
  | { ok: true; status: number; body: unknown }
  | { ok: false; errorCode: FetchErrorCode; error: string };

type SleepCloudClientOptions = {
  userToken: string | undefined;
  logger: Logger;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

/**
 * Sleep as Android cloud backup API client.
 * Stateless: every call is one GET for the page of records ending at the cursor.
 */
export class SleepCloudClient implements SleepRecordSource {
  private readonly userToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly http: AxiosInstance;

  constructor(options: SleepCloudClientOptions) {
    const token = options.userToken?.trim();
    if (!token) {
      throw new ConfigurationError('Invalid user token: value is empty');
    }

    this.userToken = token;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    this.http =
      options.http ??
      axios.create({
        headers: { 'User-Agent': 'SleepCloudDataFetcher/1.0' },
      });
  }

  async fetch(cursor: number): Promise<FetchResult> {
    if (!Number.isSafeInteger(cursor) || cursor <= 0) {
      throw new InvalidCursorError(cursor);
    }

    const startTime = Date.now();
    const metadata = () => ({
      duration: Date.now() - startTime,
      method: 'axios',
      cursor,
    });

    const sent = await this.send(cursor);
    if (!sent.ok) {
      this.logger.error(
        sent.errorCode === 'timeout'
          ? `[SleepCloud] Request timed out (cursor: ${cursor})`
          : `[SleepCloud] Error fetching records (cursor: ${cursor}):`,
        sent.error,
      );
      return {
        success: false,
        errorCode: sent.errorCode,
        error: sent.error,
        metadata: metadata(),
      };
    }

    const { status, body } = sent;

    if (status >= 400) {
      const message = `HTTP ${status}`;
      this.logger.error(`[SleepCloud] Error fetching records (cursor: ${cursor}):`, message);
      return {
        success: false,
        errorCode: 'http',
        error: message,
        metadata: { ...metadata(), responseStatus: status },
      };
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      const message = `Invalid JSON response: ${parsed.error.issues[0]?.message ?? 'unexpected shape'}`;
      this.logger.error(`[SleepCloud] ${message} (cursor: ${cursor})`);
      return {
        success: false,
        errorCode: 'parse',
        error: message,
        metadata: { ...metadata(), responseStatus: status },
      };
    }

    const { valid, dropped } = filterValidRecords(parsed.data.sleeps ?? []);
    if (dropped > 0) {
      this.logger.warn(`[SleepCloud] Filtered out ${dropped} invalid records`);
    }

    return {
      success: true,
      records: valid,
      dropped,
      metadata: { ...metadata(), responseStatus: status },
    };
  }

  private async send(cursor: number): Promise<SendOutcome> {
    try {
      this.logger.debug(`[SleepCloud] GET page ending at ${cursor}`);

      const response = await this.http.get<unknown>(this.baseUrl, {
        params: { user_token: this.userToken, timestamp: String(cursor) },
        timeout: this.timeoutMs,
        validateStatus: () => true,
      });

      return { ok: true, status: response.status, body: response.data };
    } catch (error) {
      return {
        ok: false,
        errorCode: classifyTransportError(error),
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

function classifyTransportError(error: unknown): FetchErrorCode {
  if (axios.isAxiosError(error)) {
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return 'timeout';
    }

    if (error.code === 'ERR_BAD_RESPONSE') {
      return 'parse';
    }
  }

  return 'network';
}

export { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS };
export type { SleepCloudClientOptions };
