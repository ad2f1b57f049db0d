import type { AxiosInstance } from 'axios';
import { createLogger, type Logger } from '@workspace/logger';
import { z } from 'zod';
import { SleepCloudClient } from '../client/sleep-cloud-client.js';
import { loadEnvConfig } from '../config/env.js';
import { FetcherError } from '../errors.js';
import { FetchController, exitCodeFor } from '../fetcher/fetch-controller.js';
import type { FetchOutcome } from '../fetcher/types.js';
import { CheckpointStore } from '../pipeline/checkpoint-store.js';
import { JsonRecordStore } from '../pipeline/record-store.js';
import type { Sleep } from '../utils/sleep.js';
import {
  DEFAULT_END_TIME,
  DEFAULT_OUTPUT_FILE,
  DEFAULT_PROGRESS_FILE,
  DEFAULT_START_TIME,
  booleanOption,
  integerOption,
  pathOption,
} from './options.js';

export const fetchArgsSchema = z
  .object({
    outputFile: pathOption(DEFAULT_OUTPUT_FILE, 'outputFile'),
    progressFile: pathOption(DEFAULT_PROGRESS_FILE, 'progressFile'),
    startTime: integerOption(
      DEFAULT_START_TIME,
      0,
      'Invalid --startTime. Provide epoch milliseconds.',
    ),
    endTime: integerOption(
      DEFAULT_END_TIME,
      1,
      'Invalid --endTime. Provide epoch milliseconds.',
    ),
    chunkSize: integerOption(
      100,
      1,
      'Invalid --chunkSize. Provide a positive integer.',
    ),
    fresh: booleanOption(false),
    finalize: booleanOption(true),
  })
  .refine((args) => args.startTime < args.endTime, {
    message: 'Invalid range: --startTime must be before --endTime',
    path: ['startTime'],
  });

type FetchArgs = z.infer<typeof fetchArgsSchema>;

type FetchActionDeps = {
  logger: Logger;
  env?: Record<string, string | undefined>;
  http?: AxiosInstance;
  sleep?: Sleep;
  signal?: AbortSignal;
};

/**
 * Runs one fetch session. Returns the process exit code: 0 when the history
 * was walked to the end, 1 when interrupted or when a fatal error stopped
 * the run.
 */
export async function runFetchAction(
  options: FetchArgs,
  deps: FetchActionDeps,
): Promise<number> {
  const log = createLogger(deps.logger, 'fetch');

  log.info('Starting fetch action', JSON.stringify(options));

  try {
    const env = loadEnvConfig(deps.env);

    const checkpoints = new CheckpointStore(
      options.progressFile,
      createLogger(deps.logger, 'checkpoint'),
    );
    if (options.fresh && checkpoints.clear()) {
      log.info(`[Fetch] Discarded checkpoint ${checkpoints.path}`);
    }

    const store = new JsonRecordStore(
      options.outputFile,
      createLogger(deps.logger, 'store'),
    );
    const client = new SleepCloudClient({
      userToken: env.userToken,
      baseUrl: env.baseUrl,
      logger: createLogger(deps.logger, 'client'),
      http: deps.http,
    });
    const controller = new FetchController({
      source: client,
      checkpoints,
      store,
      logger: log,
      config: {
        startTime: options.startTime,
        endTime: options.endTime,
        chunkSize: options.chunkSize,
      },
      sleep: deps.sleep,
    });

    const outcome = await runUntilSignal(controller, log, deps.signal);

    if (outcome.status === 'done' && options.finalize) {
      const count = store.finalize();
      log.info(`[Fetch] Finalized ${store.path} with ${count} records`);
    }

    return exitCodeFor(outcome);
  } catch (error) {
    if (error instanceof FetcherError) {
      log.fatal(`[Fetch] ${error.name}: ${error.message}`);
      return 1;
    }

    throw error;
  }
}

async function runUntilSignal(
  controller: FetchController,
  log: Logger,
  parentSignal: AbortSignal | undefined,
): Promise<FetchOutcome> {
  const abortController = new AbortController();

  const onShutdown = () => {
    if (!abortController.signal.aborted) {
      log.warn('[Fetch] Shutdown requested, saving progress...');
      abortController.abort();
    }
  };
  process.on('SIGINT', onShutdown);
  process.on('SIGTERM', onShutdown);
  if (parentSignal?.aborted) {
    onShutdown();
  }
  parentSignal?.addEventListener('abort', onShutdown, { once: true });

  try {
    return await controller.run(abortController.signal);
  } finally {
    process.removeListener('SIGINT', onShutdown);
    process.removeListener('SIGTERM', onShutdown);
    parentSignal?.removeEventListener('abort', onShutdown);
  }
}

export type { FetchArgs, FetchActionDeps };
