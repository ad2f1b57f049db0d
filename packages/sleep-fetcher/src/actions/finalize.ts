import { createLogger, type Logger } from '@workspace/logger';
import { z } from 'zod';
import { FetcherError } from '../errors.js';
import { JsonRecordStore } from '../pipeline/record-store.js';
import { DEFAULT_OUTPUT_FILE, pathOption } from './options.js';

export const finalizeArgsSchema = z.object({
  outputFile: pathOption(DEFAULT_OUTPUT_FILE, 'outputFile'),
});

type FinalizeArgs = z.infer<typeof finalizeArgsSchema>;

/**
 * Folds appended record lines back into a single `{"sleeps":[...]}` document.
 */
export async function runFinalizeAction(
  options: FinalizeArgs,
  logger: Logger,
): Promise<number> {
  const log = createLogger(logger, 'finalize');
  const store = new JsonRecordStore(options.outputFile, log);

  if (!store.exists()) {
    log.error(`[Finalize] Nothing to finalize: ${store.path} does not exist`);
    return 1;
  }

  try {
    const count = store.finalize();
    log.info(`[Finalize] Rewrote ${store.path} with ${count} records`);
    return 0;
  } catch (error) {
    if (error instanceof FetcherError) {
      log.fatal(`[Finalize] ${error.name}: ${error.message}`);
      return 1;
    }

    throw error;
  }
}

export type { FinalizeArgs };
