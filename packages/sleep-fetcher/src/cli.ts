#!/usr/bin/env node
import { createRootLogger } from '@workspace/logger';
import { z } from 'zod';
import { fetchArgsSchema, runFetchAction } from './actions/fetch.js';
import { finalizeArgsSchema, runFinalizeAction } from './actions/finalize.js';
import { runStatusAction, statusArgsSchema } from './actions/status.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('fetch'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('finalize'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('status'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`sleep-history-fetcher CLI

Usage:
  cli help
  cli fetch
  cli fetch --outputFile="./data/sleep.json" --progressFile="./data/.progress"
  cli fetch --startTime=1451606400000 --endTime=1743465599000
  cli fetch --chunkSize=50
  cli fetch --fresh
  cli fetch --finalize=false
  cli finalize --outputFile="./data/sleep.json"
  cli status
  cli status --pretty

Commands:
  help      Show this help message
  fetch     Walk the Sleep Cloud history backward and save every record
  finalize  Rewrite the output store as a single JSON document
  status    Show the saved checkpoint and what the output store holds

Fetch options:
  --outputFile   Output store path (default: sleep_data_2016_to_2025.json).
  --progressFile Checkpoint path (default: .sleep_fetch_progress).
  --startTime    Oldest timestamp to reach, epoch ms (default: 1451606400000).
  --endTime      Newest timestamp, where a fresh run starts (default: 1743465599000).
  --chunkSize    Records buffered before each write and checkpoint (default: 100).
  --fresh        Discard an existing checkpoint and start over.
  --finalize     Rewrite the store as one JSON document when done (default: true).

Finalize options:
  --outputFile   Output store path (default: sleep_data_2016_to_2025.json).

Status options:
  --outputFile   Output store path (default: sleep_data_2016_to_2025.json).
  --progressFile Checkpoint path (default: .sleep_fetch_progress).
  --pretty       Pretty-print JSON output.

Environment:
  SLEEP_CLOUD_TOKEN  Required for fetch. Sleep Cloud user token.
  SLEEP_CLOUD_URL    Optional endpoint override.
  LOG_LEVEL          fatal, error, warn, info (default), debug, trace or silent.
  LOG_FILE           Optional file receiving JSON log lines.
`);
}

function reportInvalid(error: z.ZodError): number {
  console.error(error.issues[0]?.message ?? 'Invalid arguments');
  printHelp();
  return 1;
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const logger = createRootLogger({
    level: process.env.LOG_LEVEL,
    file: process.env.LOG_FILE?.trim() || undefined,
  });

  if (parsedCliInput.data.command === 'fetch') {
    const parsedFetchArgs = fetchArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedFetchArgs.success) {
      return reportInvalid(parsedFetchArgs.error);
    }

    return runFetchAction(parsedFetchArgs.data, { logger });
  }

  if (parsedCliInput.data.command === 'finalize') {
    const parsedFinalizeArgs = finalizeArgsSchema.safeParse(
      parsedCliInput.data.options,
    );
    if (!parsedFinalizeArgs.success) {
      return reportInvalid(parsedFinalizeArgs.error);
    }

    return runFinalizeAction(parsedFinalizeArgs.data, logger);
  }

  const parsedStatusArgs = statusArgsSchema.safeParse(
    parsedCliInput.data.options,
  );
  if (!parsedStatusArgs.success) {
    return reportInvalid(parsedStatusArgs.error);
  }

  return runStatusAction(parsedStatusArgs.data, logger);
}

const exitCode = await main();
process.exitCode = exitCode;
