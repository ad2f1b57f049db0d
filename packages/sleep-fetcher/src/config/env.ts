import { z } from 'zod';
import { ConfigurationError } from '../errors.js';

const envSchema = z.object({
  SLEEP_CLOUD_TOKEN: z
    .string({ required_error: 'SLEEP_CLOUD_TOKEN is not set' })
    .trim()
    .min(1, 'SLEEP_CLOUD_TOKEN is empty'),
  SLEEP_CLOUD_URL: z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().url('SLEEP_CLOUD_URL must be an absolute URL').optional(),
    ),
});

type EnvConfig = {
  userToken: string;
  baseUrl?: string;
};

/**
 * Reads the credential and endpoint override from the environment. Runs
 * before any file or network activity so a missing token fails the run
 * without touching the store.
 */
export function loadEnvConfig(
  env: Record<string, string | undefined> = process.env,
): EnvConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues[0]?.message ?? 'Invalid environment',
    );
  }

  return {
    userToken: parsed.data.SLEEP_CLOUD_TOKEN,
    baseUrl: parsed.data.SLEEP_CLOUD_URL,
  };
}

export type { EnvConfig };
