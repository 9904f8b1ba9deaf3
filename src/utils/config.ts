import os from 'os';
import path from 'path';
import { z } from 'zod';
import { AppConfig } from '../types/config';
import { ConfigurationError } from '../download/core/errors';

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().nonnegative().default(fallback));

const EnvSchema = z.object({
  STATE_DIRECTORY: optionalString,
  OUTPUT_DIRECTORY: optionalString,
  CATALOG_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('https://music.163.com'),
  ),
  MEDIA_HOST: z.preprocess(
    blankToUndefined,
    z.string().url().default('http://m2.music.126.net'),
  ),
  CATALOG_TIMEOUT: positiveInt(10000),
  CATALOG_RETRY_ATTEMPTS: nonNegativeInt(2),
  TRANSFER_COMMAND: optionalString,
  TRANSFER_TIMEOUT: positiveInt(180000),
  FLUSH_EVERY: positiveInt(1),
});

export const DEFAULT_STATE_DIRECTORY = path.join(os.homedir(), '.playlist-fetch');

function expandHome(value: string): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;

  return {
    stateDirectory: path.resolve(cwd, expandHome(vars.STATE_DIRECTORY ?? DEFAULT_STATE_DIRECTORY)),
    catalog: {
      baseUrl: vars.CATALOG_BASE_URL.replace(/\/+$/, ''),
      mediaHost: vars.MEDIA_HOST.replace(/\/+$/, ''),
      timeout: vars.CATALOG_TIMEOUT,
      retryAttempts: vars.CATALOG_RETRY_ATTEMPTS,
    },
    transfer: {
      outputDirectory: path.resolve(cwd, expandHome(vars.OUTPUT_DIRECTORY ?? cwd)),
      command: vars.TRANSFER_COMMAND,
      timeout: vars.TRANSFER_TIMEOUT,
    },
    flushEvery: vars.FLUSH_EVERY,
  };
}
