import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { DEFAULT_REGISTRY_URL } from './discovery/dependents-feed';
import { ConfigError, describeError } from './errors';
import { DEFAULT_TIMEOUT_MS } from './http';
import { DEFAULT_SCANNER_URL } from './scanners/scanner-client';
import { WatchConfig } from './types';

export const DEFAULT_CONFIG_PATH = '.config';
export const DOCKER_CONFIG_PATH = '/var/run/secrets/.config';
export const DEFAULT_SCHEDULE_MINUTE = 52;

function requiredString(field: string) {
  return z.string({ required_error: `${field} not set` }).min(1, `${field} not set`);
}

export const ConfigFileSchema = z.object({
  apikey: requiredString('apikey'),
  interval: requiredString('interval').pipe(
    z.string().regex(/^\d+$/, 'interval must be a whole number of hours')
  ),
  target: requiredString('target'),
  registryUrl: z.string().url().optional(),
  scannerUrl: z.string().url().optional(),
  timeoutMs: z.number().int().positive().optional(),
  minute: z.number().int().min(0).max(59).optional(),
  exitOnFailure: z.boolean().optional()
});

/** Mounted secrets win inside containers; otherwise `.config` in the working directory. */
export function resolveConfigPath(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): string {
  if (explicitPath) {
    return path.resolve(explicitPath);
  }
  if (env.DOCKER) {
    return DOCKER_CONFIG_PATH;
  }
  return path.join(process.cwd(), DEFAULT_CONFIG_PATH);
}

export function parseConfig(raw: unknown): WatchConfig {
  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(issue => issue.message).join('; '));
  }

  const file = parsed.data;
  return {
    apiKey: file.apikey,
    lookbackHours: Number.parseInt(file.interval, 10),
    target: file.target,
    registryUrl: file.registryUrl ?? DEFAULT_REGISTRY_URL,
    scannerUrl: file.scannerUrl ?? DEFAULT_SCANNER_URL,
    timeoutMs: file.timeoutMs ?? DEFAULT_TIMEOUT_MS,
    scheduleMinute: file.minute ?? DEFAULT_SCHEDULE_MINUTE,
    exitOnFailure: file.exitOnFailure ?? false
  };
}

export async function loadConfig(configPath: string): Promise<WatchConfig> {
  let contents: string;
  try {
    contents = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`reading config ${configPath}: ${describeError(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(contents);
  } catch (error) {
    throw new ConfigError(`parsing config ${configPath}: ${describeError(error)}`, { cause: error });
  }

  return parseConfig(raw);
}
