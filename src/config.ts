import { z } from 'zod';
import { ConfigError } from './errors.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_MAX_FILE_SIZE = 1024 * 1024;

const envSchema = z.object({
  SYMEXTRACT_WORKERS: z.coerce.number().int().min(0).default(0),
  SYMEXTRACT_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  SYMEXTRACT_MAX_FILE_SIZE: z.coerce.number().int().positive().default(DEFAULT_MAX_FILE_SIZE),
  SYMEXTRACT_EXCLUDE: z
    .string()
    .default('')
    .transform(value => value.split(',').map(s => s.trim()).filter(s => s.length > 0)),
});

export interface ExtractorConfig {
  /** 0 selects a worker count from the machine and batch size. */
  workers: number;
  logLevel: LogLevel;
  maxFileSize: number;
  excludeDirs: string[];
}

export function loadConfig(env: Record<string, string | undefined> = process.env): ExtractorConfig {
  // Blank variables count as unset
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') present[key] = value;
  }

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return {
    workers: parsed.data.SYMEXTRACT_WORKERS,
    logLevel: parsed.data.SYMEXTRACT_LOG_LEVEL,
    maxFileSize: parsed.data.SYMEXTRACT_MAX_FILE_SIZE,
    excludeDirs: parsed.data.SYMEXTRACT_EXCLUDE,
  };
}
