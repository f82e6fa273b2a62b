/**
 * Service Configuration — maps process.env to a typed config object
 *
 * Every variable is optional. By default each client gets 5 requests per
 * 60 seconds and the data files are read from data/ beside the package.
 *
 * Performs startup validation: all problems are collected and reported
 * together in a ConfigValidationError.
 */

import { fileURLToPath } from 'node:url';
import cron from 'node-cron';

import { isLogLevel, type LogLevel } from './logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RateLimitConfig {
  maxRequests: number;
  windowSeconds: number;
  /** node-cron expression for evicting idle client keys. */
  evictionCron: string;
}

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: LogLevel;
  dataDir: string;
  corsOrigin: string;
  rateLimit: RateLimitConfig;
}

export type EnvSource = Record<string, string | undefined>;

/** Directory holding employees.json, organizations.json and openapi.json. */
export const DEFAULT_DATA_DIR = fileURLToPath(new URL('../data', import.meta.url));

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

export class ConfigValidationError extends Error {
  readonly problems: string[];

  constructor(problems: string[]) {
    super(
      `Invalid configuration:\n  ${problems.join('\n  ')}\n\n` +
        'Fix them in your .env or deployment configuration.',
    );
    this.name = 'ConfigValidationError';
    this.problems = problems;
  }
}

function positiveInt(
  source: EnvSource,
  key: string,
  fallback: number,
  problems: string[],
): number {
  const raw = source[key];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    problems.push(`${key} must be a positive integer (got "${raw}")`);
    return fallback;
  }
  return value;
}

function str(source: EnvSource, key: string, fallback: string): string {
  const raw = source[key];
  return raw === undefined || raw.trim() === '' ? fallback : raw;
}

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

export function buildServiceConfig(source: EnvSource = process.env): ServiceConfig {
  const problems: string[] = [];

  const port = positiveInt(source, 'PORT', 8000, problems);
  if (port > 65535) {
    problems.push(`PORT must be at most 65535 (got "${port}")`);
  }

  const rawLevel = str(source, 'LOG_LEVEL', 'info').toLowerCase();
  let logLevel: LogLevel = 'info';
  if (isLogLevel(rawLevel)) {
    logLevel = rawLevel;
  } else {
    problems.push(`LOG_LEVEL must be one of debug, info, warn, error (got "${rawLevel}")`);
  }

  const evictionCron = str(source, 'RATE_LIMIT_EVICTION_CRON', '* * * * *');
  if (!cron.validate(evictionCron)) {
    problems.push(`RATE_LIMIT_EVICTION_CRON is not a valid cron expression (got "${evictionCron}")`);
  }

  const config: ServiceConfig = {
    port,
    host: str(source, 'HOST', '0.0.0.0'),
    logLevel,
    dataDir: str(source, 'DATA_DIR', DEFAULT_DATA_DIR),
    corsOrigin: str(source, 'CORS_ORIGIN', '*'),
    rateLimit: {
      maxRequests: positiveInt(source, 'RATE_LIMIT_MAX_REQUESTS', 5, problems),
      windowSeconds: positiveInt(source, 'RATE_LIMIT_WINDOW_SECONDS', 60, problems),
      evictionCron,
    },
  };

  if (problems.length > 0) {
    throw new ConfigValidationError(problems);
  }
  return config;
}
