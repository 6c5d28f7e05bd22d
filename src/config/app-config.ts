import 'dotenv/config';

import { isLogLevel, LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import type { AppConfig } from '../types/config.js';

function readEnv(name: string, fallback?: string): string {
  const value = process.env[name] ?? fallback;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

function readNumber(name: string, fallback?: number): number {
  const raw = process.env[name] ?? (fallback === undefined ? undefined : String(fallback));
  if (raw === undefined) {
    throw new Error(`Missing required numeric environment variable: ${name}`);
  }

  const parsed = Number(raw);
  if (raw.trim() === '' || Number.isNaN(parsed)) {
    throw new Error(`Invalid numeric value for ${name}: ${raw}`);
  }

  return parsed;
}

function readOptional(name: string): string | undefined {
  const value = process.env[name];
  if (value === undefined || value === '') {
    return undefined;
  }

  return value;
}

function readOptionalNumber(name: string): number | undefined {
  return readOptional(name) === undefined ? undefined : readNumber(name);
}

function readLogLevel(name: string, fallback: LogLevel): LogLevel {
  const raw = readEnv(name, fallback).trim().toLowerCase();
  if (!isLogLevel(raw)) {
    throw new Error(`Invalid log level for ${name}: ${raw} (expected one of ${LOG_LEVELS.join(', ')})`);
  }

  return raw;
}

export function loadAppConfig(): AppConfig {
  return {
    nodeEnv: readEnv('NODE_ENV', 'development'),
    logLevel: readLogLevel('LOG_LEVEL', 'info'),
    index: {
      maxLevel: readNumber('INDEX_MAX_LEVEL', 16),
      promotionProbability: readNumber('INDEX_PROMOTION_PROBABILITY', 0.5),
      randomSeed: readOptionalNumber('INDEX_RANDOM_SEED'),
    },
    benchmark: {
      iterations: readNumber('BENCHMARK_ITERATIONS', 25_000),
      seed: readNumber('BENCHMARK_SEED', 123),
    },
  };
}
