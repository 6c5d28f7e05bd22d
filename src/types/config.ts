import type { LogLevel } from '../logging/logger.js';

export interface IndexConfig {
  maxLevel: number;
  promotionProbability: number;
  randomSeed?: number;
}

export interface BenchmarkConfig {
  iterations: number;
  seed: number;
}

export interface AppConfig {
  nodeEnv: string;
  logLevel: LogLevel;
  index: IndexConfig;
  benchmark: BenchmarkConfig;
}
