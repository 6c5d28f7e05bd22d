export { OrderedIndex, type IndexEntry, type OrderedIndexOptions } from './engine/ordered-index.js';
export { compareKeys, type ComparableKey, type Comparator } from './engine/compare.js';
export { IndexConfigurationError } from './engine/errors.js';
export { EmployeeDirectory, type EmployeeDirectoryDeps } from './records/employee-directory.js';
export type { EmployeeId, EmployeeRecord } from './types/employee.js';
export { createRandomSource, mathRandomSource, SequenceRandom, XorShift32, type RandomSource } from './utils/prng.js';
export { Logger, type LogFields, type LogLevel, type LoggerOptions, type LogSink } from './logging/logger.js';
export { MetricsRegistry, type IndexOperation, type IndexOutcome } from './metrics/registry.js';
export { loadAppConfig } from './config/app-config.js';
export type { AppConfig, BenchmarkConfig, IndexConfig } from './types/config.js';
