/**
 * Benchmark Types and Interfaces
 *
 * Defines the types used throughout the benchmarking suite.
 */

/**
 * Benchmark operation types
 */
export type BenchmarkOperation = 'mul_by_order' | 'point_add' | 'field_inv' | 'field_mul';

/**
 * Individual benchmark result
 */
export interface BenchmarkResult {
  /** Operation being benchmarked */
  operation: BenchmarkOperation;
  /** Mean execution time in milliseconds */
  meanMs: number;
  /** Standard deviation in milliseconds */
  stddevMs: number;
  /** Minimum execution time in milliseconds */
  minMs: number;
  /** Maximum execution time in milliseconds */
  maxMs: number;
  /** Operations per second, from the mean */
  throughput: number;
  /** All individual timing samples */
  samples: number[];
}

/**
 * Benchmark configuration
 */
export interface BenchmarkConfig {
  /** Number of timed iterations */
  iterations: number;
  /** Number of warmup iterations */
  warmup: number;
  /** Operations to run */
  operations: BenchmarkOperation[];
}

/**
 * Results of a whole benchmark run
 */
export interface BenchmarkSuiteResult {
  /** ISO timestamp of the run */
  timestamp: string;
  /** Node.js version */
  nodeVersion: string;
  results: BenchmarkResult[];
}

/**
 * Default benchmark configuration
 */
export const DEFAULT_BENCHMARK_CONFIG: BenchmarkConfig = {
  iterations: 10,
  warmup: 2,
  operations: ['mul_by_order', 'point_add', 'field_inv', 'field_mul'],
};
