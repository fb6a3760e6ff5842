/**
 * Benchmark Runner
 *
 * Core benchmark execution engine with warmup, iteration logic,
 * and JSON output support.
 */

import type {
  BenchmarkConfig,
  BenchmarkOperation,
  BenchmarkResult,
  BenchmarkSuiteResult,
} from './types.js';
import { DEFAULT_BENCHMARK_CONFIG } from './types.js';
import { createLogger } from '../logger.js';
import { getSecp256k1 } from '../curve/secp256k1.js';
import { pointAdd, pointDouble, scalarMul } from '../curve/operations.js';
import { reduceToFieldElement } from '../field/element.js';
import { fieldInv, fieldMul } from '../field/operations.js';

const debugLog = createLogger('benchmark');

/**
 * Calculate statistics from timing samples
 */
export function calculateStats(samples: number[]): {
  mean: number;
  stddev: number;
  min: number;
  max: number;
} {
  const n = samples.length;
  if (n === 0) {
    return { mean: 0, stddev: 0, min: 0, max: 0 };
  }

  const mean = samples.reduce((a, b) => a + b, 0) / n;
  const variance = samples.reduce((sum, x) => sum + (x - mean) ** 2, 0) / n;
  const stddev = Math.sqrt(variance);
  const min = Math.min(...samples);
  const max = Math.max(...samples);

  return { mean, stddev, min, max };
}

/**
 * Time one operation
 *
 * @param operation - Label for the result
 * @param fn - The work to time; called warmup + iterations times
 */
export function runBenchmark(
  operation: BenchmarkOperation,
  fn: () => unknown,
  config: Pick<BenchmarkConfig, 'iterations' | 'warmup'>
): BenchmarkResult {
  for (let i = 0; i < config.warmup; i++) {
    fn();
  }

  const samples: number[] = [];
  for (let i = 0; i < config.iterations; i++) {
    const start = performance.now();
    fn();
    const end = performance.now();
    samples.push(end - start);
  }

  const stats = calculateStats(samples);
  const throughput = stats.mean > 0 ? 1000 / stats.mean : 0;

  debugLog(`${operation} finished`, { meanMs: stats.mean, iterations: config.iterations });

  return {
    operation,
    meanMs: stats.mean,
    stddevMs: stats.stddev,
    minMs: stats.min,
    maxMs: stats.max,
    throughput,
    samples,
  };
}

/**
 * Build the work function for a secp256k1 operation
 */
function secp256k1Workload(operation: BenchmarkOperation): () => unknown {
  const { curve, generator, order, field } = getSecp256k1();
  switch (operation) {
    case 'mul_by_order':
      return () => scalarMul(order, generator);
    case 'point_add': {
      const twoG = pointDouble(generator);
      return () => pointAdd(generator, twoG);
    }
    case 'field_inv': {
      const x = reduceToFieldElement(0x1234567890abcdefn, field);
      return () => fieldInv(x);
    }
    case 'field_mul': {
      const x = reduceToFieldElement(0xfedcba0987654321n, field);
      return () => fieldMul(x, curve.b);
    }
  }
}

/**
 * Run the secp256k1 benchmark suite
 */
export function runSecp256k1Benchmarks(
  config: BenchmarkConfig = DEFAULT_BENCHMARK_CONFIG
): BenchmarkSuiteResult {
  const results = config.operations.map((operation) =>
    runBenchmark(operation, secp256k1Workload(operation), config)
  );

  return {
    timestamp: new Date().toISOString(),
    nodeVersion: process.version,
    results,
  };
}

/**
 * Export benchmark results as JSON
 */
export function exportBenchmarkResults(suite: BenchmarkSuiteResult): string {
  return JSON.stringify(suite, null, 2);
}

/**
 * Format benchmark results as a text table
 */
export function formatBenchmarkResults(suite: BenchmarkSuiteResult): string {
  const lines = [`secp256k1-core benchmark (${suite.nodeVersion}, ${suite.timestamp})`];
  for (const result of suite.results) {
    lines.push(
      `${result.operation.padEnd(14)} mean ${result.meanMs.toFixed(3)} ms ` +
        `± ${result.stddevMs.toFixed(3)} (min ${result.minMs.toFixed(3)}, max ${result.maxMs.toFixed(3)})`
    );
  }
  return lines.join('\n');
}
