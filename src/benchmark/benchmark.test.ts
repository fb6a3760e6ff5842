/**
 * Benchmark Runner Tests
 */

import { describe, it, expect, vi } from 'vitest';
import {
  calculateStats,
  exportBenchmarkResults,
  formatBenchmarkResults,
  runBenchmark,
  runSecp256k1Benchmarks,
} from './runner.js';
import { DEFAULT_BENCHMARK_CONFIG } from './types.js';
import type { BenchmarkSuiteResult } from './types.js';

describe('calculateStats', () => {
  it('should compute mean, population stddev, min and max', () => {
    expect(calculateStats([2, 4, 4, 4, 5, 5, 7, 9])).toEqual({ mean: 5, stddev: 2, min: 2, max: 9 });
  });

  it('should return zeros for no samples', () => {
    expect(calculateStats([])).toEqual({ mean: 0, stddev: 0, min: 0, max: 0 });
  });
});

describe('runBenchmark', () => {
  it('should call the work function for warmup and timed iterations', () => {
    const fn = vi.fn();
    const result = runBenchmark('field_mul', fn, { iterations: 5, warmup: 3 });
    expect(fn).toHaveBeenCalledTimes(8);
    expect(result.operation).toBe('field_mul');
    expect(result.samples).toHaveLength(5);
    expect(result.minMs).toBeLessThanOrEqual(result.maxMs);
    expect(result.throughput).toBe(result.meanMs > 0 ? 1000 / result.meanMs : 0);
  });
});

describe('runSecp256k1Benchmarks', () => {
  it('should default to every operation', () => {
    expect(DEFAULT_BENCHMARK_CONFIG.operations).toEqual([
      'mul_by_order',
      'point_add',
      'field_inv',
      'field_mul',
    ]);
  });

  it('should time the requested operations in order', () => {
    const suite = runSecp256k1Benchmarks({
      iterations: 2,
      warmup: 0,
      operations: ['field_mul', 'point_add', 'field_inv'],
    });
    expect(suite.nodeVersion).toBe(process.version);
    expect(suite.results.map((r) => r.operation)).toEqual(['field_mul', 'point_add', 'field_inv']);
    expect(suite.results.every((r) => r.samples.length === 2)).toBe(true);
  });
});

describe('Result output', () => {
  const suite: BenchmarkSuiteResult = {
    timestamp: '2026-01-02T03:04:05.000Z',
    nodeVersion: 'v20.0.0',
    results: [
      {
        operation: 'point_add',
        meanMs: 1.5,
        stddevMs: 0.25,
        minMs: 1,
        maxMs: 2,
        throughput: 1000 / 1.5,
        samples: [1, 2],
      },
    ],
  };

  it('should format a text table', () => {
    expect(formatBenchmarkResults(suite)).toBe(
      'secp256k1-core benchmark (v20.0.0, 2026-01-02T03:04:05.000Z)\n' +
        'point_add      mean 1.500 ms ± 0.250 (min 1.000, max 2.000)'
    );
  });

  it('should export JSON that parses back to the suite', () => {
    const json = exportBenchmarkResults(suite);
    expect(JSON.parse(json)).toEqual(suite);
    expect(json.split('\n')[1]).toBe('  "timestamp": "2026-01-02T03:04:05.000Z",');
  });
});
