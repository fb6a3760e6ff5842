/**
 * Benchmark Module
 *
 * Timing runner for the secp256k1 hot paths.
 */

export * from './types.js';
export {
  calculateStats,
  runBenchmark,
  runSecp256k1Benchmarks,
  exportBenchmarkResults,
  formatBenchmarkResults,
} from './runner.js';
