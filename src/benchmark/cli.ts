#!/usr/bin/env node
/**
 * Benchmark CLI
 *
 * Usage:
 *   npm run benchmark                       # text output
 *   npm run benchmark -- --json             # JSON output
 *   npm run benchmark -- --iterations=50    # more timed iterations
 */

import { configure, getConfig } from '../config.js';
import { exportBenchmarkResults, formatBenchmarkResults, runSecp256k1Benchmarks } from './runner.js';
import { DEFAULT_BENCHMARK_CONFIG } from './types.js';

function main(): void {
  const args = process.argv.slice(2);
  const isJson = args.includes('--json');
  const iterationsArg = args.find((arg) => arg.startsWith('--iterations='));

  try {
    if (iterationsArg !== undefined) {
      configure({ benchmarkIterations: Number(iterationsArg.slice('--iterations='.length)) });
    }

    const suite = runSecp256k1Benchmarks({
      ...DEFAULT_BENCHMARK_CONFIG,
      iterations: getConfig().benchmarkIterations,
    });

    console.log(isJson ? exportBenchmarkResults(suite) : formatBenchmarkResults(suite));
  } catch (error) {
    console.error('Benchmark failed:', error);
    process.exit(1);
  }
}

main();
