/**
 * Library configuration
 *
 * Global settings with defaults taken from the environment. Debug output is
 * enabled by SECP256K1_CORE_DEBUG=1 (or "true"), or by a DEBUG variable that
 * mentions secp256k1-core.
 */

import { invalidConfigError } from './errors.js';

/**
 * Global library configuration options
 *
 * @example
 * ```typescript
 * import { configure } from 'secp256k1-core';
 *
 * configure({ debug: true, benchmarkIterations: 5 });
 * ```
 */
export interface Secp256k1CoreConfig {
  /** Enable debug logging (default: from environment, else false) */
  debug?: boolean;
  /** Timed iterations per benchmark (default: 10) */
  benchmarkIterations?: number;
}

function debugFromEnv(): boolean {
  const debugEnv = process.env['DEBUG'];
  const coreDebugEnv = process.env['SECP256K1_CORE_DEBUG'];
  return (
    debugEnv?.includes('secp256k1-core') === true ||
    coreDebugEnv === '1' ||
    coreDebugEnv === 'true'
  );
}

function defaultConfig(): Required<Secp256k1CoreConfig> {
  return {
    debug: debugFromEnv(),
    benchmarkIterations: 10,
  };
}

let globalConfig: Required<Secp256k1CoreConfig> = defaultConfig();

/**
 * Configure global library settings
 *
 * @throws CurveError if benchmarkIterations is not a positive integer
 */
export function configure(config: Secp256k1CoreConfig): void {
  const iterations = config.benchmarkIterations;
  if (iterations !== undefined && (!Number.isInteger(iterations) || iterations <= 0)) {
    throw invalidConfigError('benchmarkIterations', iterations);
  }
  globalConfig = {
    debug: config.debug ?? globalConfig.debug,
    benchmarkIterations: iterations ?? globalConfig.benchmarkIterations,
  };
}

/**
 * Get the current library configuration
 */
export function getConfig(): Readonly<Required<Secp256k1CoreConfig>> {
  return { ...globalConfig };
}

/**
 * Reset configuration to defaults (re-reads the environment)
 */
export function resetConfig(): void {
  globalConfig = defaultConfig();
}
