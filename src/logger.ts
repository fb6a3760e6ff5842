/**
 * Debug logging
 *
 * Messages go through console.debug and are only written while debug output
 * is enabled in the library configuration.
 */

import { getConfig } from './config.js';

export type DebugLogger = (message: string, data?: Record<string, unknown>) => void;

/**
 * Create a debug logger for one part of the library
 *
 * @param scope - Appears in the prefix as [secp256k1-core:scope]
 */
export function createLogger(scope: string): DebugLogger {
  return (message, data) => {
    if (!getConfig().debug) {
      return;
    }
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [secp256k1-core:${scope}]`;
    if (data) {
      console.debug(`${prefix} ${message}`, data);
    } else {
      console.debug(`${prefix} ${message}`);
    }
  };
}
