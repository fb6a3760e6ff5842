/**
 * Test utilities for secp256k1-core
 *
 * - Property-based testing configuration and arbitraries
 * - Curve point assertions
 */

// Property-based testing utilities
export * from './property-test-config.js';

// Curve point assertions
export * from './point-assertions.js';
