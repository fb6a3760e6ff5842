/**
 * secp256k1-core
 *
 * Generic finite-field arithmetic and the elliptic-curve point group built
 * on it, with the secp256k1 parameter set.
 *
 * @example
 * ```typescript
 * import {
 *   createFieldConfig,
 *   createFieldCurve,
 *   createFieldElement,
 *   pointAt,
 *   pointAdd,
 *   getSecp256k1,
 *   scalarMul,
 * } from 'secp256k1-core';
 *
 * // y² = x³ + 7 over F_223
 * const f223 = createFieldConfig(223n);
 * const curve = createFieldCurve(0n, 7n, f223);
 * const p = pointAt(curve, createFieldElement(192n, f223), createFieldElement(105n, f223));
 * const q = pointAt(curve, createFieldElement(17n, f223), createFieldElement(56n, f223));
 * const sum = pointAdd(p, q); // (170, 142)
 *
 * // secp256k1
 * const { generator } = getSecp256k1();
 * const publicPoint = scalarMul(12345n, generator);
 * ```
 *
 * @packageDocumentation
 */

// Core types
export type {
  Arithmetic,
  FieldConfig,
  FieldElement,
  CurveParams,
  InfinityPoint,
  AffinePoint,
  InvalidPoint,
  CurvePoint,
  Scalar,
} from './types.js';

// Configuration and logging
export { configure, getConfig, resetConfig, type Secp256k1CoreConfig } from './config.js';
export { createLogger, type DebugLogger } from './logger.js';

// Errors
export * from './errors.js';

// Integer arithmetic
export { INT32_ARITHMETIC, BIGINT_ARITHMETIC } from './numeric/integer.js';

// Finite fields
export * from './field/index.js';

// Curves, points and secp256k1
export * from './curve/index.js';

// Benchmarks
export * from './benchmark/index.js';
