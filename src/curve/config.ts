/**
 * Curve Configuration
 *
 * Curve parameters (a, b) for y² = x³ + ax + b over any arithmetic. The
 * parameters are held at runtime and referenced by every point built on
 * them; they are checked once when a point is constructed, not on every
 * operation.
 */

import type { Arithmetic, CurveParams, FieldConfig, FieldElement } from '../types.js';
import { createFieldArithmetic } from '../field/arithmetic.js';
import { createFieldElement } from '../field/element.js';

/**
 * Create curve parameters
 *
 * @example
 * ```typescript
 * // y² = x³ + 5x + 7 over the integers
 * const curve = createCurve(5, 7, INT32_ARITHMETIC);
 * ```
 */
export function createCurve<T>(
  a: T,
  b: T,
  arithmetic: Arithmetic<T>,
  name?: string
): CurveParams<T> {
  const params: CurveParams<T> = name === undefined ? { a, b, arithmetic } : { a, b, arithmetic, name };
  return Object.freeze(params);
}

/**
 * Create curve parameters over a prime field from bigint coefficients
 *
 * @throws CurveError if a or b is outside [0, modulus)
 */
export function createFieldCurve(
  a: bigint,
  b: bigint,
  field: FieldConfig,
  name?: string
): CurveParams<FieldElement> {
  return createCurve(
    createFieldElement(a, field),
    createFieldElement(b, field),
    createFieldArithmetic(field),
    name
  );
}

/**
 * Two curves are the same when they share a number system and both
 * coefficients agree
 */
export function curvesEqual<T>(c1: CurveParams<T>, c2: CurveParams<T>): boolean {
  if (c1 === c2) {
    return true;
  }
  return (
    c1.arithmetic.name === c2.arithmetic.name &&
    c1.arithmetic.equals(c1.a, c2.a) &&
    c1.arithmetic.equals(c1.b, c2.b)
  );
}

/**
 * Describe a curve for error messages and logs
 */
export function describeCurve<T>(curve: CurveParams<T>): string {
  const { arithmetic, a, b } = curve;
  const equation = `y² = x³ + ${arithmetic.format(a)}x + ${arithmetic.format(b)} over ${arithmetic.name}`;
  return curve.name === undefined ? equation : `${curve.name} (${equation})`;
}
