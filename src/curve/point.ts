/**
 * Curve Points
 *
 * Points are one of three variants:
 * - infinity: the group identity, no coordinates
 * - affine: (x, y) satisfying the curve equation
 * - invalid: coordinates that failed the membership check
 *
 * pointAt never throws for off-curve input; it returns an invalid point,
 * and invalid points stay invalid through every operation.
 */

import type {
  AffinePoint,
  CurveParams,
  CurvePoint,
  InfinityPoint,
  InvalidPoint,
} from '../types.js';
import { invalidCurvePointError } from '../errors.js';
import { curvesEqual, describeCurve } from './config.js';

/**
 * Check that (x, y) satisfies y² = x³ + ax + b
 */
export function containsPoint<T>(curve: CurveParams<T>, x: T, y: T): boolean {
  const { arithmetic: ar, a, b } = curve;
  const lhs = ar.mul(y, y);
  const rhs = ar.add(ar.add(ar.mul(ar.mul(x, x), x), ar.mul(a, x)), b);
  return ar.equals(lhs, rhs);
}

/**
 * Create a point from coordinates, validated against the curve
 *
 * @returns An affine point, or an invalid point if (x, y) is not on the curve
 */
export function pointAt<T>(curve: CurveParams<T>, x: T, y: T): AffinePoint<T> | InvalidPoint<T> {
  if (!containsPoint(curve, x, y)) {
    return invalidPoint(curve);
  }
  return unsafeAffinePoint(curve, x, y);
}

/**
 * Create an affine point without checking the curve equation
 *
 * Only for results of the group law, which stay on the curve by construction.
 * Not part of the package entry.
 */
export function unsafeAffinePoint<T>(curve: CurveParams<T>, x: T, y: T): AffinePoint<T> {
  const point: AffinePoint<T> = { kind: 'affine', curve, x, y };
  return Object.freeze(point);
}

/**
 * The point at infinity (identity) of a curve
 */
export function infinity<T>(curve: CurveParams<T>): InfinityPoint<T> {
  const point: InfinityPoint<T> = { kind: 'infinity', curve };
  return Object.freeze(point);
}

/**
 * The invalid-point sentinel of a curve
 */
export function invalidPoint<T>(curve: CurveParams<T>): InvalidPoint<T> {
  const point: InvalidPoint<T> = { kind: 'invalid', curve };
  return Object.freeze(point);
}

/**
 * Type guard for the point at infinity
 */
export function isInfinity<T>(point: CurvePoint<T>): point is InfinityPoint<T> {
  return point.kind === 'infinity';
}

/**
 * Type guard for affine points
 */
export function isAffine<T>(point: CurvePoint<T>): point is AffinePoint<T> {
  return point.kind === 'affine';
}

/**
 * Type guard for invalid points
 */
export function isInvalid<T>(point: CurvePoint<T>): point is InvalidPoint<T> {
  return point.kind === 'invalid';
}

/**
 * Narrow a point to a usable one, throwing on the invalid sentinel
 *
 * @throws CurveError (INVALID_CURVE_POINT) if the point is invalid
 */
export function validateCurvePoint<T>(
  point: CurvePoint<T>
): AffinePoint<T> | InfinityPoint<T> {
  if (isInvalid(point)) {
    throw invalidCurvePointError(describeCurve(point.curve));
  }
  return point;
}

/**
 * Check if two points are equal
 *
 * Points on different curves are never equal. On the same curve, compares
 * variant and coordinates; invalid equals invalid.
 */
export function pointsEqual<T>(p: CurvePoint<T>, q: CurvePoint<T>): boolean {
  if (!curvesEqual(p.curve, q.curve)) {
    return false;
  }
  if (p.kind === 'affine' && q.kind === 'affine') {
    const ar = p.curve.arithmetic;
    return ar.equals(p.x, q.x) && ar.equals(p.y, q.y);
  }
  return p.kind === q.kind;
}

/**
 * Format a point for display
 *
 * @example
 * ```typescript
 * formatPoint(pointAt(curve, 18, 77)); // 'Point(18, 77)'
 * ```
 */
export function formatPoint<T>(point: CurvePoint<T>): string {
  switch (point.kind) {
    case 'infinity':
      return 'Infinity';
    case 'invalid':
      return 'Invalid';
    case 'affine': {
      const ar = point.curve.arithmetic;
      return `Point(${ar.format(point.x)}, ${ar.format(point.y)})`;
    }
  }
}
