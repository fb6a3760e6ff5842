/**
 * Elliptic Curve Operations
 *
 * This module provides the affine group law: point addition with all of its
 * special cases, doubling, negation, and double-and-add scalar
 * multiplication. All of it is generic over the curve's arithmetic.
 */

import type { CurvePoint, Scalar } from '../types.js';
import { curveMismatchError, invalidScalarError } from '../errors.js';
import { curvesEqual, describeCurve } from './config.js';
import { infinity, invalidPoint, unsafeAffinePoint } from './point.js';

/**
 * Add two points
 *
 * Cases, in order:
 * 1. Different curve parameters throw CURVE_MISMATCH
 * 2. invalid + anything = invalid
 * 3. infinity + Q = Q, P + infinity = P
 * 4. Same x, different y: P and Q are inverses, the sum is infinity
 * 5. P == Q with y = 0: vertical tangent, the sum is infinity
 * 6. Otherwise the chord (P != Q) or tangent (P == Q) slope s gives
 *    x' = s² - x1 - x2, y' = s(x1 - x') - y1
 *
 * @throws CurveError (CURVE_MISMATCH) if the points belong to different curves
 */
export function pointAdd<T>(p: CurvePoint<T>, q: CurvePoint<T>): CurvePoint<T> {
  const curve = p.curve;
  if (!curvesEqual(curve, q.curve)) {
    throw curveMismatchError(describeCurve(curve), describeCurve(q.curve));
  }

  if (p.kind === 'invalid' || q.kind === 'invalid') {
    return invalidPoint(curve);
  }
  if (p.kind === 'infinity') {
    return q;
  }
  if (q.kind === 'infinity') {
    return p;
  }

  const ar = curve.arithmetic;
  const sameX = ar.equals(p.x, q.x);

  if (sameX && !ar.equals(p.y, q.y)) {
    return infinity(curve);
  }

  let s: T;
  if (sameX) {
    if (ar.equals(p.y, ar.fromInteger(0))) {
      return infinity(curve);
    }
    // Tangent: (3x² + a) / 2y
    const numerator = ar.add(ar.mul(ar.fromInteger(3), ar.mul(p.x, p.x)), curve.a);
    s = ar.div(numerator, ar.mul(ar.fromInteger(2), p.y));
  } else {
    // Chord: (y2 - y1) / (x2 - x1)
    s = ar.div(ar.sub(q.y, p.y), ar.sub(q.x, p.x));
  }

  const x = ar.sub(ar.sub(ar.mul(s, s), p.x), q.x);
  const y = ar.sub(ar.mul(s, ar.sub(p.x, x)), p.y);

  return unsafeAffinePoint(curve, x, y);
}

/**
 * Double a point
 */
export function pointDouble<T>(point: CurvePoint<T>): CurvePoint<T> {
  return pointAdd(point, point);
}

/**
 * Negate a point: (x, y) → (x, -y)
 *
 * Infinity and invalid points map to themselves.
 */
export function pointNegate<T>(point: CurvePoint<T>): CurvePoint<T> {
  if (point.kind !== 'affine') {
    return point;
  }
  const ar = point.curve.arithmetic;
  return unsafeAffinePoint(point.curve, point.x, ar.sub(ar.fromInteger(0), point.y));
}

/**
 * Subtract a point: P - Q = P + (-Q)
 */
export function pointSub<T>(p: CurvePoint<T>, q: CurvePoint<T>): CurvePoint<T> {
  return pointAdd(p, pointNegate(q));
}

/**
 * Scalar multiplication using double-and-add
 *
 * Walks the bits of the scalar from least significant, adding the running
 * double whenever a bit is set; mirrors square-and-multiply in the field.
 *
 * @param scalar - Non-negative multiplier
 * @param point - The point to multiply
 * @throws CurveError (INVALID_SCALAR) if the scalar is negative
 */
export function scalarMul<T>(scalar: Scalar, point: CurvePoint<T>): CurvePoint<T> {
  if (scalar < 0n) {
    throw invalidScalarError(scalar.toString());
  }

  if (point.kind === 'invalid') {
    return point;
  }

  let result: CurvePoint<T> = infinity(point.curve);
  if (scalar === 0n || point.kind === 'infinity') {
    return result;
  }

  let base: CurvePoint<T> = point;
  let k = scalar;

  while (k > 0n) {
    if ((k & 1n) === 1n) {
      result = pointAdd(result, base);
    }
    k >>= 1n;
    // no doubling past the top bit
    if (k > 0n) {
      base = pointDouble(base);
    }
  }

  return result;
}
