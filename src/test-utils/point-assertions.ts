/**
 * Curve point assertions for tests
 */

import { expect } from 'vitest';
import type { CurvePoint, FieldElement } from '../types.js';

/**
 * Assert that a point is affine with the given coordinates
 */
export function expectAffine<T>(point: CurvePoint<T>, x: T, y: T): void {
  expect(point.kind).toBe('affine');
  if (point.kind === 'affine') {
    expect(point.x).toEqual(x);
    expect(point.y).toEqual(y);
  }
}

/**
 * Assert that a field point is affine with the given residues
 */
export function expectFieldAffine(point: CurvePoint<FieldElement>, x: bigint, y: bigint): void {
  expect(point.kind).toBe('affine');
  if (point.kind === 'affine') {
    expect(point.x.value).toBe(x);
    expect(point.y.value).toBe(y);
  }
}

/**
 * Assert that a point is the point at infinity
 */
export function expectInfinity<T>(point: CurvePoint<T>): void {
  expect(point.kind).toBe('infinity');
}
