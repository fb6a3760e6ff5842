/**
 * Core type definitions for secp256k1-core
 *
 * This module defines the fundamental types used throughout the library
 * for finite field arithmetic and elliptic curve operations.
 *
 * @module types
 */

/**
 * Arithmetic capability over a number type
 *
 * The curve code never touches machine arithmetic directly; it goes through
 * one of these. Implementations exist for fixed-width 32-bit integers,
 * unbounded bigints and the elements of a prime field.
 *
 * @example
 * ```typescript
 * import { createFieldArithmetic, createFieldConfig } from 'secp256k1-core';
 *
 * const f223 = createFieldArithmetic(createFieldConfig(223n));
 * const three = f223.fromInteger(3);
 * ```
 */
export interface Arithmetic<T> {
  /** Identifies the number system; curves over different systems never compare equal */
  readonly name: string;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  div(a: T, b: T): T;
  equals(a: T, b: T): boolean;
  /** Convert a small integer constant (0, 2, 3, ...) into this number type */
  fromInteger(value: number): T;
  format(value: T): string;
}

/**
 * Field configuration for finite field arithmetic
 *
 * @example
 * ```typescript
 * const field: FieldConfig = { modulus: 223n, bitLength: 8 };
 * ```
 */
export interface FieldConfig {
  /** The prime modulus p of the field F_p */
  readonly modulus: bigint;
  /** Number of bits needed to represent the modulus */
  readonly bitLength: number;
  /** Optional human-readable name */
  readonly name?: string;
}

/**
 * Field element
 *
 * The residue is kept in canonical form, 0 <= value < field.modulus.
 */
export interface FieldElement {
  readonly value: bigint;
  /** The field configuration this element belongs to */
  readonly field: FieldConfig;
}

/**
 * Curve parameters for y² = x³ + ax + b over an arithmetic
 */
export interface CurveParams<T> {
  readonly a: T;
  readonly b: T;
  readonly arithmetic: Arithmetic<T>;
  readonly name?: string;
}

/**
 * The point at infinity (group identity)
 */
export interface InfinityPoint<T> {
  readonly kind: 'infinity';
  readonly curve: CurveParams<T>;
}

/**
 * Affine point (x, y) on the curve
 */
export interface AffinePoint<T> {
  readonly kind: 'affine';
  readonly curve: CurveParams<T>;
  readonly x: T;
  readonly y: T;
}

/**
 * Coordinates that failed the curve-membership check
 *
 * Returned by the validating constructor instead of throwing, and carried
 * through every operation it takes part in.
 */
export interface InvalidPoint<T> {
  readonly kind: 'invalid';
  readonly curve: CurveParams<T>;
}

/**
 * Any curve point
 */
export type CurvePoint<T> = InfinityPoint<T> | AffinePoint<T> | InvalidPoint<T>;

/**
 * Scalar for point multiplication (non-negative)
 */
export type Scalar = bigint;
