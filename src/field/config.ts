/**
 * Field Configuration
 *
 * Field configurations for arbitrary moduli, and the two secp256k1 fields:
 * the base field (coordinates) and the scalar field (group order).
 */

import type { FieldConfig } from '../types.js';
import { invalidModulusError } from '../errors.js';

/**
 * Number of bits needed to represent a non-negative bigint
 */
export function bitLength(value: bigint): number {
  return value === 0n ? 0 : value.toString(2).length;
}

/**
 * Create a field configuration for a modulus
 *
 * The modulus is not checked for primality; division is only meaningful
 * when it is prime.
 *
 * @throws CurveError if the modulus is smaller than 2
 */
export function createFieldConfig(modulus: bigint, name?: string): FieldConfig {
  if (modulus < 2n) {
    throw invalidModulusError(modulus.toString());
  }
  const config: FieldConfig =
    name === undefined
      ? { modulus, bitLength: bitLength(modulus) }
      : { modulus, bitLength: bitLength(modulus), name };
  return Object.freeze(config);
}

/**
 * secp256k1 base field
 *
 * p = 2^256 - 2^32 - 977
 */
export const SECP256K1_FIELD: FieldConfig = createFieldConfig(
  0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2fn,
  'secp256k1'
);

/**
 * secp256k1 scalar field (order of the generator)
 */
export const SECP256K1_SCALAR_FIELD: FieldConfig = createFieldConfig(
  0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n,
  'secp256k1-scalar'
);

/**
 * Two configurations describe the same field when their moduli agree
 */
export function fieldConfigsEqual(a: FieldConfig, b: FieldConfig): boolean {
  return a === b || a.modulus === b.modulus;
}
