/**
 * Property-based testing configuration and utilities
 *
 * This module provides configuration and helpers for property-based testing
 * using fast-check. All property tests should use these configurations to
 * ensure consistency across the test suite.
 */

import * as fc from 'fast-check';

/**
 * Standard configuration for property-based tests
 * - 100 iterations per property test
 * - Seed logging for reproducibility
 */
export const PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 100,
  verbose: true,
  seed: Date.now(), // Can be overridden for reproducibility
  endOnFailure: false,
};

/**
 * Configuration for properties whose every run does 256-bit curve
 * arithmetic (each addition costs a Fermat inversion)
 */
export const CURVE_PROPERTY_TEST_CONFIG: fc.Parameters<unknown> = {
  numRuns: 20,
  verbose: true,
  seed: Date.now(),
};

/**
 * A small prime for exhaustive-feeling tests
 */
export const F223_MODULUS = 223n;

/**
 * secp256k1 base field prime
 */
export const SECP256K1_MODULUS =
  0xfffffffffffffffffffffffffffffffffffffffffffffffffffffffefffffc2fn;

/**
 * Arbitrary generator for field values within a modulus
 * Generates random bigints in range [0, modulus)
 */
export function arbitraryFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 0n, max: modulus - 1n });
}

/**
 * Arbitrary generator for non-zero field values
 * Generates random bigints in range [1, modulus)
 */
export function arbitraryNonZeroFieldValue(modulus: bigint): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max: modulus - 1n });
}

/**
 * Arbitrary generator for small scalar values (for testing scalar multiplication)
 */
export function arbitrarySmallScalar(max: bigint = 1000n): fc.Arbitrary<bigint> {
  return fc.bigInt({ min: 1n, max });
}

/**
 * Arbitrary generator for a modulus/value pair drawn from a list of primes
 */
export function arbitraryPrimeAndValue(primes: readonly bigint[]): fc.Arbitrary<[bigint, bigint]> {
  return fc
    .constantFrom(...primes)
    .chain((p) => fc.tuple(fc.constant(p), arbitraryFieldValue(p)));
}

/**
 * Modular exponentiation using square-and-multiply (reference implementation)
 */
export function modPow(base: bigint, exp: bigint, modulus: bigint): bigint {
  if (modulus === 1n) return 0n;
  let result = 1n;
  base = base % modulus;
  while (exp > 0n) {
    if (exp % 2n === 1n) {
      result = (result * base) % modulus;
    }
    exp = exp / 2n;
    base = (base * base) % modulus;
  }
  return result;
}

/**
 * Modular inverse using the extended Euclidean algorithm (reference implementation)
 * Throws if gcd(a, modulus) != 1
 */
export function modInverse(a: bigint, modulus: bigint): bigint {
  if (a === 0n) {
    throw new Error('Cannot compute inverse of zero');
  }

  let [oldR, r] = [a % modulus, modulus];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const quotient = oldR / r;
    [oldR, r] = [r, oldR - quotient * r];
    [oldS, s] = [s, oldS - quotient * s];
  }

  if (oldR !== 1n) {
    throw new Error(`No modular inverse exists: gcd(${a}, ${modulus}) = ${oldR}`);
  }

  return ((oldS % modulus) + modulus) % modulus;
}
