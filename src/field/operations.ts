/**
 * Field Arithmetic Operations
 *
 * This module provides core field arithmetic operations including addition,
 * subtraction, multiplication, negation, exponentiation, inversion and
 * division. Every result is reduced back into [0, modulus).
 */

import type { FieldElement } from '../types.js';
import {
  divisionByZeroError,
  fieldMismatchError,
  invalidExponentError,
} from '../errors.js';
import { fieldConfigsEqual } from './config.js';
import {
  createOneFieldElement,
  createZeroFieldElement,
  isZeroFieldElement,
  reduceToFieldElement,
} from './element.js';

function assertSameField(a: FieldElement, b: FieldElement, operation: string): void {
  if (!fieldConfigsEqual(a.field, b.field)) {
    throw fieldMismatchError(operation, a.field.modulus.toString(), b.field.modulus.toString());
  }
}

/**
 * Field addition: (a + b) mod p
 *
 * @throws CurveError (FIELD_MISMATCH) if the operands have different moduli
 */
export function fieldAdd(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b, 'add');

  let sum = a.value + b.value;
  if (sum >= a.field.modulus) {
    sum -= a.field.modulus;
  }

  return reduceToFieldElement(sum, a.field);
}

/**
 * Field subtraction: (a - b) mod p
 *
 * @throws CurveError (FIELD_MISMATCH) if the operands have different moduli
 */
export function fieldSub(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b, 'subtract');

  let diff = a.value - b.value;
  if (diff < 0n) {
    diff += a.field.modulus;
  }

  return reduceToFieldElement(diff, a.field);
}

/**
 * Field negation: -a mod p
 */
export function fieldNeg(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    return createZeroFieldElement(a.field);
  }
  return reduceToFieldElement(a.field.modulus - a.value, a.field);
}

/**
 * Field multiplication: (a * b) mod p
 *
 * @throws CurveError (FIELD_MISMATCH) if the operands have different moduli
 */
export function fieldMul(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b, 'multiply');
  return reduceToFieldElement(a.value * b.value, a.field);
}

/**
 * Field squaring: a² mod p
 */
export function fieldSquare(a: FieldElement): FieldElement {
  return reduceToFieldElement(a.value * a.value, a.field);
}

/**
 * Field exponentiation: a^exp mod p
 *
 * Square-and-multiply over the bits of the exponent, least significant
 * first: O(log exp) multiplications. 0^0 is 1.
 *
 * @param a - The base
 * @param exp - The exponent (non-negative)
 * @throws CurveError (INVALID_EXPONENT) if exp is negative
 */
export function fieldPow(a: FieldElement, exp: bigint): FieldElement {
  if (exp < 0n) {
    throw invalidExponentError(exp.toString());
  }

  if (exp === 0n) {
    return reduceToFieldElement(1n, a.field);
  }

  if (isZeroFieldElement(a)) {
    return createZeroFieldElement(a.field);
  }

  let result = createOneFieldElement(a.field);
  let base = a;
  let e = exp;

  while (e > 0n) {
    if ((e & 1n) === 1n) {
      result = fieldMul(result, base);
    }
    base = fieldSquare(base);
    e >>= 1n;
  }

  return result;
}

/**
 * Field inversion: a^(-1) mod p
 *
 * Uses Fermat's little theorem, a^(p-2). The modulus must be prime.
 *
 * @param a - The operand (must be non-zero)
 * @throws CurveError (DIVISION_BY_ZERO) if a is zero
 */
export function fieldInv(a: FieldElement): FieldElement {
  if (isZeroFieldElement(a)) {
    throw divisionByZeroError('inverse');
  }
  return fieldPow(a, a.field.modulus - 2n);
}

/**
 * Field division: a / b mod p
 *
 * Computes a * b^(-1) mod p.
 *
 * @param a - Numerator
 * @param b - Denominator (must be non-zero)
 * @throws CurveError if b is zero or the moduli differ
 */
export function fieldDiv(a: FieldElement, b: FieldElement): FieldElement {
  assertSameField(a, b, 'divide');
  if (isZeroFieldElement(b)) {
    throw divisionByZeroError('divide');
  }
  return fieldMul(a, fieldInv(b));
}
