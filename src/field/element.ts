/**
 * Field Element Implementation
 *
 * This module provides field element creation and inspection functions.
 * Elements hold their residue as a bigint in canonical form.
 */

import type { FieldConfig, FieldElement } from '../types.js';
import { invalidResidueError } from '../errors.js';

/**
 * Create a field element from a bigint value
 *
 * Unlike the arithmetic operations, construction does not reduce: the value
 * must already lie in [0, modulus).
 *
 * @param value - The residue
 * @param field - The field configuration
 * @returns A new field element
 * @throws CurveError (INVALID_RESIDUE) if the value is out of range
 */
export function createFieldElement(value: bigint, field: FieldConfig): FieldElement {
  if (value < 0n || value >= field.modulus) {
    throw invalidResidueError(value.toString(), field.modulus.toString());
  }
  return Object.freeze({ value, field });
}

/**
 * Create a field element from any bigint by reducing it into [0, modulus)
 */
export function reduceToFieldElement(value: bigint, field: FieldConfig): FieldElement {
  let reduced = value % field.modulus;
  if (reduced < 0n) {
    reduced += field.modulus;
  }
  return Object.freeze({ value: reduced, field });
}

/**
 * Create a field element from a hex string
 *
 * @param hex - The hex string (with or without '0x' prefix)
 * @param field - The field configuration
 * @returns A new field element
 * @throws CurveError if the value exceeds the modulus
 */
export function createFieldElementFromHex(hex: string, field: FieldConfig): FieldElement {
  const cleanHex = hex.startsWith('0x') ? hex.slice(2) : hex;
  return createFieldElement(BigInt('0x' + cleanHex), field);
}

/**
 * Create the zero element for a field
 */
export function createZeroFieldElement(field: FieldConfig): FieldElement {
  return Object.freeze({ value: 0n, field });
}

/**
 * Create the one element (multiplicative identity) for a field
 */
export function createOneFieldElement(field: FieldConfig): FieldElement {
  return Object.freeze({ value: 1n, field });
}

/**
 * Check if a field element is zero
 */
export function isZeroFieldElement(element: FieldElement): boolean {
  return element.value === 0n;
}

/**
 * Check if a field element is one
 */
export function isOneFieldElement(element: FieldElement): boolean {
  return element.value === 1n;
}

/**
 * Check if two field elements are equal
 *
 * Elements of different fields are never equal.
 */
export function fieldElementsEqual(a: FieldElement, b: FieldElement): boolean {
  return a.field.modulus === b.field.modulus && a.value === b.value;
}

/**
 * Format as FieldElement<modulus>(value)
 */
export function formatFieldElement(element: FieldElement): string {
  return `FieldElement<${element.field.modulus}>(${element.value})`;
}
