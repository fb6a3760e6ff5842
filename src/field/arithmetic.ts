/**
 * Field arithmetic capability
 *
 * Adapts the field operations to the Arithmetic interface so curves can be
 * drawn over a finite field.
 */

import type { Arithmetic, FieldConfig, FieldElement } from '../types.js';
import { fieldElementsEqual, formatFieldElement, reduceToFieldElement } from './element.js';
import { fieldAdd, fieldDiv, fieldMul, fieldSub } from './operations.js';

/**
 * Create the arithmetic capability for one field
 *
 * fromInteger reduces its argument into the field, so small constants such
 * as 2 and 3 work for any modulus.
 *
 * @example
 * ```typescript
 * const f19 = createFieldArithmetic(createFieldConfig(19n));
 * f19.div(f19.fromInteger(2), f19.fromInteger(7)); // FieldElement<19>(3)
 * ```
 */
export function createFieldArithmetic(field: FieldConfig): Arithmetic<FieldElement> {
  return Object.freeze({
    name: `field(${field.modulus})`,
    add: fieldAdd,
    sub: fieldSub,
    mul: fieldMul,
    div: fieldDiv,
    equals: fieldElementsEqual,
    fromInteger: (value: number) => reduceToFieldElement(BigInt(value), field),
    format: formatFieldElement,
  });
}
