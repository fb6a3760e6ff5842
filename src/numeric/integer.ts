/**
 * Integer Arithmetic
 *
 * Arithmetic capabilities over plain integers, for curves drawn over the
 * integers rather than a finite field:
 * - INT32_ARITHMETIC: fixed-width signed 32-bit values, failing on overflow
 * - BIGINT_ARITHMETIC: unbounded signed integers
 *
 * Division truncates toward zero in both.
 */

import type { Arithmetic } from '../types.js';
import { divisionByZeroError, integerOverflowError } from '../errors.js';

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

/**
 * Check that a result fits in 32 bits. Also folds -0 into 0.
 */
function checkedInt32(result: number, operation: string): number {
  if (!Number.isInteger(result) || result < INT32_MIN || result > INT32_MAX) {
    throw integerOverflowError(operation, String(result));
  }
  return result === 0 ? 0 : result;
}

/**
 * Fixed-width signed 32-bit integer arithmetic
 *
 * Any product above 2^31 in magnitude overflows, so a product that has lost
 * precision as a double is still reported as overflow.
 */
export const INT32_ARITHMETIC: Arithmetic<number> = Object.freeze({
  name: 'int32',
  add: (a: number, b: number) => checkedInt32(a + b, 'add'),
  sub: (a: number, b: number) => checkedInt32(a - b, 'sub'),
  mul: (a: number, b: number) => checkedInt32(a * b, 'mul'),
  div: (a: number, b: number) => {
    if (b === 0) {
      throw divisionByZeroError('div');
    }
    return checkedInt32(Math.trunc(a / b), 'div');
  },
  equals: (a: number, b: number) => a === b,
  fromInteger: (value: number) => checkedInt32(value, 'fromInteger'),
  format: (value: number) => String(value),
});

/**
 * Unbounded signed integer arithmetic
 */
export const BIGINT_ARITHMETIC: Arithmetic<bigint> = Object.freeze({
  name: 'bigint',
  add: (a: bigint, b: bigint) => a + b,
  sub: (a: bigint, b: bigint) => a - b,
  mul: (a: bigint, b: bigint) => a * b,
  div: (a: bigint, b: bigint) => {
    if (b === 0n) {
      throw divisionByZeroError('div');
    }
    return a / b;
  },
  equals: (a: bigint, b: bigint) => a === b,
  fromInteger: (value: number) => BigInt(value),
  format: (value: bigint) => value.toString(),
});
