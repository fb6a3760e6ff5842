import { describe, it, expect } from 'vitest';
import { CurveError, ErrorCode } from '../errors.js';
import { SECP256K1_FIELD } from '../field/config.js';
import { createFieldElement } from '../field/element.js';
import { createFieldCurve } from './config.js';
import { isAffine, pointsEqual } from './point.js';
import { pointAdd, pointNegate, scalarMul } from './operations.js';
import {
  SECP256K1_GX,
  SECP256K1_GY,
  SECP256K1_N,
  SECP256K1_P,
  getSecp256k1,
  validateCurveParameters,
} from './secp256k1.js';
import { expectFieldAffine, expectInfinity } from '../test-utils/index.js';

const TWO_G_X = 0xc6047f9441ed7d6d3045406e95c07cd85c778e4b8cef3ca7abac09b95c709ee5n;
const TWO_G_Y = 0x1ae168fea63dc339a3c58419466ceaeef7f632653266d0e1236431a950cfe52an;

describe('secp256k1 constants', () => {
  it('should use p = 2^256 - 2^32 - 977', () => {
    expect(SECP256K1_P).toBe(2n ** 256n - 2n ** 32n - 977n);
  });

  it('should have a group order below p', () => {
    expect(SECP256K1_N < SECP256K1_P).toBe(true);
    expect(SECP256K1_N).toBe(
      0xfffffffffffffffffffffffffffffffebaaedce6af48a03bbfd25e8cd0364141n
    );
  });
});

describe('getSecp256k1', () => {
  it('should return the same validated instance on every call', () => {
    const first = getSecp256k1();
    expect(getSecp256k1()).toBe(first);
    expect(first.curve.name).toBe('secp256k1');
    expect(first.order).toBe(SECP256K1_N);
    expect(first.field).toBe(SECP256K1_FIELD);
  });

  it('should expose the generator as an affine point', () => {
    const { generator } = getSecp256k1();
    expect(isAffine(generator)).toBe(true);
    expect(generator.x.value).toBe(SECP256K1_GX);
    expect(generator.y.value).toBe(SECP256K1_GY);
  });

  it('should compute 2G', () => {
    const { generator } = getSecp256k1();
    expectFieldAffine(pointAdd(generator, generator), TWO_G_X, TWO_G_Y);
    expectFieldAffine(scalarMul(2n, generator), TWO_G_X, TWO_G_Y);
  });

  it('should satisfy N·G = ∞', () => {
    const { generator, order } = getSecp256k1();
    expectInfinity(scalarMul(order, generator));
  });

  it('should satisfy (N - 1)·G = -G', () => {
    const { generator, order } = getSecp256k1();
    expect(pointsEqual(scalarMul(order - 1n, generator), pointNegate(generator))).toBe(true);
  });
});

describe('validateCurveParameters', () => {
  const curve = createFieldCurve(0n, 7n, SECP256K1_FIELD);
  const gx = createFieldElement(SECP256K1_GX, SECP256K1_FIELD);
  const gy = createFieldElement(SECP256K1_GY, SECP256K1_FIELD);

  function checkError(fn: () => unknown): CurveError | undefined {
    try {
      fn();
    } catch (error) {
      return error instanceof CurveError ? error : undefined;
    }
    return undefined;
  }

  it('should accept the real parameters', () => {
    expectFieldAffine(validateCurveParameters(curve, gx, gy, SECP256K1_N), SECP256K1_GX, SECP256K1_GY);
  });

  it('should reject a wrong order', () => {
    const error = checkError(() => validateCurveParameters(curve, gx, gy, SECP256K1_N - 1n));
    expect(error?.code).toBe(ErrorCode.CURVE_PARAMETER_CHECK_FAILED);
    expect(error?.details?.['reason']).toBe('order times generator is not the point at infinity');
  });

  it('should reject a generator off the curve', () => {
    const badY = createFieldElement(SECP256K1_GY + 1n, SECP256K1_FIELD);
    const error = checkError(() => validateCurveParameters(curve, gx, badY, SECP256K1_N));
    expect(error?.code).toBe(ErrorCode.CURVE_PARAMETER_CHECK_FAILED);
    expect(error?.details?.['reason']).toBe('generator is not on the curve');
  });
});
