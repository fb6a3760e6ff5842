/**
 * Property-Based Tests for Elliptic Curve Group Properties
 *
 * - Identity: P + ∞ = P
 * - Inverse: P + (-P) = ∞
 * - Commutativity and associativity of addition
 * - Doubling: double(P) = P + P
 * - Scalar multiplication distributes over scalar addition and agrees with
 *   repeated addition
 */

import { describe, it } from 'vitest';
import * as fc from 'fast-check';
import {
  CURVE_PROPERTY_TEST_CONFIG,
  F223_MODULUS,
  PROPERTY_TEST_CONFIG,
  arbitrarySmallScalar,
} from '../test-utils/property-test-config.js';
import { createFieldConfig } from '../field/config.js';
import { createFieldElement } from '../field/element.js';
import { createFieldCurve } from './config.js';
import { infinity, isInfinity, pointAt, pointsEqual } from './point.js';
import { pointAdd, pointDouble, pointNegate, scalarMul } from './operations.js';
import { getSecp256k1 } from './secp256k1.js';
import type { AffinePoint, CurvePoint, FieldElement } from '../types.js';

interface GroupUnderTest {
  generator: AffinePoint<FieldElement>;
  scalar: fc.Arbitrary<bigint>;
  params: fc.Parameters<unknown>;
}

function toyGroup(): GroupUnderTest {
  const field = createFieldConfig(F223_MODULUS);
  const curve = createFieldCurve(0n, 7n, field);
  const generator = pointAt(curve, createFieldElement(47n, field), createFieldElement(71n, field));
  if (generator.kind !== 'affine') {
    throw new Error('(47, 71) should lie on y² = x³ + 7 over F223');
  }
  // (47, 71) generates a subgroup of order 21
  return { generator, scalar: arbitrarySmallScalar(60n), params: PROPERTY_TEST_CONFIG };
}

function secp256k1Group(): GroupUnderTest {
  return {
    generator: getSecp256k1().generator,
    scalar: fc.bigInt({ min: 1n, max: (1n << 64n) - 1n }),
    params: CURVE_PROPERTY_TEST_CONFIG,
  };
}

const GROUPS: Array<[string, () => GroupUnderTest]> = [
  ['y² = x³ + 7 over F223', toyGroup],
  ['secp256k1', secp256k1Group],
];

describe('Elliptic Curve Group Properties', () => {
  describe.each(GROUPS)('%s', (_name, build) => {
    const { generator, scalar, params } = build();
    const arbitraryPoint: fc.Arbitrary<CurvePoint<FieldElement>> = scalar.map((k) =>
      scalarMul(k, generator)
    );

    // Property: identity
    it('should satisfy P + ∞ = P and ∞ + P = P', () => {
      fc.assert(
        fc.property(arbitraryPoint, (p) => {
          const ifty = infinity(generator.curve);
          return pointsEqual(pointAdd(p, ifty), p) && pointsEqual(pointAdd(ifty, p), p);
        }),
        params
      );
    });

    // Property: inverse
    it('should satisfy P + (-P) = ∞', () => {
      fc.assert(
        fc.property(arbitraryPoint, (p) => isInfinity(pointAdd(p, pointNegate(p)))),
        params
      );
    });

    // Property: commutativity
    it('should satisfy P + Q = Q + P', () => {
      fc.assert(
        fc.property(arbitraryPoint, arbitraryPoint, (p, q) =>
          pointsEqual(pointAdd(p, q), pointAdd(q, p))
        ),
        params
      );
    });

    // Property: associativity
    it('should satisfy (P + Q) + R = P + (Q + R)', () => {
      fc.assert(
        fc.property(arbitraryPoint, arbitraryPoint, arbitraryPoint, (p, q, r) =>
          pointsEqual(pointAdd(pointAdd(p, q), r), pointAdd(p, pointAdd(q, r)))
        ),
        params
      );
    });

    // Property: doubling
    it('should satisfy double(P) = P + P = 2P', () => {
      fc.assert(
        fc.property(arbitraryPoint, (p) => {
          const doubled = pointDouble(p);
          return pointsEqual(doubled, pointAdd(p, p)) && pointsEqual(doubled, scalarMul(2n, p));
        }),
        params
      );
    });

    // Property: distributivity over scalar addition
    it('should satisfy (a + b)G = aG + bG', () => {
      fc.assert(
        fc.property(scalar, scalar, (a, b) =>
          pointsEqual(
            scalarMul(a + b, generator),
            pointAdd(scalarMul(a, generator), scalarMul(b, generator))
          )
        ),
        params
      );
    });

    // Property: agreement with repeated addition
    it('should agree with repeated addition for small scalars', () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 25 }), (k) => {
          let expected: CurvePoint<FieldElement> = infinity(generator.curve);
          for (let i = 0; i < k; i++) {
            expected = pointAdd(expected, generator);
          }
          return pointsEqual(scalarMul(BigInt(k), generator), expected);
        }),
        params
      );
    });
  });

  it('should cycle with period 21 for (47, 71) over F223', () => {
    const { generator } = toyGroup();
    fc.assert(
      fc.property(fc.bigInt({ min: 0n, max: 1000n }), (k) =>
        pointsEqual(scalarMul(k, generator), scalarMul(k % 21n, generator))
      ),
      PROPERTY_TEST_CONFIG
    );
  });
});
