/**
 * secp256k1 Parameter Set
 *
 * The curve y² = x³ + 7 over the 256-bit prime field used by Bitcoin.
 * The constants are plain bigints; the curve, generator and fields are
 * built and checked on first use of getSecp256k1() and then shared for the
 * rest of the process.
 */

import type { AffinePoint, CurveParams, CurvePoint, FieldConfig, FieldElement } from '../types.js';
import { curveParameterCheckError } from '../errors.js';
import { createLogger } from '../logger.js';
import { SECP256K1_FIELD, SECP256K1_SCALAR_FIELD } from '../field/config.js';
import { createFieldElement } from '../field/element.js';
import { createFieldCurve, describeCurve } from './config.js';
import { isInfinity, pointAt } from './point.js';
import { scalarMul } from './operations.js';

const debugLog = createLogger('secp256k1');

/** Field prime p = 2^256 - 2^32 - 977 */
export const SECP256K1_P: bigint = SECP256K1_FIELD.modulus;

/** Curve coefficient a */
export const SECP256K1_A: bigint = 0n;

/** Curve coefficient b */
export const SECP256K1_B: bigint = 7n;

/** X-coordinate of the generator point G */
export const SECP256K1_GX: bigint =
  0x79be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798n;

/** Y-coordinate of the generator point G */
export const SECP256K1_GY: bigint =
  0x483ada7726a3c4655da4fbfc0e1108a8fd17b448a68554199c47d08ffb10d4b8n;

/** Order of the generator point G */
export const SECP256K1_N: bigint = SECP256K1_SCALAR_FIELD.modulus;

/**
 * The validated secp256k1 parameter set
 */
export interface Secp256k1 {
  readonly field: FieldConfig;
  readonly scalarField: FieldConfig;
  readonly curve: CurveParams<FieldElement>;
  readonly generator: AffinePoint<FieldElement>;
  readonly order: bigint;
}

/**
 * Check a generator against its curve
 *
 * @returns The generator as an affine point
 * @throws CurveError (CURVE_PARAMETER_CHECK_FAILED) if the generator is not on
 *   the curve, or order × generator is not the point at infinity
 */
export function validateCurveParameters<T>(
  curve: CurveParams<T>,
  gx: T,
  gy: T,
  order: bigint
): AffinePoint<T> {
  const generator = pointAt(curve, gx, gy);
  if (generator.kind === 'invalid') {
    throw curveParameterCheckError(describeCurve(curve), 'generator is not on the curve');
  }

  const product: CurvePoint<T> = scalarMul(order, generator);
  if (!isInfinity(product)) {
    throw curveParameterCheckError(
      describeCurve(curve),
      'order times generator is not the point at infinity'
    );
  }

  return generator;
}

let instance: Secp256k1 | undefined;

function initSecp256k1(): Secp256k1 {
  const started = performance.now();
  const curve = createFieldCurve(SECP256K1_A, SECP256K1_B, SECP256K1_FIELD, 'secp256k1');
  const generator = validateCurveParameters(
    curve,
    createFieldElement(SECP256K1_GX, SECP256K1_FIELD),
    createFieldElement(SECP256K1_GY, SECP256K1_FIELD),
    SECP256K1_N
  );

  debugLog('Parameters validated', {
    elapsedMs: Number((performance.now() - started).toFixed(2)),
  });

  return Object.freeze({
    field: SECP256K1_FIELD,
    scalarField: SECP256K1_SCALAR_FIELD,
    curve,
    generator,
    order: SECP256K1_N,
  });
}

/**
 * Get the secp256k1 parameter set
 *
 * The first call builds and validates it; later calls return the same
 * object. A failed validation throws and is retried on the next call.
 *
 * @example
 * ```typescript
 * const { generator, order } = getSecp256k1();
 * const publicPoint = scalarMul(12345n, generator);
 * ```
 */
export function getSecp256k1(): Secp256k1 {
  if (instance === undefined) {
    instance = initSecp256k1();
  }
  return instance;
}
