/**
 * Elliptic Curve Module
 *
 * Curve parameters, point values and the affine group law over any
 * arithmetic, plus the secp256k1 parameter set.
 */

// Curve parameters
export * from './config.js';

// Point values, validation and equality; unsafeAffinePoint stays internal
export {
  containsPoint,
  pointAt,
  infinity,
  invalidPoint,
  isInfinity,
  isAffine,
  isInvalid,
  validateCurvePoint,
  pointsEqual,
  formatPoint,
} from './point.js';

// Group law and scalar multiplication
export * from './operations.js';

// secp256k1 constants and validated instance
export * from './secp256k1.js';
