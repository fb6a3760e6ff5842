/**
 * Error handling for secp256k1-core
 *
 * This module provides the error type and codes for all field and curve
 * operations. All errors include descriptive messages and optional details
 * for debugging.
 */

/**
 * Error codes for field and curve operations
 *
 * These codes allow programmatic handling of specific error conditions.
 */
export enum ErrorCode {
  // Input validation errors
  /** Field element value is outside [0, modulus) */
  INVALID_RESIDUE = 'INVALID_RESIDUE',
  /** Field modulus is smaller than 2 */
  INVALID_MODULUS = 'INVALID_MODULUS',
  /** Point is not on the specified elliptic curve */
  INVALID_CURVE_POINT = 'INVALID_CURVE_POINT',
  /** Exponent is negative */
  INVALID_EXPONENT = 'INVALID_EXPONENT',
  /** Scalar is negative */
  INVALID_SCALAR = 'INVALID_SCALAR',

  // Contract violations
  /** Field elements are from different fields */
  FIELD_MISMATCH = 'FIELD_MISMATCH',
  /** Points are from curves with different parameters */
  CURVE_MISMATCH = 'CURVE_MISMATCH',

  // Arithmetic errors
  /** Attempted division by zero or inverse of zero */
  DIVISION_BY_ZERO = 'DIVISION_BY_ZERO',
  /** Fixed-width integer result does not fit */
  INTEGER_OVERFLOW = 'INTEGER_OVERFLOW',

  // Parameter set errors
  /** Generator is off the curve or its order is wrong */
  CURVE_PARAMETER_CHECK_FAILED = 'CURVE_PARAMETER_CHECK_FAILED',

  // Configuration errors
  /** Invalid configuration option provided */
  INVALID_CONFIG = 'INVALID_CONFIG',
}

/**
 * Base error class for field and curve errors
 *
 * All errors thrown by this library are instances of CurveError,
 * allowing for easy error handling and type checking.
 *
 * @example
 * ```typescript
 * try {
 *   const x = createFieldElement(300n, field223);
 * } catch (error) {
 *   if (error instanceof CurveError && error.code === ErrorCode.INVALID_RESIDUE) {
 *     console.error('Out of range:', error.details);
 *   }
 * }
 * ```
 */
export class CurveError extends Error {
  /**
   * @param message - Human-readable error message
   * @param code - Error code for programmatic handling
   * @param details - Optional details object with relevant context
   */
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'CurveError';
    Object.setPrototypeOf(this, CurveError.prototype);
  }

  /**
   * Create a string representation of the error including details
   */
  override toString(): string {
    let str = `${this.name} [${this.code}]: ${this.message}`;
    if (this.details) {
      str += ` (${JSON.stringify(this.details)})`;
    }
    return str;
  }

  /**
   * Convert error to a plain object for serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a CurveError
 */
export function isCurveError(error: unknown): error is CurveError {
  return error instanceof CurveError;
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create an error for a residue outside [0, modulus)
 *
 * @param value - The invalid value as string
 * @param modulus - The field modulus as string
 */
export function invalidResidueError(value: string, modulus: string): CurveError {
  return new CurveError('Field element must lie in [0, modulus)', ErrorCode.INVALID_RESIDUE, {
    value,
    modulus,
  });
}

/**
 * Create an error for an unusable field modulus
 */
export function invalidModulusError(modulus: string): CurveError {
  return new CurveError('Field modulus must be at least 2', ErrorCode.INVALID_MODULUS, {
    modulus,
  });
}

/**
 * Create an error for field mismatch
 *
 * @param operation - Name of the operation
 * @param modulusA - Modulus of the first operand as string
 * @param modulusB - Modulus of the second operand as string
 */
export function fieldMismatchError(
  operation: string,
  modulusA: string,
  modulusB: string
): CurveError {
  return new CurveError(
    `Cannot ${operation} field elements with different moduli`,
    ErrorCode.FIELD_MISMATCH,
    { modulusA, modulusB }
  );
}

/**
 * Create an error for combining points of different curves
 */
export function curveMismatchError(curveA: string, curveB: string): CurveError {
  return new CurveError('Cannot combine points from different curves', ErrorCode.CURVE_MISMATCH, {
    curveA,
    curveB,
  });
}

/**
 * Create an error for invalid curve points
 *
 * @param curve - Curve name
 */
export function invalidCurvePointError(curve: string): CurveError {
  return new CurveError('Point is not on the curve', ErrorCode.INVALID_CURVE_POINT, { curve });
}

/**
 * Create an error for division by zero
 *
 * @param operation - Name of the operation
 */
export function divisionByZeroError(operation: string): CurveError {
  return new CurveError('Cannot compute inverse of zero element', ErrorCode.DIVISION_BY_ZERO, {
    operation,
  });
}

/**
 * Create an error for a negative exponent
 */
export function invalidExponentError(exponent: string): CurveError {
  return new CurveError('Exponent must be non-negative', ErrorCode.INVALID_EXPONENT, {
    exponent,
  });
}

/**
 * Create an error for a negative scalar
 */
export function invalidScalarError(scalar: string): CurveError {
  return new CurveError('Scalar must be non-negative', ErrorCode.INVALID_SCALAR, { scalar });
}

/**
 * Create an error for fixed-width integer overflow
 *
 * @param operation - Name of the operation
 * @param result - The out-of-range result as string
 */
export function integerOverflowError(operation: string, result: string): CurveError {
  return new CurveError(`Integer overflow in ${operation}`, ErrorCode.INTEGER_OVERFLOW, {
    operation,
    result,
  });
}

/**
 * Create an error for a failed curve parameter check
 *
 * @param curve - Curve name
 * @param reason - Which check failed
 */
export function curveParameterCheckError(curve: string, reason: string): CurveError {
  return new CurveError(
    `Curve parameter check failed for ${curve}: ${reason}`,
    ErrorCode.CURVE_PARAMETER_CHECK_FAILED,
    { curve, reason }
  );
}

/**
 * Create an error for invalid configuration
 *
 * @param option - Name of the invalid option
 * @param value - The invalid value
 */
export function invalidConfigError(option: string, value: unknown): CurveError {
  return new CurveError(
    `Invalid configuration option '${option}': ${String(value)}`,
    ErrorCode.INVALID_CONFIG,
    { option, value }
  );
}
