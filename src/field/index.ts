/**
 * Finite Field Arithmetic Module
 *
 * Prime-field elements with add/sub/mul/div, negation, exponentiation by
 * squaring and Fermat inversion.
 */

export * from './config.js';
export * from './element.js';
export * from './operations.js';
export * from './arithmetic.js';
