import { describe, it, expect } from 'vitest';
import * as secp256k1Core from './index.js';
import { INT32_ARITHMETIC } from './numeric/integer.js';

describe('Package entry', () => {
  it('should expose only the validating point constructors', () => {
    expect('unsafeAffinePoint' in secp256k1Core).toBe(false);
    expect(typeof secp256k1Core.pointAt).toBe('function');
    expect(typeof secp256k1Core.infinity).toBe('function');
    expect(typeof secp256k1Core.invalidPoint).toBe('function');
  });

  it('should turn off-curve coordinates into an invalid point', () => {
    const curve = secp256k1Core.createCurve(5, 7, INT32_ARITHMETIC);
    const point = secp256k1Core.pointAt(curve, 1, 1);
    expect(point.kind).toBe('invalid');
    expect(secp256k1Core.isInvalid(secp256k1Core.pointAdd(point, secp256k1Core.pointAt(curve, -1, 1)))).toBe(
      true
    );
  });
});
