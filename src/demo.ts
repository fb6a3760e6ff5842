#!/usr/bin/env node
/**
 * Prints the secp256k1 generator point.
 */

import { getSecp256k1, SECP256K1_GX, SECP256K1_GY } from './curve/secp256k1.js';
import { pointAt, formatPoint } from './curve/point.js';
import { createFieldElement } from './field/element.js';

function main(): void {
  try {
    const { curve, field } = getSecp256k1();
    const g = pointAt(
      curve,
      createFieldElement(SECP256K1_GX, field),
      createFieldElement(SECP256K1_GY, field)
    );
    console.log(formatPoint(g));
  } catch (error) {
    console.error('Failed to build the secp256k1 generator:', error);
    process.exit(1);
  }
}

main();
