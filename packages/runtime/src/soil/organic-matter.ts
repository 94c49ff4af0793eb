// Organic matter estimate for samples without a measurement.
//
// Half the carbon saturation of Hassink & Whitmore (1997), converted to
// organic matter with carbon = 0.58 × organic matter. The published
// coefficient (0.032 per % clay) is pre-multiplied by 100 for fractions.
//
// Hassink, J., Whitmore, A.P., 1997. A model of the physical protection of
// organic matter in soils. Soil Sci. Soc. Am. J. 61, 131-139.

import type { Fraction, Percent } from '@pedon/protocol';
import { InvalidTextureError } from '../errors.js';

const INTERCEPT = 1.81;
const CLAY_COEFFICIENT = 3.2;

/**
 * Estimate organic matter (%) from the clay fraction.
 *
 * @throws InvalidTextureError when clay is outside [0, 1]
 */
export function organicMatterEstimate(clay: Fraction): Percent {
  if (!Number.isFinite(clay) || clay < 0 || clay > 1) {
    throw new InvalidTextureError(`Invalid texture: texture.clay: ${clay} is outside [0, 1]`, [
      { path: 'texture.clay', message: `${clay} is outside [0, 1]`, code: 'OUT_OF_RANGE' },
    ]);
  }

  return INTERCEPT + CLAY_COEFFICIENT * clay;
}
