// Campbell b, the exponent of the retention curve.
//
// Saxton, K.E., Rawls, W.J., 2006. Soil Sci. Soc. Am. J. 70, 1569-1578.

import type { VolumetricWaterContent } from '@pedon/protocol';
import { ArithmeticError, DomainError } from '../errors.js';

const LOG_POTENTIAL_SPAN = Math.log(1500) - Math.log(33);

/**
 * Shape parameter from the water contents at -33 and -1500 J/kg.
 *
 * The regressions behind the two inputs do not guarantee their ordering
 * outside the calibration range, so it is checked here: b must come out
 * positive and finite.
 *
 * @throws DomainError when either content is not positive and finite, or when the
 * field capacity is below the wilting point
 * @throws ArithmeticError when the two contents are equal
 *
 * @example
 * bValue(0.08, 0.03); // ≈ 3.89
 */
export function bValue(
  waterContent33: VolumetricWaterContent,
  waterContent1500: VolumetricWaterContent
): number {
  if (!Number.isFinite(waterContent33) || waterContent33 <= 0) {
    throw new DomainError(
      'waterContent33',
      'logarithm undefined for non-positive or non-finite water content',
      waterContent33
    );
  }

  if (!Number.isFinite(waterContent1500) || waterContent1500 <= 0) {
    throw new DomainError(
      'waterContent1500',
      'logarithm undefined for non-positive or non-finite water content',
      waterContent1500
    );
  }

  if (waterContent33 === waterContent1500) {
    throw new ArithmeticError(
      `Division by zero: water contents at -33 and -1500 J/kg are both ${waterContent33}`
    );
  }

  if (waterContent33 < waterContent1500) {
    throw new DomainError(
      'waterContent33',
      `must exceed the wilting point water content (${waterContent1500})`,
      waterContent33
    );
  }

  return LOG_POTENTIAL_SPAN / (Math.log(waterContent33) - Math.log(waterContent1500));
}
