// Air-entry potential.
//
// Kemanian, A.R., Stöckle, C.O., 2010. C-Farm: A simple model to evaluate
// the carbon balance of soil profiles. Eur. J. Agron. 32, 22-29.

import type { VolumetricWaterContent, WaterPotential } from '@pedon/protocol';
import { DomainError } from '../errors.js';

/**
 * Potential at field capacity (J/kg)
 */
export const FIELD_CAPACITY_POTENTIAL = -33;

/**
 * Air-entry (bubbling) potential, J/kg.
 *
 * With fieldCapacity < saturatedWaterContent and b > 0 the result lies in
 * (-33, 0).
 *
 * @throws DomainError when either water content is not positive
 *
 * @example
 * airEntryPotential(0.08, 0.5, 4.33); // ≈ -0.0118
 */
export function airEntryPotential(
  fieldCapacity: VolumetricWaterContent,
  saturatedWaterContent: VolumetricWaterContent,
  campbellB: number
): WaterPotential {
  if (!(saturatedWaterContent > 0)) {
    throw new DomainError('saturatedWaterContent', 'must be positive', saturatedWaterContent);
  }

  if (!(fieldCapacity > 0)) {
    throw new DomainError('fieldCapacity', 'must be positive', fieldCapacity);
  }

  return FIELD_CAPACITY_POTENTIAL * (fieldCapacity / saturatedWaterContent) ** campbellB;
}
