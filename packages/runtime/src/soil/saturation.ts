// Saturated water content from bulk density.
//
// Campbell, G.S., 1985. Soil physics with BASIC: Transport models for
// soil-plant systems. Elsevier, Amsterdam.

import type { BulkDensity, VolumetricWaterContent } from '@pedon/protocol';
import { DomainError } from '../errors.js';
import { MINERAL_PARTICLE_DENSITY } from './bulk-density.js';

/**
 * Total porosity, taken as the saturated water content.
 *
 * @throws DomainError unless 0 < bulkDensity < 2.65
 */
export function saturatedWaterContent(bulkDensity: BulkDensity): VolumetricWaterContent {
  if (!Number.isFinite(bulkDensity) || bulkDensity <= 0) {
    throw new DomainError('bulkDensity', 'must be positive', bulkDensity);
  }

  if (bulkDensity >= MINERAL_PARTICLE_DENSITY) {
    throw new DomainError(
      'bulkDensity',
      `must be below the particle density of ${MINERAL_PARTICLE_DENSITY} Mg/m3`,
      bulkDensity
    );
  }

  return 1 - bulkDensity / MINERAL_PARTICLE_DENSITY;
}
