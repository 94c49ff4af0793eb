// Bulk density from texture (Saxton & Rawls 2006, Eq. 5-6)

import type {
  BulkDensity,
  Fraction,
  Percent,
  VolumetricWaterContent,
} from '@pedon/protocol';
import { volWaterContent33 } from './moisture.js';

/**
 * Mineral particle density (Mg/m3)
 */
export const MINERAL_PARTICLE_DENSITY = 2.65;

/**
 * Saturated water content straight from the regression, given the field
 * capacity already computed for the same texture.
 */
export function saturatedWaterContentFromFieldCapacity(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent,
  waterContent33: VolumetricWaterContent
): VolumetricWaterContent {
  const x1 =
    0.078 +
    0.278 * sand +
    0.034 * clay +
    0.022 * organicMatter -
    0.018 * sand * organicMatter -
    0.027 * clay * organicMatter -
    0.584 * sand * clay;

  // Saturation minus field capacity
  const x2 = -0.107 + 1.636 * x1;

  return 0.043 + waterContent33 + x2 - 0.097 * sand;
}

/**
 * Saturated water content estimated from texture alone, for use before a
 * bulk density exists.
 */
export function saturatedWaterContentFromTexture(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent
): VolumetricWaterContent {
  return saturatedWaterContentFromFieldCapacity(
    clay,
    sand,
    organicMatter,
    volWaterContent33(clay, sand, organicMatter)
  );
}

/**
 * Bulk density for a texture whose field capacity is already known.
 */
export function bulkDensityFromFieldCapacity(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent,
  waterContent33: VolumetricWaterContent
): BulkDensity {
  const saturated = saturatedWaterContentFromFieldCapacity(clay, sand, organicMatter, waterContent33);
  return (1 - saturated) * MINERAL_PARTICLE_DENSITY;
}

/**
 * Bulk density (Mg/m3).
 *
 * @example
 * getBulkDensity(0.03, 0.92, 1.906); // ≈ 1.43
 */
export function getBulkDensity(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent
): BulkDensity {
  return bulkDensityFromFieldCapacity(
    clay,
    sand,
    organicMatter,
    volWaterContent33(clay, sand, organicMatter)
  );
}
