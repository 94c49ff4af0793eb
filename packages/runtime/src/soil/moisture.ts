// Moisture point regressions
//
// Saxton, K.E., Rawls, W.J., 2006. Soil water characteristic estimates by
// texture and organic matter for hydrologic solutions.
// Soil Sci. Soc. Am. J. 70, 1569-1578.
//
// Coefficients are the published ones and are not tunable.

import type {
  Fraction,
  MoisturePoints,
  Percent,
  TextureComposition,
  VolumetricWaterContent,
} from '@pedon/protocol';

/**
 * Volumetric water content at field capacity, -33 J/kg (Eq. 2, R² = 0.63).
 */
export function volWaterContent33(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent
): VolumetricWaterContent {
  const x =
    0.299 -
    0.251 * sand +
    0.195 * clay +
    0.011 * organicMatter +
    0.006 * sand * organicMatter -
    0.027 * clay * organicMatter +
    0.452 * sand * clay;

  return -0.015 + 0.636 * x + 1.283 * x ** 2;
}

/**
 * Volumetric water content at the wilting point, -1500 J/kg (Eq. 1, R² = 0.86).
 */
export function volWaterContent1500(
  clay: Fraction,
  sand: Fraction,
  organicMatter: Percent
): VolumetricWaterContent {
  const x =
    0.031 -
    0.024 * sand +
    0.487 * clay +
    0.006 * organicMatter +
    0.005 * sand * organicMatter -
    0.013 * clay * organicMatter +
    0.068 * sand * clay;

  return -0.02 + 1.14 * x;
}

/**
 * Both moisture points for a texture.
 *
 * The two regressions are independent and their ordering is not checked
 * here; bValue is the first consumer that needs it.
 */
export function estimateMoisturePoints(texture: TextureComposition): MoisturePoints {
  const { clay, sand, organicMatter } = texture;

  return {
    waterContent33: volWaterContent33(clay, sand, organicMatter),
    waterContent1500: volWaterContent1500(clay, sand, organicMatter),
  };
}
