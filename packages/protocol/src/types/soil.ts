// Soil water characteristic types

import type {
  BulkDensity,
  VolumetricWaterContent,
  WaterPotential,
} from './common.js';
import type { TextureComposition } from './texture.js';

/**
 * Water content at the two reference potentials.
 *
 * For physically valid textures 0 < waterContent1500 < waterContent33 < 1.
 */
export type MoisturePoints = {
  /**
   * Field capacity, water content at -33 J/kg
   */
  waterContent33: VolumetricWaterContent;

  /**
   * Wilting point, water content at -1500 J/kg
   */
  waterContent1500: VolumetricWaterContent;
};

/**
 * Parameters of the Campbell power-law retention curve.
 */
export type RetentionParameters = {
  /**
   * Saturated water content, in (0, 1)
   */
  saturatedWaterContent: VolumetricWaterContent;

  /**
   * Air-entry (bubbling) potential, strictly negative
   */
  airEntryPotential: WaterPotential;

  /**
   * Campbell b, the retention curve exponent (> 0)
   */
  campbellB: number;
};

/**
 * Everything derived from one TextureComposition.
 * Built once per sample and frozen; the retention parameters it carries
 * drive every later potential/content conversion for that sample.
 */
export type DerivedSoilProperties = RetentionParameters &
  MoisturePoints & {
    /**
     * The validated texture these properties were computed from
     */
    texture: TextureComposition;

    /**
     * True when organic matter was not measured and came from the clay regression
     */
    organicMatterEstimated: boolean;

    bulkDensity: BulkDensity;
  };

/**
 * A point on the retention curve, given in either representation.
 */
export type RetentionQuery =
  | { kind: 'content'; waterContent: VolumetricWaterContent }
  | { kind: 'potential'; waterPotential: WaterPotential };

/**
 * The same physical state expressed both ways.
 */
export type RetentionState = {
  waterContent: VolumetricWaterContent;
  waterPotential: WaterPotential;
};
