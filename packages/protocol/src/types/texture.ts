// Texture types - what the caller measures

import type { Fraction, Percent, SampleId } from './common.js';

/**
 * Texture and organic matter of a single soil sample.
 * Immutable once validated.
 */
export type TextureComposition = {
  /**
   * Clay fraction (0-1)
   */
  clay: Fraction;

  /**
   * Sand fraction (0-1). clay + sand must not exceed 1.
   */
  sand: Fraction;

  /**
   * Organic matter (%), >= 0
   */
  organicMatter: Percent;
};

/**
 * A sample as it arrives from a caller. Organic matter is often unmeasured,
 * in which case it can be estimated from clay.
 */
export type TextureSample = {
  id?: SampleId;
  clay: Fraction;
  sand: Fraction;
  organicMatter?: Percent;
};
