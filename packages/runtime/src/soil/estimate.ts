// Soil characteristic estimation
//
// Runs the full chain for one sample:
// texture → moisture points → bulk density → saturation → b → air entry.
// The result is frozen and is the parameter bundle for every later
// retention-curve query on that sample.

import type {
  DerivedSoilProperties,
  TextureComposition,
  TextureSample,
} from '@pedon/protocol';
import { DomainError } from '../errors.js';
import { silentLogger, type SoilLogger } from '../logger.js';
import { airEntryPotential } from './air-entry.js';
import { bulkDensityFromFieldCapacity } from './bulk-density.js';
import { estimateMoisturePoints } from './moisture.js';
import { organicMatterEstimate } from './organic-matter.js';
import { saturatedWaterContent } from './saturation.js';
import { bValue } from './shape.js';
import { assertValidSample } from './texture.js';

/**
 * Bulk density band the regressions were calibrated on (Mg/m3)
 */
export const CALIBRATED_BULK_DENSITY = { min: 0.9, max: 1.8 } as const;

/**
 * What to do when a sample has no organic matter measurement
 */
export type OrganicMatterPolicy = 'estimate' | 'require';

/**
 * Options for estimating soil properties
 */
export type EstimateSoilPropertiesOptions = {
  /**
   * Logger for per-sample diagnostics (default: silent)
   */
  logger?: SoilLogger;

  /**
   * Missing organic matter is estimated from clay, or rejected (default: 'estimate')
   */
  organicMatter?: OrganicMatterPolicy;

  /**
   * Memoize results by texture value
   */
  cache?: SoilPropertiesCache;
};

/**
 * Memoization of derived properties keyed on the texture value.
 * Every entry is a pure function of its key, so sharing or clearing the
 * cache never changes a result.
 */
export type SoilPropertiesCache = {
  get(texture: TextureComposition, organicMatterEstimated: boolean): DerivedSoilProperties | undefined;
  set(properties: DerivedSoilProperties): void;
  readonly size: number;
  clear(): void;
};

function cacheKey(texture: TextureComposition, organicMatterEstimated: boolean): string {
  return `${texture.clay}|${texture.sand}|${texture.organicMatter}|${organicMatterEstimated ? 'estimated' : 'measured'}`;
}

/**
 * Create an in-memory properties cache.
 */
export function createSoilPropertiesCache(): SoilPropertiesCache {
  const entries = new Map<string, DerivedSoilProperties>();

  return {
    get(texture, organicMatterEstimated) {
      return entries.get(cacheKey(texture, organicMatterEstimated));
    },
    set(properties) {
      entries.set(cacheKey(properties.texture, properties.organicMatterEstimated), properties);
    },
    get size() {
      return entries.size;
    },
    clear() {
      entries.clear();
    },
  };
}

/**
 * Derive the soil water characteristic of a texture sample.
 *
 * @param sample - Clay and sand fractions, organic matter (%) if measured
 * @param options - Optional configuration
 * @returns Frozen DerivedSoilProperties
 * @throws InvalidTextureError for invalid texture input
 * @throws DomainError / ArithmeticError when the regressions leave the
 * domain of a later formula (e.g. a non-positive wilting point for coarse,
 * organic-poor sands, or saturation below field capacity)
 *
 * @example
 * ```typescript
 * const props = estimateSoilProperties({ clay: 0.2, sand: 0.4, organicMatter: 2 });
 * const curve = createRetentionCurve(props);
 * curve.contentToPotential(0.2); // J/kg
 * ```
 */
export function estimateSoilProperties(
  sample: TextureSample,
  options: EstimateSoilPropertiesOptions = {}
): DerivedSoilProperties {
  const { logger = silentLogger, organicMatter: policy = 'estimate', cache } = options;

  const { sample: parsed, warnings } = assertValidSample(sample, policy === 'require');
  const sampleId = parsed.id;

  for (const warning of warnings) {
    logger.warn('Texture outside calibration range', {
      sampleId,
      path: warning.path,
      message: warning.message,
    });
  }

  const organicMatterEstimated = parsed.organicMatter === undefined;
  const texture: TextureComposition = Object.freeze({
    clay: parsed.clay,
    sand: parsed.sand,
    organicMatter: parsed.organicMatter ?? organicMatterEstimate(parsed.clay),
  });

  if (organicMatterEstimated) {
    logger.debug('Organic matter estimated from clay', {
      sampleId,
      organicMatter: texture.organicMatter,
    });
  }

  const cached = cache?.get(texture, organicMatterEstimated);
  if (cached) {
    logger.debug('Soil properties served from cache', { sampleId });
    return cached;
  }

  const { waterContent33, waterContent1500 } = estimateMoisturePoints(texture);
  const bulkDensity = bulkDensityFromFieldCapacity(
    texture.clay,
    texture.sand,
    texture.organicMatter,
    waterContent33
  );
  const saturated = saturatedWaterContent(bulkDensity);
  const campbellB = bValue(waterContent33, waterContent1500);

  if (saturated <= waterContent33) {
    throw new DomainError(
      'saturatedWaterContent',
      `must exceed the field capacity water content (${waterContent33})`,
      saturated
    );
  }

  const airEntry = airEntryPotential(waterContent33, saturated, campbellB);

  if (bulkDensity <= CALIBRATED_BULK_DENSITY.min || bulkDensity >= CALIBRATED_BULK_DENSITY.max) {
    logger.warn('Bulk density outside calibrated range', {
      sampleId,
      bulkDensity,
      range: [CALIBRATED_BULK_DENSITY.min, CALIBRATED_BULK_DENSITY.max],
    });
  }

  const properties: DerivedSoilProperties = Object.freeze({
    texture,
    organicMatterEstimated,
    waterContent33,
    waterContent1500,
    bulkDensity,
    saturatedWaterContent: saturated,
    campbellB,
    airEntryPotential: airEntry,
  });

  logger.debug('Soil properties estimated', {
    sampleId,
    bulkDensity,
    saturatedWaterContent: saturated,
    campbellB,
    airEntryPotential: airEntry,
  });

  cache?.set(properties);
  return properties;
}
