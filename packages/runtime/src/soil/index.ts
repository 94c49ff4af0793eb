// Soil water characteristic
//
// Pedotransfer chain (Saxton & Rawls 2006; Campbell 1985) and the
// retention curve converter.

export { assertValidTexture, assertValidSample } from './texture.js';

export { organicMatterEstimate } from './organic-matter.js';

export {
  volWaterContent33,
  volWaterContent1500,
  estimateMoisturePoints,
} from './moisture.js';

export {
  MINERAL_PARTICLE_DENSITY,
  getBulkDensity,
  bulkDensityFromFieldCapacity,
  saturatedWaterContentFromTexture,
  saturatedWaterContentFromFieldCapacity,
} from './bulk-density.js';

export { saturatedWaterContent } from './saturation.js';

export { bValue } from './shape.js';

export { airEntryPotential, FIELD_CAPACITY_POTENTIAL } from './air-entry.js';

export {
  contentToPotential,
  potentialToContent,
  createRetentionCurve,
  type RetentionCurve,
} from './retention.js';

export {
  estimateSoilProperties,
  createSoilPropertiesCache,
  CALIBRATED_BULK_DENSITY,
  type EstimateSoilPropertiesOptions,
  type OrganicMatterPolicy,
  type SoilPropertiesCache,
} from './estimate.js';

export {
  estimateSoilPropertiesBatch,
  isEstimationError,
  type EstimateSoilPropertiesBatchResult,
  type SoilPropertiesOutcome,
  type SoilPropertiesSuccess,
  type SoilPropertiesFailure,
} from './batch.js';
