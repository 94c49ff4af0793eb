// Batch estimation
//
// Samples are independent. Each one goes through estimateSoilProperties on
// its own; a failure is recorded against that sample and the rest of the
// batch carries on.

import type { DerivedSoilProperties, TextureSample } from '@pedon/protocol';
import { SoilError, toError } from '../errors.js';
import { silentLogger } from '../logger.js';
import {
  estimateSoilProperties,
  type EstimateSoilPropertiesOptions,
} from './estimate.js';

export type SoilPropertiesSuccess = {
  index: number;
  sample: TextureSample;
  properties: DerivedSoilProperties;
};

export type SoilPropertiesFailure = {
  index: number;
  sample: TextureSample;
  error: Error;
};

export type SoilPropertiesOutcome = SoilPropertiesSuccess | SoilPropertiesFailure;

/**
 * Result of estimating a batch of samples
 */
export type EstimateSoilPropertiesBatchResult = {
  /**
   * One outcome per input sample, in input order
   */
  results: SoilPropertiesOutcome[];

  successCount: number;

  failureCount: number;
};

/**
 * Check if an outcome is a failure from batch processing.
 */
export function isEstimationError(outcome: SoilPropertiesOutcome): outcome is SoilPropertiesFailure {
  return 'error' in outcome;
}

// Entries from parsed JSON may not be objects
function sampleIdOf(sample: unknown): string | undefined {
  if (typeof sample === 'object' && sample !== null && 'id' in sample && typeof sample.id === 'string') {
    return sample.id;
  }
  return undefined;
}

/**
 * Estimate soil properties for many samples.
 *
 * @param samples - Samples to evaluate
 * @param options - Passed to each estimateSoilProperties call
 * @returns Per-sample outcomes (in order) and counts
 */
export function estimateSoilPropertiesBatch(
  samples: TextureSample[],
  options: EstimateSoilPropertiesOptions = {}
): EstimateSoilPropertiesBatchResult {
  const logger = options.logger ?? silentLogger;
  const results: SoilPropertiesOutcome[] = [];
  let failureCount = 0;

  samples.forEach((sample, index) => {
    try {
      results.push({ index, sample, properties: estimateSoilProperties(sample, options) });
    } catch (caught) {
      const error = toError(caught);
      failureCount += 1;
      logger.warn('Soil sample failed', {
        index,
        sampleId: sampleIdOf(sample),
        code: error instanceof SoilError ? error.code : undefined,
        message: error.message,
      });
      results.push({ index, sample, error });
    }
  });

  const successCount = results.length - failureCount;
  logger.info('Batch estimation complete', {
    total: samples.length,
    successCount,
    failureCount,
  });

  return { results, successCount, failureCount };
}
