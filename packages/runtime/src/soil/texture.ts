// Texture boundary
//
// Every estimate starts here. Input is checked against the protocol schema
// once; nothing downstream re-validates the fractions.

import {
  validateTexture,
  type TextureComposition,
  type TextureSample,
  type TextureValidationResult,
} from '@pedon/protocol';
import { InvalidTextureError } from '../errors.js';

function describeErrors(result: TextureValidationResult): string {
  return result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
}

/**
 * Validate a sample whose organic matter may be missing.
 *
 * @returns The parsed sample together with any calibration warnings
 * @throws InvalidTextureError when the sample is invalid
 */
export function assertValidSample(
  input: unknown,
  requireOrganicMatter = false
): { sample: TextureSample; warnings: TextureValidationResult['warnings'] } {
  const result = validateTexture(input, { requireOrganicMatter });

  if (!result.valid || !result.value) {
    throw new InvalidTextureError(`Invalid texture: ${describeErrors(result)}`, result.errors);
  }

  return { sample: result.value, warnings: result.warnings };
}

/**
 * Validate a complete texture and return it frozen.
 *
 * @throws InvalidTextureError when clay or sand is outside [0, 1],
 * clay + sand exceeds 1, or organic matter is missing or negative
 */
export function assertValidTexture(input: unknown): TextureComposition {
  const { sample } = assertValidSample(input, true);

  if (sample.organicMatter === undefined) {
    throw new InvalidTextureError('Invalid texture: texture.organicMatter: Organic matter is required');
  }

  return Object.freeze({
    clay: sample.clay,
    sand: sample.sand,
    organicMatter: sample.organicMatter,
  });
}
