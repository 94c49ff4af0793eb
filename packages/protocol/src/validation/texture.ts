// Texture Validation
//
// Validates soil texture input before any pedotransfer function sees it.
// Structural checks are expressed as zod schemas; issues are mapped onto
// stable error codes so callers can branch on them.

import { z } from 'zod';
import type { TextureSample } from '../types/texture.js';

/**
 * Result of validating a texture sample
 */
export type TextureValidationResult = {
  valid: boolean;
  errors: TextureValidationError[];
  warnings: TextureValidationWarning[];
  /**
   * The parsed sample, present only when valid
   */
  value?: TextureSample;
};

/**
 * A validation error (the sample cannot be evaluated)
 */
export type TextureValidationError = {
  path: string;
  message: string;
  code: TextureValidationErrorCode;
};

/**
 * A validation warning (the sample can be evaluated, but the regressions
 * were not calibrated for it)
 */
export type TextureValidationWarning = {
  path: string;
  message: string;
  code: TextureValidationWarningCode;
};

export type TextureValidationErrorCode =
  | 'MISSING_FIELD'
  | 'INVALID_TYPE'
  | 'OUT_OF_RANGE'
  | 'FRACTION_SUM';

export type TextureValidationWarningCode = 'OUTSIDE_CALIBRATION';

export type ValidateTextureOptions = {
  /** Treat a missing organic matter value as an error */
  requireOrganicMatter?: boolean;
};

/**
 * Upper clay fraction of the Saxton & Rawls (2006) calibration data
 */
export const CALIBRATION_MAX_CLAY = 0.6;

/**
 * Upper organic matter (%) of the Saxton & Rawls (2006) calibration data
 */
export const CALIBRATION_MAX_ORGANIC_MATTER = 8;

// Sums such as 0.3 + 0.7 land a hair above 1 in binary floating point
const FRACTION_SUM_TOLERANCE = 1e-9;

const fraction = z.number().finite().min(0).max(1);

export const TextureSampleSchema = z
  .object({
    id: z.string().optional(),
    clay: fraction,
    sand: fraction,
    organicMatter: z.number().finite().min(0).optional(),
  })
  .refine((t) => t.clay + t.sand <= 1 + FRACTION_SUM_TOLERANCE, {
    message: 'clay + sand must not exceed 1',
    path: ['sand'],
  });

function toErrorCode(issue: z.ZodIssue): TextureValidationErrorCode {
  switch (issue.code) {
    case 'too_small':
    case 'too_big':
      return 'OUT_OF_RANGE';
    case 'custom':
      return 'FRACTION_SUM';
    case 'invalid_type':
      return issue.received === 'undefined' ? 'MISSING_FIELD' : 'INVALID_TYPE';
    default:
      return 'INVALID_TYPE';
  }
}

function toPath(issue: z.ZodIssue): string {
  return ['texture', ...issue.path.map(String)].join('.');
}

/**
 * Validate a texture sample.
 *
 * Errors: clay or sand outside [0, 1], clay + sand above 1, negative or
 * non-finite organic matter, non-numeric fields.
 * Warnings: clay or organic matter beyond the regression calibration range.
 */
export function validateTexture(
  input: unknown,
  options: ValidateTextureOptions = {}
): TextureValidationResult {
  const { requireOrganicMatter = false } = options;
  const errors: TextureValidationError[] = [];
  const warnings: TextureValidationWarning[] = [];

  if (!input || typeof input !== 'object') {
    errors.push({
      path: 'texture',
      message: 'Texture must be an object',
      code: 'INVALID_TYPE',
    });
    return { valid: false, errors, warnings };
  }

  const parsed = TextureSampleSchema.safeParse(input);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      errors.push({ path: toPath(issue), message: issue.message, code: toErrorCode(issue) });
    }
    return { valid: false, errors, warnings };
  }

  const sample = parsed.data;

  if (requireOrganicMatter && sample.organicMatter === undefined) {
    errors.push({
      path: 'texture.organicMatter',
      message: 'Organic matter is required',
      code: 'MISSING_FIELD',
    });
    return { valid: false, errors, warnings };
  }

  if (sample.clay > CALIBRATION_MAX_CLAY) {
    warnings.push({
      path: 'texture.clay',
      message: `Clay fraction ${sample.clay} is above the calibrated maximum of ${CALIBRATION_MAX_CLAY}`,
      code: 'OUTSIDE_CALIBRATION',
    });
  }

  if (
    sample.organicMatter !== undefined &&
    sample.organicMatter > CALIBRATION_MAX_ORGANIC_MATTER
  ) {
    warnings.push({
      path: 'texture.organicMatter',
      message: `Organic matter ${sample.organicMatter}% is above the calibrated maximum of ${CALIBRATION_MAX_ORGANIC_MATTER}%`,
      code: 'OUTSIDE_CALIBRATION',
    });
  }

  return { valid: true, errors, warnings, value: sample };
}
