// Retention Parameter Validation
//
// A RetentionParameters bundle normally comes out of the estimator chain,
// but callers may also build one by hand (e.g. from a lab-fitted curve).
// Either way the converter needs θs in (0, 1), ψe < 0 and b > 0.

import { z } from 'zod';
import type { RetentionParameters } from '../types/soil.js';

export type RetentionValidationResult = {
  valid: boolean;
  errors: RetentionValidationError[];
  value?: RetentionParameters;
};

export type RetentionValidationError = {
  path: string;
  message: string;
  code: 'MISSING_FIELD' | 'INVALID_TYPE' | 'OUT_OF_RANGE';
};

export const RetentionParametersSchema = z.object({
  saturatedWaterContent: z
    .number()
    .finite()
    .gt(0, 'Saturated water content must be positive')
    .lt(1, 'Saturated water content must be below 1'),
  airEntryPotential: z
    .number()
    .finite()
    .lt(0, 'Air-entry potential must be negative'),
  campbellB: z.number().finite().gt(0, 'Campbell b must be positive'),
});

/**
 * Validate a retention parameter bundle.
 */
export function validateRetentionParameters(input: unknown): RetentionValidationResult {
  const parsed = RetentionParametersSchema.safeParse(input);

  if (parsed.success) {
    return { valid: true, errors: [], value: parsed.data };
  }

  const errors = parsed.error.issues.map((issue): RetentionValidationError => {
    let code: RetentionValidationError['code'] = 'INVALID_TYPE';
    if (issue.code === 'too_small' || issue.code === 'too_big') {
      code = 'OUT_OF_RANGE';
    } else if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      code = 'MISSING_FIELD';
    }

    return {
      path: ['parameters', ...issue.path.map(String)].join('.'),
      message: issue.message,
      code,
    };
  });

  return { valid: false, errors };
}
