// Tests for Retention Parameter Validation

import { describe, it, expect } from 'vitest';
import { validateRetentionParameters } from './retention.js';

describe('validateRetentionParameters', () => {
  it('accepts a physical bundle', () => {
    const params = { saturatedWaterContent: 0.5, airEntryPotential: -1.5, campbellB: 5 };
    const result = validateRetentionParameters(params);

    expect(result.valid).toBe(true);
    expect(result.value).toEqual(params);
  });

  it('rejects a non-negative air-entry potential', () => {
    const result = validateRetentionParameters({
      saturatedWaterContent: 0.5,
      airEntryPotential: 0,
      campbellB: 5,
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      {
        path: 'parameters.airEntryPotential',
        message: 'Air-entry potential must be negative',
        code: 'OUT_OF_RANGE',
      },
    ]);
  });

  it('rejects a saturated water content outside (0, 1)', () => {
    const negative = validateRetentionParameters({
      saturatedWaterContent: -0.5,
      airEntryPotential: -1.5,
      campbellB: 5,
    });
    expect(negative.errors[0].message).toBe('Saturated water content must be positive');

    const full = validateRetentionParameters({
      saturatedWaterContent: 1,
      airEntryPotential: -1.5,
      campbellB: 5,
    });
    expect(full.errors[0].message).toBe('Saturated water content must be below 1');
  });

  it('rejects a zero shape parameter', () => {
    const result = validateRetentionParameters({
      saturatedWaterContent: 0.5,
      airEntryPotential: -1.5,
      campbellB: 0,
    });

    expect(result.errors[0].path).toBe('parameters.campbellB');
  });

  it('reports missing fields', () => {
    const result = validateRetentionParameters({ saturatedWaterContent: 0.5 });

    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['MISSING_FIELD', 'MISSING_FIELD']);
  });
});
