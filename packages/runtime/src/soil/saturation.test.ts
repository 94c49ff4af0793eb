// Tests for saturated water content

import { describe, it, expect } from 'vitest';
import { saturatedWaterContent } from './saturation.js';
import { DomainError } from '../errors.js';

describe('saturatedWaterContent', () => {
  it('matches the published value', () => {
    expect(saturatedWaterContent(1.3)).toBeCloseTo(0.5094, 4);
  });

  it('stays in (0, 1) for bulk densities in (0, 2.65)', () => {
    for (const bulkDensity of [0.01, 0.9, 1.43, 1.8, 2.6]) {
      const saturated = saturatedWaterContent(bulkDensity);
      expect(saturated).toBeGreaterThan(0);
      expect(saturated).toBeLessThan(1);
    }
  });

  it('rejects non-positive bulk density', () => {
    expect(() => saturatedWaterContent(0)).toThrow(DomainError);
    expect(() => saturatedWaterContent(-1.2)).toThrow(DomainError);
    expect(() => saturatedWaterContent(Number.NaN)).toThrow(DomainError);
  });

  it('rejects bulk density at or above the particle density', () => {
    expect(() => saturatedWaterContent(2.65)).toThrow(DomainError);
    expect(() => saturatedWaterContent(3)).toThrow(
      'bulkDensity = 3: must be below the particle density of 2.65 Mg/m3'
    );
  });
});
