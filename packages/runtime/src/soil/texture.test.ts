// Tests for the texture boundary

import { describe, it, expect } from 'vitest';
import { assertValidSample, assertValidTexture } from './texture.js';
import { InvalidTextureError } from '../errors.js';

describe('assertValidTexture', () => {
  it('returns a frozen texture', () => {
    const texture = assertValidTexture({ clay: 0.2, sand: 0.4, organicMatter: 2 });

    expect(texture).toEqual({ clay: 0.2, sand: 0.4, organicMatter: 2 });
    expect(Object.isFrozen(texture)).toBe(true);
  });

  it('drops sample metadata', () => {
    const texture = assertValidTexture({ id: 'a', clay: 0.2, sand: 0.4, organicMatter: 2 });

    expect(texture).not.toHaveProperty('id');
  });

  it('throws InvalidTextureError with the validation issues', () => {
    try {
      assertValidTexture({ clay: 0.5, sand: 0.6, organicMatter: 2 });
      expect.unreachable('should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidTextureError);
      if (error instanceof InvalidTextureError) {
        expect(error.message).toBe('Invalid texture: texture.sand: clay + sand must not exceed 1');
        expect(error.issues.map((i) => i.code)).toEqual(['FRACTION_SUM']);
      }
    }
  });

  it('requires organic matter', () => {
    expect(() => assertValidTexture({ clay: 0.2, sand: 0.4 })).toThrow(InvalidTextureError);
  });

  it('rejects each out-of-range field', () => {
    expect(() => assertValidTexture({ clay: 1.1, sand: 0, organicMatter: 1 })).toThrow(InvalidTextureError);
    expect(() => assertValidTexture({ clay: 0.1, sand: -0.2, organicMatter: 1 })).toThrow(InvalidTextureError);
    expect(() => assertValidTexture({ clay: 0.1, sand: 0.2, organicMatter: -0.5 })).toThrow(InvalidTextureError);
  });
});

describe('assertValidSample', () => {
  it('allows missing organic matter and returns warnings', () => {
    const { sample, warnings } = assertValidSample({ clay: 0.7, sand: 0.1 });

    expect(sample).toEqual({ clay: 0.7, sand: 0.1 });
    expect(warnings.map((w) => w.code)).toEqual(['OUTSIDE_CALIBRATION']);
  });
});
