// Tests for batch estimation

import { describe, it, expect } from 'vitest';
import type { TextureSample } from '@pedon/protocol';
import { estimateSoilPropertiesBatch, isEstimationError } from './batch.js';
import { createSoilPropertiesCache } from './estimate.js';
import { DomainError, InvalidTextureError } from '../errors.js';
import { createCapturingLogger } from '../logger.js';

const SAMPLES: TextureSample[] = [
  { id: 'loamy-sand', clay: 0.03, sand: 0.92, organicMatter: 1.906 },
  { id: 'overfull', clay: 0.5, sand: 0.6, organicMatter: 2 },
  { id: 'bare-sand', clay: 0, sand: 0.9, organicMatter: 0.5 },
  { id: 'clay-loam', clay: 0.27, sand: 0.3 },
];

describe('estimateSoilPropertiesBatch', () => {
  it('isolates per-sample failures', () => {
    const { results, successCount, failureCount } = estimateSoilPropertiesBatch(SAMPLES);

    expect(results).toHaveLength(4);
    expect(successCount).toBe(2);
    expect(failureCount).toBe(2);
    expect(results.map(isEstimationError)).toEqual([false, true, true, false]);
  });

  it('keeps input order and attaches the sample to each outcome', () => {
    const { results } = estimateSoilPropertiesBatch(SAMPLES);

    expect(results.map((r) => r.index)).toEqual([0, 1, 2, 3]);
    expect(results.map((r) => r.sample.id)).toEqual([
      'loamy-sand',
      'overfull',
      'bare-sand',
      'clay-loam',
    ]);
  });

  it('reports the typed error of each failure', () => {
    const { results } = estimateSoilPropertiesBatch(SAMPLES);
    const [, overfull, bareSand, clayLoam] = results;

    expect(isEstimationError(overfull) && overfull.error).toBeInstanceOf(InvalidTextureError);
    expect(isEstimationError(bareSand) && bareSand.error).toBeInstanceOf(DomainError);

    if (isEstimationError(clayLoam)) {
      expect.unreachable('clay loam should succeed');
    } else {
      expect(clayLoam.properties.organicMatterEstimated).toBe(true);
    }
  });

  it('logs each failure and a summary', () => {
    const logger = createCapturingLogger();
    estimateSoilPropertiesBatch(SAMPLES, { logger });

    const failures = logger.entries.filter((e) => e.message === 'Soil sample failed');
    expect(failures.map((e) => e.data?.index)).toEqual([1, 2]);
    expect(failures.map((e) => e.data?.code)).toEqual(['INVALID_TEXTURE', 'DOMAIN_ERROR']);

    const summary = logger.entries[logger.entries.length - 1];
    expect(summary.level).toBe('info');
    expect(summary.message).toBe('Batch estimation complete');
    expect(summary.data).toEqual({ total: 4, successCount: 2, failureCount: 2 });
  });

  it('records entries that are not objects as per-sample failures', () => {
    const samples: TextureSample[] = JSON.parse(
      '[{"clay":0.2,"sand":0.4,"organicMatter":2},null,42,' +
        '{"id":"loamy-sand","clay":0.03,"sand":0.92,"organicMatter":1.906}]'
    );
    const logger = createCapturingLogger();
    const { results, successCount, failureCount } = estimateSoilPropertiesBatch(samples, { logger });

    expect(successCount).toBe(2);
    expect(failureCount).toBe(2);
    expect(results.map(isEstimationError)).toEqual([false, true, true, false]);

    const [, nullEntry, numberEntry] = results;
    expect(isEstimationError(nullEntry) && nullEntry.error).toBeInstanceOf(InvalidTextureError);
    expect(isEstimationError(numberEntry) && numberEntry.error).toBeInstanceOf(InvalidTextureError);

    const failures = logger.entries.filter((e) => e.message === 'Soil sample failed');
    expect(failures.map((e) => e.data?.index)).toEqual([1, 2]);
    expect(failures.map((e) => e.data?.sampleId)).toEqual([undefined, undefined]);
    expect(failures.map((e) => e.data?.code)).toEqual(['INVALID_TEXTURE', 'INVALID_TEXTURE']);
  });

  it('handles an empty batch', () => {
    expect(estimateSoilPropertiesBatch([])).toEqual({
      results: [],
      successCount: 0,
      failureCount: 0,
    });
  });

  it('shares a cache across duplicate samples', () => {
    const cache = createSoilPropertiesCache();
    const sample = { clay: 0.2, sand: 0.4, organicMatter: 2 };
    const { results } = estimateSoilPropertiesBatch([sample, { ...sample }, sample], { cache });

    expect(cache.size).toBe(1);
    const [first, second] = results;
    if (isEstimationError(first) || isEstimationError(second)) {
      expect.unreachable('duplicates should succeed');
    } else {
      expect(second.properties).toBe(first.properties);
    }
  });
});
