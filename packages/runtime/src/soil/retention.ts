// Campbell retention curve: water content <-> matric potential.
//
// Campbell, G.S., 1985. Soil physics with BASIC: Transport models for
// soil-plant systems. Elsevier, Amsterdam. Eq. 5.9 and p. 80.

import {
  validateRetentionParameters,
  type RetentionParameters,
  type RetentionQuery,
  type RetentionState,
  type VolumetricWaterContent,
  type WaterPotential,
} from '@pedon/protocol';
import { DomainError, InvalidArgumentError } from '../errors.js';

/**
 * Water potential (J/kg) at a given water content.
 *
 * @throws InvalidArgumentError when the saturated or queried water content
 * is not positive
 *
 * @example
 * contentToPotential(0.5, -1.5, 5, 0.25); // -48
 */
export function contentToPotential(
  saturatedWaterContent: VolumetricWaterContent,
  airEntryPotential: WaterPotential,
  campbellB: number,
  waterContent: VolumetricWaterContent
): WaterPotential {
  if (!(saturatedWaterContent > 0)) {
    throw new InvalidArgumentError('saturatedWaterContent', 'must be positive', saturatedWaterContent);
  }

  if (!(waterContent > 0)) {
    throw new InvalidArgumentError('waterContent', 'must be positive', waterContent);
  }

  return airEntryPotential * (saturatedWaterContent / waterContent) ** campbellB;
}

/**
 * Water content (m3/m3) at a given water potential.
 *
 * The curve is not clamped at saturation: a potential wetter than the
 * air-entry potential (0 > ψ > ψe) gives a content above θs.
 *
 * @throws DomainError when the parameters are degenerate (zero air-entry
 * potential or b, non-positive saturation) or when the potential and the
 * air-entry potential differ in sign
 *
 * @example
 * potentialToContent(0.5, -1.5, 5, -52.7); // ≈ 0.245
 */
export function potentialToContent(
  saturatedWaterContent: VolumetricWaterContent,
  airEntryPotential: WaterPotential,
  campbellB: number,
  waterPotential: WaterPotential
): VolumetricWaterContent {
  if (!(saturatedWaterContent > 0)) {
    throw new DomainError('saturatedWaterContent', 'must be positive', saturatedWaterContent);
  }

  if (airEntryPotential === 0 || !Number.isFinite(airEntryPotential)) {
    throw new DomainError('airEntryPotential', 'must be non-zero and finite', airEntryPotential);
  }

  if (campbellB === 0 || !Number.isFinite(campbellB)) {
    throw new DomainError('campbellB', 'must be non-zero and finite', campbellB);
  }

  const ratio = waterPotential / airEntryPotential;
  if (!(ratio > 0)) {
    throw new DomainError(
      'waterPotential',
      `must have the same sign as the air-entry potential (${airEntryPotential})`,
      waterPotential
    );
  }

  return saturatedWaterContent * ratio ** (-1 / campbellB);
}

/**
 * A retention curve bound to one parameter bundle.
 */
export type RetentionCurve = Readonly<
  RetentionParameters & {
    contentToPotential(waterContent: VolumetricWaterContent): WaterPotential;
    potentialToContent(waterPotential: WaterPotential): VolumetricWaterContent;
    resolve(query: RetentionQuery): RetentionState;
  }
>;

/**
 * Bind the converter to a parameter bundle.
 *
 * Accepts DerivedSoilProperties directly; only the three curve parameters
 * are kept. The bundle is validated once here, so a hand-built bundle with
 * a non-negative air-entry potential or a non-positive b fails early.
 *
 * @throws DomainError when the bundle is not physical
 */
export function createRetentionCurve(parameters: RetentionParameters): RetentionCurve {
  const result = validateRetentionParameters({
    saturatedWaterContent: parameters.saturatedWaterContent,
    airEntryPotential: parameters.airEntryPotential,
    campbellB: parameters.campbellB,
  });

  if (!result.valid || !result.value) {
    const reason = result.errors.map((e) => `${e.path}: ${e.message}`).join('; ');
    throw new DomainError('retentionParameters', reason);
  }

  const { saturatedWaterContent, airEntryPotential, campbellB } = result.value;

  const toPotential = (waterContent: VolumetricWaterContent): WaterPotential =>
    contentToPotential(saturatedWaterContent, airEntryPotential, campbellB, waterContent);

  const toContent = (waterPotential: WaterPotential): VolumetricWaterContent =>
    potentialToContent(saturatedWaterContent, airEntryPotential, campbellB, waterPotential);

  return Object.freeze({
    saturatedWaterContent,
    airEntryPotential,
    campbellB,
    contentToPotential: toPotential,
    potentialToContent: toContent,
    resolve(query: RetentionQuery): RetentionState {
      switch (query.kind) {
        case 'content':
          return {
            waterContent: query.waterContent,
            waterPotential: toPotential(query.waterContent),
          };
        case 'potential':
          return {
            waterContent: toContent(query.waterPotential),
            waterPotential: query.waterPotential,
          };
      }
    },
  });
}
