// Atmospheric demand
//
// Daily vapor pressure helpers. Independent of the soil chain; a crop
// stress model composes them alongside soil water content.
// Vapor pressures in kPa, relative humidity in percent (0-100). No
// validation beyond the arithmetic.
//
// Campbell, G.S., Norman, J.M., 1998. An introduction to environmental
// biophysics. Springer, New York.

import type { VaporPressure } from '@pedon/protocol';

/**
 * Daily vapor pressure of the air.
 *
 * Saturated vapor pressure at the minimum temperature meets the maximum
 * relative humidity, and vice versa.
 *
 * @example
 * vaporPressureAir(1.817, 5.32, 87, 25); // ≈ 1.455
 */
export function vaporPressureAir(
  vaporPressureAtTmin: VaporPressure,
  vaporPressureAtTmax: VaporPressure,
  relativeHumidityMax: number,
  relativeHumidityMin: number
): VaporPressure {
  return (
    0.5 *
    ((vaporPressureAtTmin * relativeHumidityMax) / 100 +
      (vaporPressureAtTmax * relativeHumidityMin) / 100)
  );
}

/**
 * Mean daily vapor pressure deficit.
 */
export function meanVaporPressureDeficit(
  maxSaturatedVaporPressure: VaporPressure,
  minSaturatedVaporPressure: VaporPressure,
  airVaporPressure: VaporPressure
): VaporPressure {
  return (maxSaturatedVaporPressure + minSaturatedVaporPressure) / 2 - airVaporPressure;
}

/**
 * Maximum daily vapor pressure deficit
 */
export function maxVaporPressureDeficit(
  maxSaturatedVaporPressure: VaporPressure,
  minRelativeHumidity: number
): VaporPressure {
  return 0.67 * maxSaturatedVaporPressure * (1 - minRelativeHumidity / 100);
}
