// Common types used across the protocol

/**
 * Fraction of the fine-earth mass, 0-1
 */
export type Fraction = number;

/**
 * Organic matter content, percent by mass (0-100)
 */
export type Percent = number;

/**
 * Volumetric water content (m3/m3)
 */
export type VolumetricWaterContent = number;

/**
 * Matric water potential (J/kg). Zero or negative; more negative is drier.
 */
export type WaterPotential = number;

/**
 * Bulk density (Mg/m3, equivalently g/cm3)
 */
export type BulkDensity = number;

/**
 * Vapor pressure (kPa)
 */
export type VaporPressure = number;

/**
 * Optional caller-supplied identifier for a soil sample
 */
export type SampleId = string;
