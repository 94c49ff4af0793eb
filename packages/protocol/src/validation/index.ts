// Input validation

export {
  validateTexture,
  TextureSampleSchema,
  CALIBRATION_MAX_CLAY,
  CALIBRATION_MAX_ORGANIC_MATTER,
  type TextureValidationResult,
  type TextureValidationError,
  type TextureValidationWarning,
  type TextureValidationErrorCode,
  type TextureValidationWarningCode,
  type ValidateTextureOptions,
} from './texture.js';

export {
  validateRetentionParameters,
  RetentionParametersSchema,
  type RetentionValidationResult,
  type RetentionValidationError,
} from './retention.js';
