// Runtime error types

import type { TextureValidationError } from '@pedon/protocol';

/**
 * Base class for all soil estimation errors.
 * Provides structured error information for debugging and logging.
 */
export class SoilError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = 'SoilError';
    this.code = code;
  }
}

/**
 * Texture fractions outside [0, 1], clay + sand above 1, or negative
 * organic matter. Raised at the entry boundary only.
 */
export class InvalidTextureError extends SoilError {
  readonly issues: TextureValidationError[];

  constructor(message: string, issues: TextureValidationError[] = []) {
    super('INVALID_TEXTURE', message);
    this.name = 'InvalidTextureError';
    this.issues = issues;
  }
}

/**
 * A derived quantity left the domain where the next formula is defined:
 * logarithm of a non-positive number, negative base to a fractional power,
 * or a water content outside its physical bounds.
 */
export class DomainError extends SoilError {
  readonly quantity: string;
  readonly value?: number;

  constructor(quantity: string, reason: string, value?: number, code = 'DOMAIN_ERROR') {
    super(code, value === undefined ? `${quantity}: ${reason}` : `${quantity} = ${value}: ${reason}`);
    this.name = 'DomainError';
    this.quantity = quantity;
    this.value = value;
  }
}

/**
 * A caller-supplied argument is non-physical (zero or negative water
 * content). A DomainError, so callers may catch either.
 */
export class InvalidArgumentError extends DomainError {
  constructor(argument: string, reason: string, value?: number) {
    super(argument, reason, value, 'INVALID_ARGUMENT');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Division by zero.
 */
export class ArithmeticError extends SoilError {
  constructor(message: string) {
    super('ARITHMETIC_ERROR', message);
    this.name = 'ArithmeticError';
  }
}

/**
 * Normalize anything thrown into an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
