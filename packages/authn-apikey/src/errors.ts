/**
 * Credential error taxonomy
 *
 * Every error carries enough detail for an operator to see which field failed
 * and why. None of it may be surfaced to a caller attempting verification;
 * ApiKeyIssuer.verify() collapses all of them into a single "not authenticated".
 *
 * Errors caused by bad input are ValidationErrors (400).
 */

import { ClientKeyError, ValidationError } from '@clientkey/core';

export type AlgorithmField = 'time_cost' | 'memory_cost_mb' | 'output_length';

export class UnsupportedAlgorithmError extends ValidationError {
  constructor(descriptor: string) {
    super(`Missing or unsupported algorithm name in '${descriptor}'`, 'unsupported_algorithm', {
      descriptor,
    });
    this.name = 'UnsupportedAlgorithmError';
  }
}

export class MalformedDescriptorError extends ValidationError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'malformed_descriptor', details);
    this.name = 'MalformedDescriptorError';
  }
}

export class OutOfRangeError extends ValidationError {
  constructor(
    public readonly field: AlgorithmField,
    public readonly value: number,
    public readonly bound: number,
    public readonly limit: 'min' | 'max'
  ) {
    super(
      `${field} ${value} too ${limit === 'max' ? 'large' : 'small'}. ${limit}=${bound}`,
      'out_of_range',
      { field, value, bound, limit }
    );
    this.name = 'OutOfRangeError';
  }
}

export class InvalidEncodingError extends ValidationError {
  constructor(what: string) {
    super(`Invalid base64url encoding in ${what}`, 'invalid_encoding', { what });
    this.name = 'InvalidEncodingError';
  }
}

export class MalformedArtifactError extends ValidationError {
  constructor(
    public readonly got: number,
    public readonly want: number,
    part = 'artifact'
  ) {
    super(
      `Invalid number of separated parts in ${part}. got ${got}, wanted ${want}`,
      'malformed_artifact',
      { got, want, part }
    );
    this.name = 'MalformedArtifactError';
  }
}

export class InvalidFieldError extends ValidationError {
  constructor(field: string, reason: string, details?: Record<string, unknown>) {
    super(`${field} ${reason}`, 'invalid_field', { field, ...details });
    this.name = 'InvalidFieldError';
  }
}

export class InsufficientEntropyError extends ClientKeyError {
  constructor(what: string, got: number, want: number) {
    super(
      `Insufficient random bytes generating ${what}. got ${got}, wanted ${want}`,
      'insufficient_entropy',
      500,
      { what, got, want }
    );
    this.name = 'InsufficientEntropyError';
  }
}
