/**
 * Custom Error Classes
 *
 * Every failure a run can end with is one of these. The CLI prints
 * `<stage> failed: <message>` from them, so messages must name the
 * offending file or value.
 */

export type Stage =
  | 'discovery'
  | 'probe'
  | 'parameters'
  | 'titles'
  | 'timeline'
  | 'metadata'
  | 'plan'
  | 'encode'
  | 'chapters';

/**
 * Base error class for all bookbinder errors
 */
export class BookbinderError extends Error {
  public readonly code: string;
  public readonly stage: Stage;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    stage: Stage,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BookbinderError';
    this.code = code;
    this.stage = stage;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * An input could not be opened, parsed, or reported no usable duration
 */
export class ProbeError extends BookbinderError {
  public readonly filePath: string;

  constructor(filePath: string, reason: string) {
    super(
      `Cannot probe '${filePath}': ${reason}`,
      'PROBE_ERROR',
      'probe',
      { filePath, reason }
    );
    this.name = 'ProbeError';
    this.filePath = filePath;
  }
}

/**
 * The titles file does not hold one title per part
 */
export class TitleCountMismatchError extends BookbinderError {
  public readonly expected: number;
  public readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      `Number of chapter titles (${actual}) does not match number of input files (${expected})`,
      'TITLE_COUNT_MISMATCH',
      'titles',
      { expected, actual }
    );
    this.name = 'TitleCountMismatchError';
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * A user-supplied value is outside what it may be
 */
export class InvalidParameterError extends BookbinderError {
  public readonly parameter: string;
  public readonly value: unknown;

  constructor(
    parameter: string,
    value: unknown,
    validRange: string,
    stage: Stage = 'parameters'
  ) {
    super(
      `Invalid ${parameter}: ${JSON.stringify(value)} (expected ${validRange})`,
      'INVALID_PARAMETER',
      stage,
      { parameter, value, validRange }
    );
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }
}

/**
 * Durations and titles (or chapters and inputs) differ in count.
 * Upstream validation should make this unreachable.
 */
export class LengthMismatchError extends BookbinderError {
  constructor(what: string, left: number, right: number, stage: Stage = 'timeline') {
    super(
      `Internal length mismatch: ${what} (${left} vs ${right})`,
      'LENGTH_MISMATCH',
      stage,
      { what, left, right }
    );
    this.name = 'LengthMismatchError';
  }
}

/**
 * An assembled plan broke one of its own invariants
 */
export class PlanInvariantError extends BookbinderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Plan invariant violated: ${message}`, 'PLAN_INVARIANT', 'plan', details);
    this.name = 'PlanInvariantError';
  }
}

/**
 * The external encoder/muxer failed
 */
export class EncodeError extends BookbinderError {
  public readonly outputPath: string;
  public readonly diagnostic: string;

  constructor(outputPath: string, diagnostic: string) {
    super(
      `Failed to create '${outputPath}': ${diagnostic}`,
      'ENCODE_ERROR',
      'encode',
      { outputPath, diagnostic }
    );
    this.name = 'EncodeError';
    this.outputPath = outputPath;
    this.diagnostic = diagnostic;
  }
}

/**
 * No part files could be found or ordered
 */
export class DiscoveryError extends BookbinderError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DISCOVERY_ERROR', 'discovery', details);
    this.name = 'DiscoveryError';
  }
}

export function isBookbinderError(error: unknown): error is BookbinderError {
  return error instanceof BookbinderError;
}
