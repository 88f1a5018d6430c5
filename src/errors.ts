/**
 * Error taxonomy for the embedding pipeline and ranking engine.
 *
 * Every failure raised by vecrank carries a machine-readable code so callers
 * (CLI, batch jobs, a future transport layer) can tell caller mistakes apart
 * from fatal startup conditions and runtime contract violations.
 *
 * Lower layers never swallow errors: each module throws one of these classes
 * and callers propagate them unchanged. Underlying causes are attached via
 * the standard `cause` option.
 */

/**
 * Machine-readable error codes.
 *
 * - INVALID_ARGUMENT: malformed or empty caller input. Never retried.
 * - MODEL_ARTIFACT_MISSING: model or tokenizer file absent at startup. Fatal.
 * - TOKENIZER_UNAVAILABLE: tokenizer artifact exists but cannot be loaded. Fatal.
 * - INTERNAL_ERROR: runtime contract violation (wrong output rank, count mismatch).
 *   Usually means the model file does not match the expected encoder.
 */
export type VecrankErrorCode =
  | 'INVALID_ARGUMENT'
  | 'MODEL_ARTIFACT_MISSING'
  | 'TOKENIZER_UNAVAILABLE'
  | 'INTERNAL_ERROR';

/**
 * Base class for all vecrank errors.
 */
export class VecrankError extends Error {
  readonly code: VecrankErrorCode;

  constructor(code: VecrankErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VecrankError';
    this.code = code;
  }
}

/** Malformed or empty caller input. */
export class InvalidArgumentError extends VecrankError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_ARGUMENT', message, options);
    this.name = 'InvalidArgumentError';
  }
}

/** A model or tokenizer artifact is missing from disk. */
export class ModelArtifactMissingError extends VecrankError {
  readonly artifactPath: string;

  constructor(artifactPath: string, message?: string) {
    super('MODEL_ARTIFACT_MISSING', message ?? `Model artifact not found at ${artifactPath}`);
    this.name = 'ModelArtifactMissingError';
    this.artifactPath = artifactPath;
  }
}

/** The tokenizer artifact exists but could not be parsed or built. */
export class TokenizerUnavailableError extends VecrankError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TOKENIZER_UNAVAILABLE', message, options);
    this.name = 'TokenizerUnavailableError';
  }
}

/** The model runtime violated its output contract. */
export class InternalError extends VecrankError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('INTERNAL_ERROR', message, options);
    this.name = 'InternalError';
  }
}

/**
 * Type guard for vecrank errors.
 */
export function isVecrankError(error: unknown): error is VecrankError {
  return error instanceof VecrankError;
}

/**
 * Renders an unknown thrown value as a single human-readable line.
 *
 * Vecrank errors are prefixed with their code; anything else falls back to
 * its message (or string form).
 *
 * @example
 * ```typescript
 * describeError(new InvalidArgumentError('Text cannot be empty'));
 * // => 'INVALID_ARGUMENT: Text cannot be empty'
 * ```
 */
export function describeError(error: unknown): string {
  if (isVecrankError(error)) {
    return `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
