/**
 * Core type definitions for the registry relay.
 * Result types and the error taxonomy shared by every module.
 */

// ===== RESULT TYPE SYSTEM =====

/**
 * Structured error information with actionable guidance
 */
export interface ErrorGuidance {
  /** Primary error message */
  message: string;
  /** Actionable hint for the operator (what went wrong in user terms) */
  hint?: string;
  /** Specific resolution steps to fix the issue */
  resolution?: string;
  /** Additional context or details */
  details?: Record<string, unknown>;
}

/**
 * Reference syntax errors reported by the parser
 */
export type ParseErrorCode = 'EMPTY_NAME' | 'UNSUPPORTED_FORMAT';

/**
 * Failures reported by the container engine facade
 */
export type EngineErrorCode =
  | 'PULL_FAILED'
  | 'TAG_FAILED'
  | 'PUSH_FAILED'
  | 'ENGINE_UNAVAILABLE'
  | 'INFO_FAILED'
  | 'LIST_FAILED'
  | 'REMOVE_FAILED';

export type ErrorCode = ParseErrorCode | EngineErrorCode | 'UNEXPECTED';

/**
 * Result type for functional error handling
 *
 * Errors travel as values so that one failing transfer never throws through
 * the broadcast loop or an HTTP handler.
 *
 * @example
 * ```typescript
 * const result = await engine.pullImage('nginx:latest');
 * if (result.ok) {
 *   console.log(result.value.shortId);
 * } else {
 *   console.error(result.code, result.error);
 * }
 * ```
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: string; code?: ErrorCode; guidance?: ErrorGuidance };

/** Create a success result */
export const Success = <T>(value: T): Result<T> => ({ ok: true, value });

/**
 * Create a failure result with optional guidance and error code
 * @param error - Error message, preserved verbatim for diagnostics
 * @param guidance - Optional structured guidance for operators
 * @param code - Optional taxonomy code
 */
export const Failure = <T>(
  error: string,
  guidance?: ErrorGuidance,
  code?: ErrorCode,
): Result<T> => {
  // Always create a new guidance object to avoid mutating the input parameter
  const resultGuidance = guidance ? { ...guidance, message: guidance.message || error } : undefined;
  const failure: { ok: false; error: string; code?: ErrorCode; guidance?: ErrorGuidance } = {
    ok: false,
    error,
  };
  if (code !== undefined) failure.code = code;
  if (resultGuidance !== undefined) failure.guidance = resultGuidance;
  return failure;
};
