/**
 * Error handling utilities for consistent error message extraction
 */

import type { ErrorGuidance } from '@/types';

/**
 * Safely extracts error message from unknown error types.
 * Invariant: Always returns a string message
 */
export function extractErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Creates a formatted error message with optional context
 */
export function formatErrorMessage(context: string, error: unknown): string {
  return `${context}: ${extractErrorMessage(error)}`;
}

/**
 * Pattern definition for matching errors and generating guidance
 */
export interface ErrorPattern {
  match: (error: unknown) => boolean;
  guidance: (error: unknown) => ErrorGuidance;
}

/**
 * Build a guidance extractor that tries each pattern in order
 */
export function createErrorGuidanceBuilder(
  patterns: ErrorPattern[],
  fallback: (error: unknown) => ErrorGuidance,
): (error: unknown) => ErrorGuidance {
  return (error: unknown) => {
    const matched = patterns.find((pattern) => pattern.match(error));
    return matched ? matched.guidance(error) : fallback(error);
  };
}
