/**
 * Engine error handling built on dockerode's native error structure
 */

import type { ErrorGuidance } from '@/types';
import {
  createErrorGuidanceBuilder,
  extractErrorMessage,
  type ErrorPattern,
} from '@/lib/error-utils';

/**
 * Shape of the errors dockerode (docker-modem) rejects with
 */
interface DockerodeError extends Error {
  statusCode?: number;
  json?: Record<string, unknown> | null;
  reason?: string;
  code?: string;
}

function isDockerodeError(error: unknown): error is DockerodeError {
  if (!(error instanceof Error)) return false;
  const candidate: Partial<Record<keyof DockerodeError, unknown>> = error;
  return (
    typeof candidate.statusCode === 'number' ||
    (typeof candidate.json === 'object' && candidate.json !== null) ||
    typeof candidate.reason === 'string' ||
    typeof candidate.code === 'string'
  );
}

function errorCode(error: unknown): string | undefined {
  return isDockerodeError(error) ? error.code : undefined;
}

function statusCode(error: unknown): number | undefined {
  return isDockerodeError(error) ? error.statusCode : undefined;
}

/**
 * The daemon's own message: `json.message` when present, else the error message
 */
export function extractEngineMessage(error: unknown): string {
  if (isDockerodeError(error) && error.json && typeof error.json.message === 'string') {
    const jsonMessage = error.json.message.trim();
    if (jsonMessage.length > 0) return jsonMessage;
  }
  return extractErrorMessage(error);
}

function buildDetails(error: unknown): Record<string, unknown> {
  const details: Record<string, unknown> = {};
  if (isDockerodeError(error)) {
    if (error.statusCode !== undefined) details.statusCode = error.statusCode;
    if (error.json) details.json = error.json;
    if (error.reason) details.reason = error.reason;
    if (error.code) details.code = error.code;
  }
  return details;
}

function codePattern(code: string, hint: string, resolution: string): ErrorPattern {
  return {
    match: (error) => errorCode(error) === code,
    guidance: (error) => ({
      message: extractEngineMessage(error),
      hint,
      resolution,
      details: buildDetails(error),
    }),
  };
}

function statusPattern(
  matches: (status: number) => boolean,
  hint: string,
  resolution: string,
): ErrorPattern {
  return {
    match: (error) => {
      const status = statusCode(error);
      return status !== undefined && matches(status);
    },
    guidance: (error) => ({
      message: extractEngineMessage(error),
      hint,
      resolution,
      details: buildDetails(error),
    }),
  };
}

/**
 * Engine error patterns in order of specificity
 */
const engineErrorPatterns: ErrorPattern[] = [
  codePattern(
    'ENOENT',
    'The Docker socket does not exist',
    'Start Docker Desktop or the Docker service, or point DOCKER_SOCKET at the right socket.',
  ),
  codePattern(
    'ECONNREFUSED',
    'The Docker daemon refused the connection',
    'Ensure the Docker daemon is running: `docker ps` should succeed.',
  ),
  codePattern(
    'EACCES',
    'Permission denied on the Docker socket',
    'Run the relay as a user in the `docker` group or adjust the socket permissions.',
  ),
  codePattern(
    'ENOTFOUND',
    'The registry hostname could not be resolved',
    'Check the registry name and the DNS configuration of the Docker host.',
  ),
  codePattern(
    'ETIMEDOUT',
    'The Docker operation timed out',
    'Check network connectivity or raise DOCKER_TIMEOUT for large images.',
  ),
  statusPattern(
    (status) => status === 401 || status === 403,
    'The registry rejected the credentials of the Docker daemon',
    'Run `docker login <registry>` on the Docker host for the source and target registries.',
  ),
  statusPattern(
    (status) => status === 404,
    'The image or tag does not exist',
    'Verify the image name and tag; private images need `docker login` first.',
  ),
  statusPattern(
    (status) => status >= 500,
    'The Docker daemon or registry reported a server error',
    'Retry the transfer; check the daemon logs if it keeps failing.',
  ),
];

function defaultEngineGuidance(error: unknown): ErrorGuidance {
  return {
    message: extractEngineMessage(error) || 'Docker operation failed',
    hint: 'An error occurred during the Docker operation',
    resolution: 'Check Docker daemon logs and ensure Docker is functioning correctly.',
    details: buildDetails(error),
  };
}

/**
 * Extract operator guidance from any error raised by the engine
 */
export const extractEngineErrorGuidance = createErrorGuidanceBuilder(
  engineErrorPatterns,
  defaultEngineGuidance,
);

/**
 * One-line diagnostic for a failed connectivity check
 */
export function describeConnectionError(error: unknown): string {
  switch (errorCode(error)) {
    case 'ENOENT':
      return 'Docker is not running: start Docker Desktop or the Docker service';
    case 'ECONNREFUSED':
      return 'The Docker daemon refused the connection: check the Docker service status';
    default:
      return `Docker connection failed: ${extractEngineMessage(error)}`;
  }
}
