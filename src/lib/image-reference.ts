/**
 * Image reference parsing and reconstruction
 *
 * A reference is decomposed into { registry, bucket, repository, tag }:
 *
 * - `name[:tag]`                       -> (docker.io, library, name, tag)
 * - `library/name[:tag]`               -> (docker.io, library, name, tag)
 * - `registry/name[:tag]`              -> (registry, library, name, tag)
 * - `registry/bucket/name[:tag]`       -> (registry, bucket, name, tag)
 *
 * A two-segment reference is read as `registry/name` unless its first
 * segment is literally `library`; `bitnami/redis` therefore parses with
 * registry `bitnami`.
 */

import { Failure, Success, type ImageReference, type Result } from '@/types';

export const DEFAULT_REGISTRY = 'docker.io';
export const DEFAULT_BUCKET = 'library';
export const DEFAULT_TAG = 'latest';

const MAX_SEGMENTS = 3;

function createImageReference(
  registry: string,
  bucket: string,
  repository: string,
  tag: string,
): ImageReference {
  return Object.freeze({ registry, bucket, repository, tag });
}

/**
 * Split off the tag at the last colon. A colon followed by a `/` belongs to
 * a registry port (`localhost:5000/app`) and is not a tag separator.
 */
function splitTag(reference: string): { path: string; tag: string } {
  const colon = reference.lastIndexOf(':');
  if (colon === -1 || reference.indexOf('/', colon) !== -1) {
    return { path: reference, tag: DEFAULT_TAG };
  }
  return {
    path: reference.slice(0, colon),
    tag: reference.slice(colon + 1) || DEFAULT_TAG,
  };
}

function emptyName(raw: string, part: string): Result<ImageReference> {
  const message = `Image name has an empty ${part}: "${raw}"`;
  return Failure(
    message,
    {
      message,
      hint: 'Every segment of the image reference must be non-empty',
      resolution: 'Use the form [registry/][bucket/]name[:tag], e.g. "nginx:latest"',
      details: { reference: raw },
    },
    'EMPTY_NAME',
  );
}

/**
 * Parse a free-form image reference
 *
 * @returns the decomposed reference, or an `EMPTY_NAME` / `UNSUPPORTED_FORMAT` failure
 */
export function parseImageReference(raw: string): Result<ImageReference> {
  const reference = raw.trim();
  if (reference.length === 0) {
    const message = 'Image name cannot be empty';
    return Failure(
      message,
      { message, resolution: 'Provide an image reference such as "nginx:latest"' },
      'EMPTY_NAME',
    );
  }

  const { path, tag } = splitTag(reference);
  const segments = path.split('/');

  if (segments.length > MAX_SEGMENTS) {
    const message = `Unsupported image name format: ${reference}`;
    return Failure(
      message,
      {
        message,
        hint: `At most ${MAX_SEGMENTS} path segments (registry/bucket/name) are supported`,
        resolution: 'Drop the extra path segments from the reference',
        details: { reference, segments: segments.length },
      },
      'UNSUPPORTED_FORMAT',
    );
  }

  const [first = '', second = '', third = ''] = segments;
  let parsed: ImageReference;

  switch (segments.length) {
    case 1:
      parsed = createImageReference(DEFAULT_REGISTRY, DEFAULT_BUCKET, first, tag);
      break;
    case 2:
      parsed =
        first === DEFAULT_BUCKET
          ? createImageReference(DEFAULT_REGISTRY, DEFAULT_BUCKET, second, tag)
          : createImageReference(first, DEFAULT_BUCKET, second, tag);
      break;
    default:
      parsed = createImageReference(first, second, third, tag);
  }

  if (!parsed.repository) return emptyName(reference, 'repository');
  if (!parsed.registry) return emptyName(reference, 'registry');
  if (!parsed.bucket) return emptyName(reference, 'bucket');

  return Success(parsed);
}

/**
 * Minimal source reference: registry and bucket are elided when they carry
 * their defaults (`nginx:latest`, `gcr.io/app:1.0`, `gcr.io/team/app:1.0`).
 */
export function buildSourceReference(reference: ImageReference): string {
  const { registry, bucket, repository, tag } = reference;
  if (registry === DEFAULT_REGISTRY && bucket === DEFAULT_BUCKET) {
    return `${repository}:${tag}`;
  }
  if (bucket === DEFAULT_BUCKET) {
    return `${registry}/${repository}:${tag}`;
  }
  return `${registry}/${bucket}/${repository}:${tag}`;
}

/**
 * Target reference in the new registry. The bucket is always spelled out.
 */
export function buildTargetReference(
  targetRegistry: string,
  bucket: string,
  repository: string,
  tag: string,
): string {
  return `${targetRegistry}/${bucket || DEFAULT_BUCKET}/${repository}:${tag}`;
}

/**
 * The requested target registry, or `fallback` when none was given
 */
export function resolveTargetRegistry(requested: string | undefined, fallback: string): string {
  const trimmed = requested?.trim();
  return trimmed ? trimmed : fallback;
}
