/**
 * Domain types for image transfers and progress reporting
 */

import type { ErrorCode } from './core';

/**
 * A container image reference decomposed into its four canonical parts.
 * Instances are frozen; two references are the same when their fields are.
 */
export interface ImageReference {
  readonly registry: string;
  /** Namespace between registry and repository; `library` for official images */
  readonly bucket: string;
  readonly repository: string;
  readonly tag: string;
}

/**
 * A request to copy one image into the target registry
 */
export interface TransferRequest {
  /** Raw image reference as submitted, e.g. `nginx:latest` */
  imageName: string;
  /** Target registry domain; the configured default is used when absent or empty */
  targetRegistry?: string;
}

export type TransferState =
  | 'start'
  | 'parsing'
  | 'pulling'
  | 'tagging'
  | 'pushing'
  | 'done'
  | 'failed';

/** States a run can fail from */
export type TransferStage = Exclude<TransferState, 'start' | 'done' | 'failed'>;

/**
 * Terminal record of one pipeline run. Not persisted.
 */
export interface TransferOutcome {
  success: boolean;
  state: Extract<TransferState, 'done' | 'failed'>;
  /** Resolved source reference, once parsing succeeded */
  source?: string;
  /** Resolved target reference, once parsing succeeded */
  target?: string;
  failedAt?: TransferStage;
  error?: string;
  code?: ErrorCode;
}

/**
 * One progress notification as sent to observers
 */
export interface ProgressEvent {
  message: string;
  /** Integer percentage in [0, 100] */
  progress: number;
  /** Seconds since the Unix epoch, fractional */
  timestamp: number;
}
