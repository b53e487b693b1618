/**
 * Result builder — assembles the uniform outcome record every caller receives.
 *
 * Records are frozen and stamped with their creation time. `buildResult()`
 * accepts the loose flag-based arguments but normalizes them so a record can
 * never contradict itself: success always means exit code 0 and no timeout,
 * failure never carries a payload or checksum, and the timeout flag and exit
 * code 2 always travel together.
 *
 * Prefer `successResult()` and `failureResult()`; the latter derives everything
 * from the classifier's verdict.
 */

import { defaultClassifier } from '../classifier/classifier.js';
import type { ErrorClassifier } from '../classifier/classifier.js';
import { ExitCode } from '../types.js';
import type { FailureOutcome, OutcomeRecord, SuccessOutcome, Table, Verdict } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface BuildResultOptions {
    success: boolean;
    payload?: Table;
    exitCode?: number;
    message?: string;
    checksum?: string;
    isTimeout?: boolean;
}

export interface SuccessResultOptions {
    message?: string;
    checksum?: string;
}

/** Used when a failure record would otherwise carry an empty message. */
export const DEFAULT_FAILURE_MESSAGE = 'Unknown error';

// =============================================================================
// Builders
// =============================================================================

export function buildResult(options: BuildResultOptions): OutcomeRecord {
  const createdAt = new Date();

  if (options.success) {
    const record: SuccessOutcome = {
      success: true,
      ...(options.payload !== undefined ? { payload: options.payload } : {}),
      exitCode: ExitCode.SUCCESS,
      message: options.message ?? '',
      ...(options.checksum !== undefined ? { checksum: options.checksum } : {}),
      isTimeout: false,
      createdAt,
    };
    return Object.freeze(record);
  }

  const isTimeout = options.isTimeout === true || options.exitCode === ExitCode.TIMEOUT;
  const record: FailureOutcome = {
    success: false,
    exitCode: isTimeout ? ExitCode.TIMEOUT : ExitCode.FAILURE,
    message: options.message || DEFAULT_FAILURE_MESSAGE,
    isTimeout,
    createdAt,
  };
  return Object.freeze(record);
}

export function successResult(payload?: Table, options: SuccessResultOptions = {}): OutcomeRecord {
  return buildResult({
    success: true,
    payload,
    exitCode: ExitCode.SUCCESS,
    message: options.message,
    checksum: options.checksum,
  });
}

/** Builds a failure record from an already-computed verdict. */
export function resultFromVerdict(verdict: Verdict): OutcomeRecord {
  return buildResult({
    success: false,
    exitCode: verdict.exitCode,
    message: verdict.message,
    isTimeout: verdict.exitCode === ExitCode.TIMEOUT,
  });
}

/** Classifies the raw error text and builds the matching failure record. */
export function failureResult(
  rawError?: string | null,
  classifier: ErrorClassifier = defaultClassifier
): OutcomeRecord {
  return resultFromVerdict(classifier.classify(rawError));
}
