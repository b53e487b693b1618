/**
 * Error classifier — turns free-form error text into a typed verdict.
 *
 * Matching is lower-cased substring containment against the pattern sets in
 * the config, tested in priority order. The first category that matches wins;
 * text matching nothing is `unknown`. Every function here is total: absent or
 * non-string input never throws.
 */

import { createConfig } from '../config.js';
import { ErrorCategory, ExitCode } from '../types.js';
import type { ClassifierConfig, MatchedCategory, Verdict } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface ErrorClassifier {
    readonly patternsVersion: number;
    classify(raw?: string | null): Verdict;
    isTimeoutError(raw: unknown): boolean;
    isConnectivityError(raw: unknown): boolean;
    isHttpError(raw: unknown): boolean;
    /** Timeout or connectivity failure, i.e. one worth retrying. */
    isTransportError(raw: unknown): boolean;
}

// =============================================================================
// Verdict Construction
// =============================================================================

function toVerdict(
  category: ErrorCategory,
  text: string,
  prefixes: ClassifierConfig['messagePrefixes']
): Verdict {
  const message = `${prefixes[category]}: ${text}`;

  switch (category) {
  case ErrorCategory.TIMEOUT:
    return { category, exitCode: ExitCode.TIMEOUT, message };
  case ErrorCategory.CONNECTIVITY:
  case ErrorCategory.HTTP:
  case ErrorCategory.UNKNOWN:
    return { category, exitCode: ExitCode.FAILURE, message };
  default: {
    const unhandled: never = category;
    return unhandled;
  }
  }
}

// =============================================================================
// Classifier Factory
// =============================================================================

/**
 * Builds a classifier over the given pattern table.
 *
 * Patterns are compared lower-cased, so the table may hold any casing.
 */
export function createClassifier(config: ClassifierConfig): ErrorClassifier {
  const matches = (category: MatchedCategory, raw: unknown): boolean => {
    if (typeof raw !== 'string') return false;
    const lower = raw.toLowerCase();
    return config.patterns[category].some(pattern => lower.includes(pattern.toLowerCase()));
  };

  const isTimeoutError = (raw: unknown): boolean => matches(ErrorCategory.TIMEOUT, raw);
  const isConnectivityError = (raw: unknown): boolean => matches(ErrorCategory.CONNECTIVITY, raw);

  return {
    patternsVersion: config.patternsVersion,

    classify: (raw?: string | null): Verdict => {
      const text = raw ?? config.unknownErrorText;
      const category = config.priority.find(c => matches(c, text)) ?? ErrorCategory.UNKNOWN;
      return toVerdict(category, text, config.messagePrefixes);
    },

    isTimeoutError,
    isConnectivityError,
    isHttpError: (raw: unknown): boolean => matches(ErrorCategory.HTTP, raw),
    isTransportError: (raw: unknown): boolean => isTimeoutError(raw) || isConnectivityError(raw),
  };
}

// =============================================================================
// Default Classifier
// =============================================================================

export const defaultClassifier: ErrorClassifier = createClassifier(createConfig().classifier);

export const {
  classify,
  isTimeoutError,
  isConnectivityError,
  isHttpError,
  isTransportError,
} = defaultClassifier;
