/**
 * Application configuration module.
 *
 * `createConfig()` builds the single source of truth for the classifier's
 * pattern table, message prefixes and logging defaults.
 *
 * The config is created once at startup and passed as a dependency rather than
 * accessed as a module-level global, making it easy to override in tests or
 * alternative entry points.
 */

import { ErrorCategory } from './types.js';
import type { OutcomeConfig } from './types.js';

/**
 * Creates and returns the application configuration object.
 *
 * Pattern sets live here as data so a new substring is a one-line change.
 * Bump `patternsVersion` whenever one of them changes.
 */
export function createConfig(): OutcomeConfig {
  return {
    classifier: {
      patternsVersion: 1,

      patterns: {
        [ErrorCategory.TIMEOUT]: [
          'timeout',
          'timed out',
          'time out',
          'connection timed out',
          'request timeout',
          'gateway timeout',
          '504',
          '408',
        ],
        [ErrorCategory.CONNECTIVITY]: [
          'resolve',
          'connection',
          'network',
          'internet',
          'dns',
          'refused',
          'unreachable',
          'host',
        ],
        [ErrorCategory.HTTP]: [
          'http error',
          'status code',
          '400',
          '401',
          '403',
          '404',
          '500',
          '502',
          '503',
        ],
      },

      // Error text often matches several sets ("connection timed out"), so
      // order decides. 504 stays timeout-only, 502/503 stay http-only.
      priority: [ErrorCategory.TIMEOUT, ErrorCategory.CONNECTIVITY, ErrorCategory.HTTP],

      messagePrefixes: {
        [ErrorCategory.TIMEOUT]: 'Server timeout',
        [ErrorCategory.CONNECTIVITY]: 'Network connectivity issue',
        [ErrorCategory.HTTP]: 'HTTP error',
        [ErrorCategory.UNKNOWN]: 'API error',
      },

      unknownErrorText: 'Unknown error',
    },

    logger: {
      verbose: true,
    },
  };
}
