/**
 * Shared TypeScript interfaces and types for download-outcome.
 *
 * This module contains the core domain types used across all modules.
 * Import from here rather than defining types inline to keep contracts
 * consistent and discoverable.
 */

// =============================================================================
// Error Categories & Exit Codes
// =============================================================================

export const ErrorCategory = {
  TIMEOUT: 'timeout',
  CONNECTIVITY: 'connectivity',
  HTTP: 'http',
  UNKNOWN: 'unknown',
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Categories that are matched against a pattern set, in priority order. */
export type MatchedCategory = Exclude<ErrorCategory, typeof ErrorCategory.UNKNOWN>;

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  TIMEOUT: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// =============================================================================
// Configuration Types
// =============================================================================

export interface ClassifierConfig {
    /** Bumped whenever a pattern set changes. */
    readonly patternsVersion: number;
    /** Substrings per category, tested in the order of `priority`. */
    readonly patterns: Readonly<Record<MatchedCategory, readonly string[]>>;
    readonly priority: readonly MatchedCategory[];
    readonly messagePrefixes: Readonly<Record<ErrorCategory, string>>;
    /** Text classified when no error message was supplied. */
    readonly unknownErrorText: string;
}

export interface OutcomeConfig {
    readonly classifier: ClassifierConfig;
    readonly logger: {
        readonly verbose: boolean;
    };
}

// =============================================================================
// CLI Options
// =============================================================================

export interface CliOptions {
    json: boolean;
    quiet: boolean;
    log?: string;
    timeZone?: string;
}

// =============================================================================
// Verdict
// =============================================================================

export interface TimeoutVerdict {
    readonly category: typeof ErrorCategory.TIMEOUT;
    readonly exitCode: typeof ExitCode.TIMEOUT;
    readonly message: string;
}

export interface FailureVerdict {
    readonly category: Exclude<ErrorCategory, typeof ErrorCategory.TIMEOUT>;
    readonly exitCode: typeof ExitCode.FAILURE;
    readonly message: string;
}

export type Verdict = TimeoutVerdict | FailureVerdict;

// =============================================================================
// Tabular Payload
// =============================================================================

export type Cell = string | number | boolean | null;

export type Row = Readonly<Record<string, Cell>>;

export type Table = readonly Row[];

// =============================================================================
// Outcome Record
// =============================================================================

export interface SuccessOutcome {
    readonly success: true;
    readonly payload?: Table;
    readonly exitCode: typeof ExitCode.SUCCESS;
    readonly message: string;
    readonly checksum?: string;
    readonly isTimeout: false;
    readonly createdAt: Date;
}

export interface FailureOutcome {
    readonly success: false;
    readonly payload?: undefined;
    readonly exitCode: typeof ExitCode.FAILURE | typeof ExitCode.TIMEOUT;
    readonly message: string;
    readonly checksum?: undefined;
    readonly isTimeout: boolean;
    readonly createdAt: Date;
}

export type OutcomeRecord = SuccessOutcome | FailureOutcome;

/** JSON-ready view of an outcome record. */
export interface SerializedOutcome {
    success: boolean;
    exit_code: ExitCode;
    message: string;
    rows: number | null;
    checksum: string | null;
    is_timeout: boolean;
    created_at: string;
}

// =============================================================================
// Transport Report
// =============================================================================

/** What the download layer reports after a request has finished. */
export interface TransportResult {
    success: boolean;
    error?: string | null;
    statusCode?: number | null;
    rows?: Table;
    checksum?: string;
}
