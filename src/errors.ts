/**
 * Custom error classes for download-outcome.
 *
 * Classification and result construction never throw. Only the CLI surface
 * has expected failures (an unreadable or malformed report file), and those
 * are raised as `ReportError` so `main()` can tell them apart from bugs.
 */

/**
 * Represents a known operational error of the command-line surface.
 *
 * The entry point catches this and exits with a logged, user-readable message
 * instead of a stack trace.
 */
export class ReportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReportError';

    // Maintains proper prototype chain in transpiled ES5
    Object.setPrototypeOf(this, ReportError.prototype);
  }
}
