/**
 * Logger module with timestamped, level-tagged lines and optional file output.
 *
 * Line format is `YYYY-MM-DD HH:MM:SS <zone> [LEVEL] - <message>`, kept stable
 * for log scrapers. Verbosity is a constructor option rather than ambient
 * state; a quiet logger drops every line.
 *
 * A log file that cannot be opened or written does not take the process down:
 * the logger reports it on stderr, replays the lines the file never received,
 * and keeps logging to stderr.
 */

import fs from 'fs';

import { formatTimestamp, isValidTimeZone } from './utils/timestamp.js';

// =============================================================================
// Log Level
// =============================================================================

export const LogLevel = {
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
} as const;

export type LogLevelValue = (typeof LogLevel)[keyof typeof LogLevel];

const levelNames: Record<LogLevelValue, string> = {
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARNING]: 'WARNING',
  [LogLevel.ERROR]: 'ERROR',
};

// =============================================================================
// Types
// =============================================================================

export interface LoggerOptions {
    /** Emit lines at all. Defaults to true. */
    verbose?: boolean;
    /** Path to a log file. If set, output goes to file instead of stderr. */
    log?: string;
    /** IANA zone for timestamps. Defaults to the local zone. Invalid zones throw `RangeError`. */
    timeZone?: string;
}

// =============================================================================
// Logger Class
// =============================================================================

export class Logger {
  private readonly verbose: boolean;
  private readonly timeZone: string | undefined;
  private logStream: fs.WriteStream | null = null;
  // Lines written before the file opened; replayed to stderr if opening fails.
  private unopenedLines: string[] = [];
  private streamClosed: Promise<void> = Promise.resolve();

  constructor(options: LoggerOptions = {}) {
    if (options.timeZone !== undefined && !isValidTimeZone(options.timeZone)) {
      throw new RangeError(`Invalid time zone: ${options.timeZone}`);
    }

    this.verbose = options.verbose ?? true;
    this.timeZone = options.timeZone;

    if (this.verbose && options.log) {
      this._openLogFile(options.log);
    }
  }

  private _openLogFile(logPath: string): void {
    const stream = fs.createWriteStream(logPath, { flags: 'a' });
    this.logStream = stream;

    this.streamClosed = new Promise(resolve => {
      stream.on('open', () => {
        this.unopenedLines = [];
      });
      stream.on('error', error => {
        if (this.logStream === stream) this.logStream = null;
        console.error(this.format(`Cannot write log file "${logPath}": ${error.message}`, LogLevel.WARNING));
        for (const line of this.unopenedLines) {
          console.error(line);
        }
        this.unopenedLines = [];
        resolve();
      });
      stream.on('close', () => resolve());
    });
  }

  /** Builds the line without emitting it. */
  format(message: string, level: LogLevelValue = LogLevel.INFO): string {
    return `${formatTimestamp(new Date(), this.timeZone)} [${levelNames[level]}] - ${message}`;
  }

  log(message: string, level: LogLevelValue = LogLevel.INFO): void {
    if (!this.verbose) return;

    const line = this.format(message, level);
    if (this.logStream) {
      if (this.logStream.pending) this.unopenedLines.push(line);
      this.logStream.write(`${line}\n`);
    } else {
      console.error(line);
    }
  }

  info(message: string): void {
    this.log(message, LogLevel.INFO);
  }

  warning(message: string): void {
    this.log(message, LogLevel.WARNING);
  }

  error(message: string): void {
    this.log(message, LogLevel.ERROR);
  }

  /**
   * Flushes and closes the log file stream. Resolves once the file is closed
   * or has failed. Safe to call multiple times.
   */
  close(): Promise<void> {
    if (this.logStream) {
      this.logStream.end();
      this.logStream = null;
    }
    return this.streamClosed;
  }
}
