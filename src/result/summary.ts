/**
 * Presentation views of an outcome record.
 *
 * Neither view is part of the record's stored state: the summary is for
 * humans, the serialized form for `--json` output and dashboards.
 */

import { formatTimestamp } from '../utils/timestamp.js';
import type { OutcomeRecord, SerializedOutcome } from '../types.js';

export interface SummaryOptions {
    /** IANA zone for the timestamp line. Defaults to the local zone. */
    timeZone?: string;
}

/**
 * Multi-line summary: status, exit code, message, then row count and checksum
 * when present, then the creation timestamp. Throws `RangeError` when
 * `options.timeZone` is not a zone `Intl` knows; check with `isValidTimeZone()`.
 */
export function formatSummary(record: OutcomeRecord, options: SummaryOptions = {}): string {
  const lines = [
    `Download Result: ${record.success ? 'SUCCESS' : 'FAILED'}`,
    `  Exit code: ${record.exitCode}`,
    `  Message: ${record.message}`,
  ];

  if (record.payload !== undefined) {
    lines.push(`  Rows: ${record.payload.length}`);
  }
  if (record.checksum !== undefined) {
    lines.push(`  Checksum: ${record.checksum}`);
  }
  lines.push(`  Timestamp: ${formatTimestamp(record.createdAt, options.timeZone)}`);

  return lines.join('\n');
}

export function serializeOutcome(record: OutcomeRecord): SerializedOutcome {
  return {
    success: record.success,
    exit_code: record.exitCode,
    message: record.message,
    rows: record.payload?.length ?? null,
    checksum: record.checksum ?? null,
    is_timeout: record.isTimeout,
    created_at: record.createdAt.toISOString(),
  };
}
