/**
 * Response processor — converts a finished transport report into an outcome.
 *
 * Separated from the builders so the download layer's report shape doesn't
 * leak into the record itself.
 */

import { defaultClassifier } from '../classifier/classifier.js';
import type { ErrorClassifier } from '../classifier/classifier.js';
import { ExitCode } from '../types.js';
import type { OutcomeRecord, TransportResult } from '../types.js';
import type { Logger } from '../logger.js';
import { buildResult, failureResult, successResult } from './result.js';

/** Logged when a successful transport carries no rows. */
export const NO_ROWS_MESSAGE = 'No data rows in response';
/** Message of the failure record built for a transport without rows. */
export const PARSE_FAILURE_MESSAGE = 'Failed to parse response';

export interface ProcessOptions {
    classifier?: ErrorClassifier;
    logger?: Logger;
}

/**
 * Text to classify for a failed transport. Without error text the status code
 * stands in, phrased the way the HTTP transport reports it.
 */
export function transportErrorText(transport: TransportResult): string | undefined {
  if (transport.error) return transport.error;
  if (transport.statusCode !== undefined && transport.statusCode !== null) {
    return `HTTP error: ${transport.statusCode}`;
  }
  return undefined;
}

/**
 * Failed transports are classified from their error text, or from their status
 * code when no text was reported. A successful transport without rows is
 * still a failure (exit code 1).
 */
export function resultFromTransport(
  transport: TransportResult,
  options: ProcessOptions = {}
): OutcomeRecord {
  const { classifier = defaultClassifier, logger } = options;

  if (!transport.success) {
    const record = failureResult(transportErrorText(transport), classifier);
    logger?.error(record.message);
    return record;
  }

  const rows = transport.rows ?? [];
  if (rows.length === 0) {
    logger?.warning(NO_ROWS_MESSAGE);
    return buildResult({ success: false, exitCode: ExitCode.FAILURE, message: PARSE_FAILURE_MESSAGE });
  }

  const message = `Downloaded ${rows.length} rows`;
  logger?.info(message);
  return successResult(rows, { message, checksum: transport.checksum });
}
