/**
 * CLI command handlers.
 *
 * Each handler returns the text to print and the process exit code instead of
 * writing or exiting itself, so `index.ts` stays a thin shell around them.
 */

import fs from 'fs';
import { z } from 'zod';

import { ReportError } from '../errors.js';
import { resultFromTransport } from '../result/response.js';
import { formatSummary, serializeOutcome } from '../result/summary.js';
import type { ErrorClassifier } from '../classifier/classifier.js';
import type { Logger } from '../logger.js';
import type { ExitCode, TransportResult } from '../types.js';

// =============================================================================
// Types
// =============================================================================

export interface CommandResult {
    exitCode: ExitCode;
    output: string;
}

export interface CommandDeps {
    classifier: ErrorClassifier;
    logger: Logger;
}

export interface OutputOptions {
    json: boolean;
    timeZone?: string;
}

// =============================================================================
// Transport Report File
// =============================================================================

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const transportSchema = z.object({
  success: z.boolean(),
  error: z.string().nullish(),
  statusCode: z.number().int().nullish(),
  rows: z.array(z.record(cellSchema)).optional(),
  checksum: z.string().optional(),
});

/**
 * Reads and validates a transport report written by the download layer.
 * Throws `ReportError` when the file is missing, not JSON, or malformed.
 */
export function loadTransportResult(filePath: string): TransportResult {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ReportError(`Cannot read report "${filePath}": ${msg}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new ReportError(`Report "${filePath}" is not valid JSON: ${msg}`);
  }

  const parsed = transportSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ReportError(`Report "${filePath}" is invalid: ${issues}`);
  }
  return parsed.data;
}

// =============================================================================
// Commands
// =============================================================================

export function runClassify(message: string, options: OutputOptions, deps: CommandDeps): CommandResult {
  const verdict = deps.classifier.classify(message);
  deps.logger.info(`Classified error as ${verdict.category}`);

  const output = options.json
    ? JSON.stringify({ category: verdict.category, exit_code: verdict.exitCode, message: verdict.message }, null, 2)
    : `${verdict.category} (exit code ${verdict.exitCode}): ${verdict.message}`;

  return { exitCode: verdict.exitCode, output };
}

export function runReport(filePath: string, options: OutputOptions, deps: CommandDeps): CommandResult {
  const transport = loadTransportResult(filePath);
  const record = resultFromTransport(transport, deps);

  const output = options.json
    ? JSON.stringify(serializeOutcome(record), null, 2)
    : formatSummary(record, { timeZone: options.timeZone });

  return { exitCode: record.exitCode, output };
}
