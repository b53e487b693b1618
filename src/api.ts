/**
 * Library entry point. The CLI lives in `index.ts`.
 */

export {
  classify,
  createClassifier,
  defaultClassifier,
  isConnectivityError,
  isHttpError,
  isTimeoutError,
  isTransportError,
} from './classifier/classifier.js';
export type { ErrorClassifier } from './classifier/classifier.js';
export { createConfig } from './config.js';
export { ReportError } from './errors.js';
export { Logger, LogLevel } from './logger.js';
export type { LogLevelValue, LoggerOptions } from './logger.js';
export {
  DEFAULT_FAILURE_MESSAGE,
  buildResult,
  failureResult,
  resultFromVerdict,
  successResult,
} from './result/result.js';
export type { BuildResultOptions, SuccessResultOptions } from './result/result.js';
export {
  NO_ROWS_MESSAGE,
  PARSE_FAILURE_MESSAGE,
  resultFromTransport,
  transportErrorText,
} from './result/response.js';
export type { ProcessOptions } from './result/response.js';
export { formatSummary, serializeOutcome } from './result/summary.js';
export { formatTimestamp, isValidTimeZone } from './utils/timestamp.js';
export type { SummaryOptions } from './result/summary.js';
export { ErrorCategory, ExitCode } from './types.js';
export type {
  Cell,
  ClassifierConfig,
  FailureOutcome,
  OutcomeConfig,
  OutcomeRecord,
  Row,
  SerializedOutcome,
  SuccessOutcome,
  Table,
  TransportResult,
  Verdict,
} from './types.js';
