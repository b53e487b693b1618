/**
 * Argument parsing and dispatch for the download-outcome CLI.
 *
 * `run()` resolves to the process exit status instead of exiting, so the entry
 * point stays a one-liner and the whole flow can be driven from tests.
 */

import { createRequire } from 'node:module';
import yargs from 'yargs';

import { createClassifier } from '../classifier/classifier.js';
import { createConfig } from '../config.js';
import { ReportError } from '../errors.js';
import { Logger } from '../logger.js';
import { isValidTimeZone } from '../utils/timestamp.js';
import { runClassify, runReport } from './commands.js';
import type { CliOptions } from '../types.js';

const require = createRequire(import.meta.url);
const packageJson = require('../../package.json') as { version: string };

// =============================================================================
// Argument parsing
// =============================================================================

type ParsedCommand =
  | { name: 'classify'; message: string }
  | { name: 'report'; file: string };

interface ParsedArgs {
    command: ParsedCommand;
    options: CliOptions;
}

/**
 * Returns null when yargs handled the invocation itself (`--help`, `--version`).
 * Usage errors are thrown as `ReportError`.
 */
function parseArgs(args: readonly string[]): ParsedArgs | null {
  const selected: { command?: ParsedCommand } = {};

  const argv = yargs([...args])
    .scriptName('download-outcome')
    .wrap(null)
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw new ReportError(msg || (err ? err.message : 'Invalid arguments'));
    })
    .version(packageJson.version)
    .command(
      'classify <message..>',
      'Classify a raw error message',
      y => y.positional('message', { type: 'string', array: true, demandOption: true }),
      argv => {
        selected.command = { name: 'classify', message: (argv.message ?? []).join(' ') };
      }
    )
    .command(
      'report <file>',
      'Build an outcome record from a transport report JSON file',
      y => y.positional('file', { type: 'string', demandOption: true }),
      argv => {
        selected.command = { name: 'report', file: argv.file };
      }
    )
    .demandCommand(1, 'Specify a command: classify or report')
    .option('json', {
      type: 'boolean',
      default: false,
      describe: 'Print machine-readable JSON instead of text',
    })
    .option('quiet', {
      type: 'boolean',
      default: false,
      describe: 'Suppress log lines on stderr',
    })
    .option('log', {
      type: 'string',
      requiresArg: true,
      describe: 'Append log lines to this file instead of stderr',
    })
    .option('time-zone', {
      type: 'string',
      requiresArg: true,
      describe: 'IANA time zone for timestamps. Default: local zone',
    })
    .check(argv => {
      const timeZone = argv['timeZone'];
      if (typeof timeZone === 'string' && !isValidTimeZone(timeZone)) {
        throw new Error(`--time-zone "${timeZone}" is not a valid IANA time zone`);
      }
      return true;
    })
    .usage('Usage: $0 <command> [options]')
    .example('$0 classify "Gateway Timeout (504)"', 'Prints a timeout verdict and exits with 2')
    .example('$0 report result.json --json', 'Prints the outcome record as JSON')
    .epilog('Exit status: 0 success, 1 failure, 2 timeout')
    .help('help')
    .alias('help', 'h')
    .parseSync();

  if (!selected.command) return null;

  return {
    command: selected.command,
    options: {
      json: argv.json,
      quiet: argv.quiet,
      log: argv.log,
      timeZone: argv['timeZone'],
    },
  };
}

// =============================================================================
// Run
// =============================================================================

/**
 * Runs one CLI invocation and resolves to its exit status: the outcome's exit
 * code, or 1 for a usage or report-file error.
 */
export async function run(args: readonly string[]): Promise<number> {
  let parsed: ParsedArgs | null;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof ReportError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }
  if (!parsed) return 0;

  const { command, options } = parsed;
  const config = createConfig();
  const logger = new Logger({
    verbose: config.logger.verbose && !options.quiet,
    log: options.log,
    timeZone: options.timeZone,
  });
  const deps = { classifier: createClassifier(config.classifier), logger };

  try {
    const result = command.name === 'classify'
      ? runClassify(command.message, options, deps)
      : runReport(command.file, options, deps);
    console.log(result.output);
    return result.exitCode;
  } catch (error) {
    if (error instanceof ReportError) {
      // A quiet logger would drop the only explanation for exit 1
      if (options.quiet) {
        console.error(error.message);
      } else {
        logger.error(error.message);
      }
      return 1;
    }
    throw error;
  } finally {
    await logger.close();
  }
}
