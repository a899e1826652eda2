/**
 * zipcast command line: argument parsing, wiring and error reporting
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { AppConfig } from '../config/env.js';
import { ForecastError } from '../domain/errors.js';
import { HttpClient, type FetchLike } from '../domain/http-client.js';
import { logger } from '../domain/logger.js';
import { NwsClient } from '../domain/nws-client.js';
import { formatJsonError, formatJsonReport, formatReport } from '../output/formatter.js';
import { ForecastPipeline } from '../pipeline/forecast-pipeline.js';
import { PostalCodeDB } from '../postal/db.js';
import { Geocoder } from '../postal/geocoder.js';
import { importGeoNamesFile } from '../postal/import.js';
import type { PostalDataset } from '../postal/types.js';
import { ZipcodesDataset } from '../postal/zipcodes-dataset.js';
import { promptLine } from './prompt.js';

export const PROMPT_TEXT = 'Please enter the US ZIP code: ';
export const MAX_PERIODS = 14;

/**
 * Where the CLI reads and writes
 */
export interface CliIO {
  write(text: string): void;
  writeError(text: string): void;
  prompt(question: string): Promise<string>;
}

export interface CliDeps {
  config: AppConfig;
  io?: CliIO;
  /** Transport override, mainly for tests */
  fetchImpl?: FetchLike;
  /** Dataset factory override, mainly for tests */
  openDataset?: (config: AppConfig) => PostalDataset;
}

interface ForecastOptions {
  periods: number;
  json?: boolean;
}

export const processIO: CliIO = {
  write: (text) => {
    process.stdout.write(text);
  },
  writeError: (text) => {
    process.stderr.write(text);
  },
  prompt: (question) => promptLine(question),
};

/**
 * Open the configured offline dataset: an imported SQLite file when
 * POSTAL_DB_PATH is set, the bundled table otherwise
 */
export function openDefaultDataset(config: AppConfig): PostalDataset {
  return config.postalDbPath
    ? new PostalCodeDB(config.postalDbPath)
    : new ZipcodesDataset();
}

export function parsePeriodCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1 || count > MAX_PERIODS) {
    throw new InvalidArgumentError(`Must be an integer from 1 to ${MAX_PERIODS}.`);
  }
  return count;
}

function describeFailure(error: unknown): string {
  if (error instanceof ForecastError) {
    logger.info('Forecast failed', {
      code: error.code,
      retryable: error.retryable,
      details: error.details,
    });
    return error.message;
  }
  if (error instanceof Error) {
    logger.logError(error, { context: 'cli' });
    return error.message;
  }
  logger.error('Unknown failure', { error: String(error) });
  return String(error);
}

/**
 * Run one forecast and print it
 *
 * @returns Process exit code
 */
export async function runForecastCommand(
  postalCodeArg: string | undefined,
  options: ForecastOptions,
  deps: CliDeps
): Promise<number> {
  const io = deps.io ?? processIO;
  const { config } = deps;
  const postalCode = postalCodeArg ?? (await io.prompt(PROMPT_TEXT));

  let pipeline: ForecastPipeline | undefined;
  let dataset: PostalDataset | undefined;
  try {
    dataset = (deps.openDataset ?? openDefaultDataset)(config);
    const http = new HttpClient({
      userAgent: config.nwsUserAgent,
      timeout: config.nwsTimeoutMs,
      fetchImpl: deps.fetchImpl,
    });
    pipeline = new ForecastPipeline(
      {
        geocoder: new Geocoder(dataset),
        client: new NwsClient(http, { baseUrl: config.nwsBaseUrl }),
      },
      { periods: options.periods }
    );

    const report = await pipeline.run(postalCode);
    io.write(options.json ? formatJsonReport(report) : formatReport(report));
    return 0;
  } catch (error) {
    const message = describeFailure(error);
    if (options.json) {
      io.write(formatJsonError(message, pipeline?.location));
    } else {
      io.writeError(`Error: ${message}\n`);
    }
    return 1;
  } finally {
    dataset?.close();
  }
}

/**
 * Build the GeoNames import into SQLite
 *
 * @returns Process exit code
 */
export function runImportCommand(source: string, database: string, io: CliIO): number {
  try {
    const { imported, totalPostalCodes } = importGeoNamesFile(source, database);
    io.write(
      `Imported ${imported} postal codes into ${database} (${totalPostalCodes} in total)\n`
    );
    return 0;
  } catch (error) {
    io.writeError(`Error: ${describeFailure(error)}\n`);
    return 1;
  }
}

/**
 * Build the commander program; the chosen command stores its exit code
 * through `setExitCode`
 */
export function createProgram(deps: CliDeps, setExitCode: (code: number) => void): Command {
  const io = deps.io ?? processIO;
  const program = new Command();

  program
    .name(deps.config.appName)
    .description('US ZIP code to National Weather Service forecast')
    .version(deps.config.appVersion)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.write(text),
      writeErr: (text) => io.writeError(text),
    });

  program
    .command('forecast', { isDefault: true })
    .description('Print the forecast for a ZIP code (prompts when omitted)')
    .argument('[postalCode]', 'US ZIP code, e.g. 90210 or 90210-1234')
    .option('-p, --periods <count>', `number of forecast periods to print (1-${MAX_PERIODS})`, parsePeriodCount, 1)
    .option('--json', 'print a JSON object instead of text')
    .action(async (postalCode: string | undefined, options: ForecastOptions) => {
      setExitCode(await runForecastCommand(postalCode, options, { ...deps, io }));
    });

  program
    .command('import-postal-codes')
    .description('Build a SQLite postal database from a GeoNames dump (e.g. US.txt)')
    .argument('<source>', 'GeoNames tab-separated postal code file')
    .argument('<database>', 'SQLite file to create or update')
    .action((source: string, database: string) => {
      setExitCode(runImportCommand(source, database, io));
    });

  return program;
}

/**
 * Parse arguments (without node and script path) and run
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  let exitCode = 0;
  const program = createProgram(deps, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (error) {
    // exitOverride turns help, version and usage errors into exceptions
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
