/**
 * Command-line entry point.
 *
 * Usage:
 *   accession-metadata [accessions...] [options]
 *
 * Options:
 *   -f, --file <path>         File with one accession per line ("#" starts a comment)
 *   -o, --output <path>       Report path (default: metadata_report.tsv)
 *   --format <format>         tsv|csv (default: tsv)
 *   --ncbi-api-key <key>      NCBI API key (default: $NCBI_API_KEY)
 *   -c, --concurrency <n>     Accessions fetched at once (default: $ACCESSION_METADATA_CONCURRENCY or 1)
 *   --log-level <level>       debug|info|warn|error (default: $LOG_LEVEL or info)
 *   -v, --verbose             Same as --log-level debug
 */

import { readFile } from "node:fs/promises";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { loadConfig, type AppConfig } from "./config.js";
import { describeError } from "./errors.js";
import { createMetadataGrabber, type GrabberOptions, type MetadataGrabber } from "./grabber.js";
import { createLogger, LOG_LEVELS, type Logger, type LogLevel } from "./logger.js";
import { OUTPUT_FORMATS, summarizeStatuses, writeRecords, type OutputFormat } from "./output.js";

export const DEFAULT_OUTPUT = "metadata_report.tsv";

const MAX_CONCURRENCY = 16;

type CliOptions = {
  file?: string;
  output: string;
  format: string;
  ncbiApiKey?: string;
  concurrency?: number;
  logLevel?: string;
  verbose?: boolean;
};

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  createGrabber?: (options: GrabberOptions) => MetadataGrabber;
  createLogger?: (level: LogLevel) => Logger;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

/** Accessions from file text: one per line, blank lines and "#" comments skipped. */
export function parseAccessionList(text: string): string[] {
  const accessions: string[] = [];
  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line || line.startsWith("#")) continue;
    accessions.push(line);
  }
  return accessions;
}

function parseConcurrency(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1 || n > MAX_CONCURRENCY) {
    throw new InvalidArgumentError(`Must be an integer between 1 and ${MAX_CONCURRENCY}.`);
  }
  return n;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function buildProgram(): Command {
  return new Command()
    .name("accession-metadata")
    .description("Fetch dataset metadata for GEO (GSE) and ENA (ERP/SRP/DRP) accessions")
    .argument("[accessions...]", "Accessions to fetch")
    .option("-f, --file <path>", "File with one accession per line")
    .option("-o, --output <path>", "Report path", DEFAULT_OUTPUT)
    .addOption(new Option("--format <format>", "Report format").choices(OUTPUT_FORMATS).default("tsv"))
    .option("--ncbi-api-key <key>", "NCBI API key (default: $NCBI_API_KEY)")
    .option("-c, --concurrency <n>", "Accessions fetched at once", parseConcurrency)
    .addOption(new Option("--log-level <level>", "Log level").choices(LOG_LEVELS))
    .option("-v, --verbose", "Debug logging");
}

/**
 * Run the CLI with user arguments (no node/script prefix).
 * Resolves to the process exit code.
 */
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = deps.stderr ?? ((text: string) => process.stderr.write(text));
  const makeGrabber = deps.createGrabber ?? createMetadataGrabber;
  const makeLogger = deps.createLogger ?? ((level: LogLevel) => createLogger({ level }));

  const program = buildProgram()
    .exitOverride()
    .configureOutput({ writeOut: stdout, writeErr: stderr });

  try {
    program.parse(argv, { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;
    throw err;
  }

  const options = program.opts<CliOptions>();

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (err) {
    stderr(`Error: ${describeError(err)}\n`);
    return 1;
  }

  const accessions = [...program.args];
  if (options.file) {
    try {
      accessions.push(...parseAccessionList(await readFile(options.file, "utf-8")));
    } catch (err) {
      stderr(`Error: Cannot read accession file ${options.file}: ${describeError(err)}\n`);
      return 1;
    }
  }

  if (accessions.length === 0) {
    stderr("Error: No accessions given. Pass accessions as arguments or with --file.\n");
    return 2;
  }

  const format: OutputFormat = isOutputFormat(options.format) ? options.format : "tsv";
  const requestedLevel = options.logLevel && isLogLevel(options.logLevel) ? options.logLevel : config.logLevel;
  const logger = makeLogger(options.verbose ? "debug" : requestedLevel);

  const grabberOptions: GrabberOptions = { ncbiTool: config.ncbiTool, logger };
  const apiKey = options.ncbiApiKey ?? config.ncbiApiKey;
  if (apiKey) grabberOptions.ncbiApiKey = apiKey;
  if (config.ncbiEmail) grabberOptions.ncbiEmail = config.ncbiEmail;
  const grabber = makeGrabber(grabberOptions);

  stdout(`Fetching metadata for ${accessions.length} accession(s)...\n`);
  const records = await grabber.fetchAll(accessions, {
    concurrency: options.concurrency ?? config.concurrency,
    onProgress: ({ completed, total, accession, status }) => {
      logger.info(`[${completed}/${total}] ${accession}: ${status}`);
    },
  });

  try {
    await writeRecords(options.output, records, format);
  } catch (err) {
    stderr(`Error: Cannot write report ${options.output}: ${describeError(err)}\n`);
    return 1;
  }

  const counts = summarizeStatuses(records);
  stdout(`Done. ${counts.success} succeeded, ${counts.partial} partial, ${counts.error} failed.\n`);
  stdout(`Output: ${options.output}\n`);
  return 0;
}

export async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}
