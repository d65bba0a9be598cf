#!/usr/bin/env node

import { Command, CommanderError } from "commander";
import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { chalkStderr as chalk } from "chalk";
import boxen from "boxen";
import type { LibrarySummary } from "./types.js";
import * as logger from "./utils/logger.js";
import type { LogLevel } from "./utils/logger.js";
import { readInput, writeOutput } from "./utils/file_utils.js";
import {
  parseLogLevel,
  parseMinimumProgress,
  toTransformOptions,
} from "./config/options.js";
import { convertLibraryExport } from "./converter/index.js";
import {
  formatSummaryLine,
  serializeEntries,
} from "./transformer/index.js";
import { ConversionError } from "./errors.js";

export const VERSION = "1.0.0";

type CliOptions = {
  output?: string;
  watchlist: boolean; // false with --no-watchlist
  useCurrentDate: boolean;
  watchedOnly: boolean;
  minProgress: number;
  logLevel: LogLevel;
  logFile?: string;
};

export interface CliStreams {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

function buildProgram(): Command {
  return new Command()
    .name("stremio-trakt-export")
    .description(
      "Extract media from a Stremio library HTML export and convert it to Trakt import format"
    )
    .version(VERSION, "-V, --version")
    .argument("[input]", "Input HTML file (default: stdin)")
    .option("-o, --output <path>", "Output JSON file (default: stdout)")
    .option(
      "--no-watchlist",
      "Do not add watchlisted_at (by default every item gets watchlisted_at)"
    )
    .option(
      "--use-current-date",
      'Use the current date instead of "unknown" for watched_at',
      false
    )
    .option(
      "--watched-only",
      "Only include items that are marked as watched",
      false
    )
    .option(
      "--min-progress <percent>",
      "Minimum progress percentage to include",
      parseMinimumProgress,
      0
    )
    .option(
      "--log-level <level>",
      "Log level (debug, info, warn, error)",
      parseLogLevel,
      "info"
    )
    .option("--log-file <path>", "Append log lines to this file")
    .addHelpText(
      "after",
      `
Examples:
  stremio-trakt-export library.html > trakt.json
  stremio-trakt-export library.html -o trakt.json --watched-only
  cat library.html | stremio-trakt-export --min-progress 50 --no-watchlist
    `
    )
    .exitOverride();
}

function summaryPanel(
  summary: LibrarySummary,
  exported: number,
  outputPath: string | undefined
): string {
  let content = "";
  content += `${chalk.green("Items found:")} ${summary.total}\n`;
  content += `  - Movies:   ${summary.movies}\n`;
  content += `  - Shows:    ${summary.shows}\n`;
  content += `  - Episodes: ${summary.episodes}\n`;
  content += `${chalk.yellow("Watched:")}     ${summary.watched}\n`;
  content += `${chalk.blue("Exported:")}    ${exported}\n`;
  content += `${chalk.blue("Output:")}      ${outputPath ?? "stdout"}`;
  return boxen(content, {
    title: "Export Summary",
    padding: 1,
    margin: 1,
    borderStyle: "round",
    borderColor: "green",
  });
}

/**
 * Runs the exporter with command-line arguments.
 * @param argv Full argv, including the node binary and script path
 * @param streams Where the HTML is read from and the JSON is written to
 *   when no file paths are given
 * @returns Process exit code
 */
export async function run(
  argv: string[] = process.argv,
  streams: CliStreams = { stdin: process.stdin, stdout: process.stdout }
): Promise<number> {
  const program = buildProgram();
  try {
    program.parse(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    throw err;
  }

  const opts = program.opts<CliOptions>();
  const inputPath: string | undefined = program.args[0];

  logger.configureLogger({
    consoleLogLevel: opts.logLevel,
    logToFile: Boolean(opts.logFile),
    logFilePath: opts.logFile,
  });

  try {
    const html = await readInput(inputPath, streams.stdin);
    if (html === null) {
      return 1;
    }

    const transformOptions = toTransformOptions({
      omitWatchlistTimestamp: !opts.watchlist,
      useCurrentDateForWatched: opts.useCurrentDate,
      watchedOnly: opts.watchedOnly,
      minimumProgress: opts.minProgress,
    });
    logger.debug(
      `Transform options: ${JSON.stringify({ ...transformOptions, now: undefined })}`
    );

    const { entries, summary } = convertLibraryExport(html, transformOptions);
    logger.info(formatSummaryLine(summary));
    if (entries.length === 0) {
      logger.warn("No items left after filtering, writing an empty list");
    }

    const written = await writeOutput(
      opts.output,
      serializeEntries(entries),
      streams.stdout
    );
    if (!written) {
      return 1;
    }

    logger.success(`Exported ${entries.length} items to Trakt format`);
    if (opts.output) {
      logger.info(`Output written to: ${opts.output}`);
    }
    if (logger.isConsoleLevelEnabled("info")) {
      console.error(summaryPanel(summary, entries.length, opts.output));
    }
    return 0;
  } catch (err) {
    if (err instanceof ConversionError) {
      logger.error(`Error: ${err.message}`);
      if (err.hint) {
        logger.info(err.hint);
      }
      if (logger.isConsoleLevelEnabled("error")) {
        console.error(
          boxen(chalk.red(`${err.message}${err.hint ? `\n\n${err.hint}` : ""}`), {
            title: "Export Failed",
            padding: 1,
            margin: 1,
            borderColor: "red",
          })
        );
      }
      return 1;
    }

    const message = err instanceof Error ? err.message : String(err);
    logger.error(
      `Fatal export error: ${message}`,
      err instanceof Error ? err.stack : undefined
    );
    return 1;
  }
}

function isDirectRun(): boolean {
  const invokedPath = process.argv[1];
  if (!invokedPath) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(invokedPath)).href;
  } catch {
    return false;
  }
}

// Run if this is the main module
if (isDirectRun()) {
  run().then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    }
  );
}
