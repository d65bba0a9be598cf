import { InvalidArgumentError } from "commander";
import type { TransformOptions } from "../types.js";
import type { LogLevel } from "../utils/logger.js";

/**
 * User-facing export settings. Everything defaults to the behaviour Trakt's
 * importer expects from a plain library export.
 */
export interface ExportOptions {
  omitWatchlistTimestamp: boolean; // Don't add watchlisted_at
  useCurrentDateForWatched: boolean; // Current time instead of "unknown" for watched_at
  watchedOnly: boolean;
  minimumProgress: number; // Percent, 0-100
}

export const DEFAULT_EXPORT_OPTIONS: ExportOptions = {
  omitWatchlistTimestamp: false,
  useCurrentDateForWatched: false,
  watchedOnly: false,
  minimumProgress: 0,
};

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
];

/**
 * Maps export settings onto the transformer's options.
 * @param options Partial settings, merged over the defaults
 * @param now Optional clock override
 */
export function toTransformOptions(
  options: Partial<ExportOptions> = {},
  now?: () => Date
): TransformOptions {
  const resolved: ExportOptions = { ...DEFAULT_EXPORT_OPTIONS, ...options };
  return {
    includeWatchlistTimestamp: !resolved.omitWatchlistTimestamp,
    useUnknownForWatchedDate: !resolved.useCurrentDateForWatched,
    watchedOnly: resolved.watchedOnly,
    minProgress: resolved.minimumProgress,
    now,
  };
}

/**
 * Argument parser for --min-progress.
 * @throws InvalidArgumentError unless the value is a number in [0, 100]
 */
export function parseMinimumProgress(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (trimmed === "" || Number.isNaN(parsed) || parsed < 0 || parsed > 100) {
    throw new InvalidArgumentError("Expected a percentage between 0 and 100.");
  }
  return parsed;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Argument parser for --log-level.
 * @throws InvalidArgumentError for unknown levels
 */
export function parseLogLevel(value: string): LogLevel {
  const level = value.trim().toLowerCase();
  if (!isLogLevel(level)) {
    throw new InvalidArgumentError(`Expected one of: ${LOG_LEVELS.join(", ")}.`);
  }
  return level;
}
