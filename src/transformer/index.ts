import type {
  LibrarySummary,
  RawEntity,
  TraktEntry,
  TransformOptions,
} from "../types.js";
import * as logger from "../utils/logger.js";
import {
  formatTraktEntry,
  isWatched,
  resolveEntryType,
} from "./trakt_formatter.js";

export { isWatched, serializeEntries } from "./trakt_formatter.js";

/**
 * Drops entities the run should not export. Applied before conversion, so
 * a filtered entity leaves no trace in the output.
 */
export function filterEntities(
  entities: RawEntity[],
  options: Pick<TransformOptions, "minProgress" | "watchedOnly">
): RawEntity[] {
  let kept = entities;

  if (options.minProgress > 0) {
    kept = kept.filter(
      (entity) => entity.progressPercent >= options.minProgress
    );
  }

  if (options.watchedOnly) {
    kept = kept.filter(isWatched);
  }

  if (kept.length !== entities.length) {
    logger.debug(
      `[Transformer] Filtered out ${entities.length - kept.length} of ${
        entities.length
      } items`
    );
  }

  return kept;
}

/**
 * Converts scanned cards into Trakt import entries, preserving order.
 * @param entities Scanner output
 * @param options Filtering and timestamp settings
 * @returns Import entries
 */
export function transformEntities(
  entities: RawEntity[],
  options: TransformOptions
): TraktEntry[] {
  const now = options.now ? options.now() : new Date();
  const timestamp = now.toISOString();

  return filterEntities(entities, options).map((entity) =>
    formatTraktEntry(entity, {
      timestamp,
      includeWatchlistTimestamp: options.includeWatchlistTimestamp,
      useUnknownForWatchedDate: options.useUnknownForWatchedDate,
    })
  );
}

export function summarizeEntities(entities: RawEntity[]): LibrarySummary {
  const summary: LibrarySummary = {
    total: entities.length,
    movies: 0,
    shows: 0,
    episodes: 0,
    watched: 0,
  };

  for (const entity of entities) {
    switch (resolveEntryType(entity)) {
      case "movie":
        summary.movies++;
        break;
      case "show":
        summary.shows++;
        break;
      case "episode":
        summary.episodes++;
        break;
    }
    if (isWatched(entity)) {
      summary.watched++;
    }
  }

  return summary;
}

export function formatSummaryLine(summary: LibrarySummary): string {
  return `Found ${summary.total} items: ${summary.movies} movies, ${summary.shows} shows, ${summary.episodes} episodes (${summary.watched} watched)`;
}
