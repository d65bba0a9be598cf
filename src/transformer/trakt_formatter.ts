import type { RawEntity, TraktEntry, TraktEntryType } from "../types.js";

export const UNKNOWN_WATCHED_DATE = "unknown";

// Explicit marker or nearly finished
export const WATCHED_PROGRESS_THRESHOLD = 90;

export function isWatched(entity: RawEntity): boolean {
  return entity.watched || entity.progressPercent > WATCHED_PROGRESS_THRESHOLD;
}

export function resolveEntryType(entity: RawEntity): TraktEntryType {
  return entity.season !== undefined && entity.episode !== undefined
    ? "episode"
    : entity.kind;
}

/**
 * Builds one Trakt import entry. Key insertion order is the order Trakt
 * fields appear in the written JSON: schema fields first, then the
 * "_"-prefixed fields kept for inspection.
 *
 * @param entity Scanned card
 * @param config Timestamp settings for this run
 * @returns The import entry
 */
export function formatTraktEntry(
  entity: RawEntity,
  config: {
    timestamp: string; // ISO-8601 UTC, shared by every entry of a run
    includeWatchlistTimestamp: boolean;
    useUnknownForWatchedDate: boolean;
  }
): TraktEntry {
  const type = resolveEntryType(entity);
  const entry: TraktEntry = {
    imdb_id: entity.identifier,
    type,
  };

  if (entity.displayTitle) {
    entry.title = entity.displayTitle;
  }

  if (isWatched(entity)) {
    entry.watched_at = config.useUnknownForWatchedDate
      ? UNKNOWN_WATCHED_DATE
      : config.timestamp;
  }

  if (config.includeWatchlistTimestamp) {
    entry.watchlisted_at = config.timestamp;
  }

  if (type === "episode") {
    entry.season = entity.season;
    entry.episode = entity.episode;
  }

  if (entity.href) entry._href = entity.href;
  if (entity.posterUrl) entry._poster_url = entity.posterUrl;
  if (entity.progressPercent > 0) entry._progress = entity.progressPercent;
  if (entity.year) entry._year = entity.year;
  if (entity.durationText) entry._duration = entity.durationText;
  if (entity.episodeTitle) entry._episode_title = entity.episodeTitle;

  return entry;
}

/**
 * Serializes entries the way the import file is written: two-space
 * indentation and a trailing newline.
 */
export function serializeEntries(entries: TraktEntry[]): string {
  return `${JSON.stringify(entries, null, 2)}\n`;
}
