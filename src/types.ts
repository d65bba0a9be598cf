// Common types shared across the export pipeline

export type RawEntityKind = "movie" | "show";

export type TraktEntryType = RawEntityKind | "episode";

// One media item recovered from a library card in the HTML export
export interface RawEntity {
  identifier: string; // IMDb ID, e.g. tt1234567 (the title, not the episode)
  kind: RawEntityKind;
  href: string; // Raw link target of the card
  displayTitle?: string;
  season?: number;
  episode?: number;
  watched: boolean;
  progressPercent: number; // 0-100
  posterUrl?: string; // Percent-decoded
  posterShape?: string; // e.g. "poster", "landscape", "square"
  year?: number;
  durationText?: string;
  episodeTitle?: string;
  releaseInfoText?: string;
  dataAttributes: Record<string, string>; // data-* attributes of the card, verbatim
}

// Which RawEntity field a pending text token should populate
export type CaptureTarget =
  | "title_text"
  | "release_info"
  | "duration"
  | "episode_title";

// Entry in the Trakt import format. Keys prefixed with "_" are not part of
// the Trakt schema and are carried along for inspection only.
export interface TraktEntry {
  imdb_id: string;
  type: TraktEntryType;
  title?: string;
  watched_at?: string; // "unknown" or ISO-8601 UTC
  watchlisted_at?: string;
  season?: number;
  episode?: number;
  _href?: string;
  _poster_url?: string;
  _progress?: number;
  _year?: number;
  _duration?: string;
  _episode_title?: string;
}

export interface TransformOptions {
  includeWatchlistTimestamp: boolean;
  useUnknownForWatchedDate: boolean;
  watchedOnly: boolean;
  minProgress: number;
  now?: () => Date; // Clock override, read once per transform
}

export interface LibrarySummary {
  total: number;
  movies: number;
  shows: number;
  episodes: number;
  watched: number;
}

export interface ConversionResult {
  entries: TraktEntry[];
  summary: LibrarySummary; // Counts before filtering
  scanned: RawEntity[];
}
