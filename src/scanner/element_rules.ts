import type { CaptureTarget, RawEntityKind } from "../types.js";
import { classContainsAny } from "../utils/markup_utils.js";

// Class marking a library card link
export const ENTITY_ROOT_CLASS = "meta-item-container";
export const ENTITY_ROOT_TAG = "a";

export const WATCHED_MARKER_CLASS = "watched-icon-layer";
export const PROGRESS_BAR_CLASSES = ["progress-bar", "progressbar"] as const;
export const POSTER_CLASSES = ["poster", "thumbnail", "image"] as const;

// Elements whose text may be captured, and whose end tag disarms capture
export const TEXT_BEARING_TAGS: ReadonlySet<string> = new Set([
  "div",
  "span",
  "p",
]);

// #/detail/movie/tt12820516 or #/detail/series/tt5875444
const DETAIL_LINK_PATTERN = /#\/detail\/(movie|series)\/(tt\d+)/;
// tt5875444:5:3 is season 5, episode 3
const EPISODE_LINK_PATTERN = /(tt\d+):(\d+):(\d+)/;

export interface DetailLink {
  identifier: string;
  kind: RawEntityKind;
  season?: number;
  episode?: number;
}

/**
 * Parses a card's link target into catalog identity.
 * @param href Value of the card's href attribute
 * @returns The identity, or null if the link is not a detail link
 */
export function parseDetailLink(href: string): DetailLink | null {
  const match = href.match(DETAIL_LINK_PATTERN);
  if (!match || !match[1] || !match[2]) {
    return null;
  }

  const link: DetailLink = {
    identifier: match[2],
    kind: match[1] === "series" ? "show" : "movie",
  };

  const episodeMatch = href.match(EPISODE_LINK_PATTERN);
  if (episodeMatch && episodeMatch[2] && episodeMatch[3]) {
    link.season = parseInt(episodeMatch[2], 10);
    link.episode = parseInt(episodeMatch[3], 10);
  }

  return link;
}

interface TextCaptureRule {
  target: CaptureTarget;
  matches: (classes: string) => boolean;
}

/**
 * Evaluated in order on every text-bearing element inside a card. Each
 * match arms capture; the last match decides the target.
 */
export const TEXT_CAPTURE_RULES: readonly TextCaptureRule[] = [
  {
    target: "title_text",
    matches: (classes) => classContainsAny(classes, ["title", "name", "label"]),
  },
  {
    target: "release_info",
    matches: (classes) => classContainsAny(classes, ["year", "release", "date"]),
  },
  {
    target: "duration",
    matches: (classes) =>
      classContainsAny(classes, ["duration", "runtime", "time"]),
  },
  {
    target: "episode_title",
    matches: (classes) =>
      classContainsAny(classes, ["episode"]) &&
      classContainsAny(classes, ["title"]),
  },
];

/**
 * @param classes Class attribute of a text-bearing element
 * @returns Target of the last matching rule, or null if none match
 */
export function resolveCaptureTarget(classes: string): CaptureTarget | null {
  let target: CaptureTarget | null = null;
  for (const rule of TEXT_CAPTURE_RULES) {
    if (rule.matches(classes)) {
      target = rule.target;
    }
  }
  return target;
}
