import { Parser } from "htmlparser2";
import type { CaptureTarget, RawEntity, RawEntityKind } from "../types.js";
import { EmptyInputError } from "../errors.js";
import * as logger from "../utils/logger.js";
import {
  classContainsAny,
  extractBackgroundImageUrl,
  extractPosterShape,
  extractWidthPercent,
  extractYear,
  percentDecode,
} from "../utils/markup_utils.js";
import {
  ENTITY_ROOT_CLASS,
  ENTITY_ROOT_TAG,
  POSTER_CLASSES,
  PROGRESS_BAR_CLASSES,
  TEXT_BEARING_TAGS,
  WATCHED_MARKER_CLASS,
  parseDetailLink,
  resolveCaptureTarget,
} from "./element_rules.js";

type Attributes = Record<string, string>;

// In-progress card; null means "not discovered yet"
interface EntityDraft {
  identifier: string;
  kind: RawEntityKind;
  href: string;
  displayTitle: string | null;
  season: number | null;
  episode: number | null;
  watched: boolean;
  progressPercent: number;
  posterUrl: string | null;
  posterShape: string | null;
  year: number | null;
  durationText: string | null;
  episodeTitle: string | null;
  releaseInfoText: string | null;
  dataAttributes: Record<string, string>;
}

interface ScanState {
  current: EntityDraft | null;
  linkDepth: number; // <a> elements open inside the current card
  capture: CaptureTarget | null;
}

function initialState(): ScanState {
  return { current: null, linkDepth: 0, capture: null };
}

function finalizeDraft(draft: EntityDraft): RawEntity {
  const entity: RawEntity = {
    identifier: draft.identifier,
    kind: draft.kind,
    href: draft.href,
    watched: draft.watched,
    progressPercent: draft.progressPercent,
    dataAttributes: Object.freeze({ ...draft.dataAttributes }),
  };
  if (draft.displayTitle !== null) entity.displayTitle = draft.displayTitle;
  if (draft.season !== null && draft.episode !== null) {
    entity.season = draft.season;
    entity.episode = draft.episode;
  }
  if (draft.posterUrl !== null) entity.posterUrl = draft.posterUrl;
  if (draft.posterShape !== null) entity.posterShape = draft.posterShape;
  if (draft.year !== null) entity.year = draft.year;
  if (draft.durationText !== null) entity.durationText = draft.durationText;
  if (draft.episodeTitle !== null) entity.episodeTitle = draft.episodeTitle;
  if (draft.releaseInfoText !== null) {
    entity.releaseInfoText = draft.releaseInfoText;
  }
  return Object.freeze(entity);
}

/**
 * Single forward pass over a Stremio library export, turning each
 * `a.meta-item-container` card into a RawEntity.
 *
 * No tree is built: every decision is taken from the current tag, its
 * attributes, or the text run in front of it. Text split by htmlparser2
 * around character references is joined back into one run before it is
 * routed, so "Tom &amp; Jerry" arrives as a single token.
 */
export class MarkupScanner {
  private entities: RawEntity[] = [];
  private state: ScanState = initialState();
  private pendingText: string[] = [];

  /**
   * Scans a complete document. Each call starts from a clean state.
   * @param html The exported library page
   * @returns Cards in document order
   * @throws EmptyInputError if the document is empty or whitespace-only
   */
  scan(html: string): RawEntity[] {
    if (!html.trim()) {
      throw new EmptyInputError();
    }

    this.entities = [];
    this.state = initialState();
    this.pendingText = [];

    const parser = new Parser(
      {
        onopentag: (name, attribs) => this.handleOpenTag(name, attribs),
        onclosetag: (name) => this.handleCloseTag(name),
        ontext: (text) => {
          this.pendingText.push(text);
        },
        oncomment: () => this.flushText(),
        onend: () => this.flushText(),
      },
      { decodeEntities: true }
    );
    parser.write(html);
    parser.end();

    logger.debug(`[Scanner] Found ${this.entities.length} library cards`);
    return [...this.entities];
  }

  private handleOpenTag(tag: string, attribs: Attributes): void {
    this.flushText();

    if (tag === ENTITY_ROOT_TAG) {
      if (this.state.current) {
        this.state.linkDepth++;
      } else {
        this.openEntity(attribs);
      }
    }

    if (this.state.current) {
      this.inspectElement(this.state.current, tag, attribs);
    }
  }

  private openEntity(attribs: Attributes): void {
    const classes = attribs.class;
    if (!classes || !classes.includes(ENTITY_ROOT_CLASS)) {
      return;
    }

    const href = attribs.href ?? "";
    const link = parseDetailLink(href);
    if (!link) {
      logger.debug(`[Scanner] Skipping card with unrecognized link: "${href}"`);
      return;
    }

    const dataAttributes: Record<string, string> = {};
    for (const [key, value] of Object.entries(attribs)) {
      if (key.startsWith("data-")) {
        dataAttributes[key] = value;
      }
    }

    this.state.current = {
      identifier: link.identifier,
      kind: link.kind,
      href,
      displayTitle: attribs.title ? attribs.title : null,
      season: link.season ?? null,
      episode: link.episode ?? null,
      watched: false,
      progressPercent: 0,
      posterUrl: null,
      posterShape: null,
      year: null,
      durationText: null,
      episodeTitle: null,
      releaseInfoText: null,
      dataAttributes,
    };
    this.state.linkDepth = 0;
  }

  // Runs for the card root and every element inside it
  private inspectElement(
    entity: EntityDraft,
    tag: string,
    attribs: Attributes
  ): void {
    const classes = attribs.class ?? "";
    const style = attribs.style ?? "";

    if (classes.includes(WATCHED_MARKER_CLASS)) {
      entity.watched = true;
    }

    if (classContainsAny(classes, PROGRESS_BAR_CLASSES)) {
      const progress = extractWidthPercent(style);
      if (progress !== null) {
        entity.progressPercent = progress;
      }
    }

    if (classContainsAny(classes, POSTER_CLASSES)) {
      if (entity.posterUrl === null) {
        entity.posterUrl = extractBackgroundImageUrl(style);
      }
      const shape = extractPosterShape(classes);
      if (shape) {
        entity.posterShape = shape;
      }
    }

    if (tag === "img") {
      if (attribs.src && entity.posterUrl === null) {
        entity.posterUrl = percentDecode(attribs.src);
      }
      if (attribs.alt && entity.displayTitle === null) {
        entity.displayTitle = attribs.alt;
      }
    }

    if (TEXT_BEARING_TAGS.has(tag) && classes) {
      const target = resolveCaptureTarget(classes);
      if (target) {
        this.state.capture = target;
      }
    }

    // Lowest priority: any inline background image
    if (entity.posterUrl === null && style.includes("background-image")) {
      entity.posterUrl = extractBackgroundImageUrl(style);
    }
  }

  private flushText(): void {
    if (this.pendingText.length === 0) {
      return;
    }
    const text = this.pendingText.join("");
    this.pendingText = [];
    this.handleText(text);
  }

  private handleText(data: string): void {
    const entity = this.state.current;
    const text = data.trim();
    if (!entity || !this.state.capture || !text) {
      return;
    }

    switch (this.state.capture) {
      case "release_info": {
        entity.releaseInfoText = text;
        const year = extractYear(text);
        if (year !== null) {
          entity.year = year;
        }
        break;
      }
      case "duration":
        entity.durationText = text;
        break;
      case "episode_title":
        entity.episodeTitle = text;
        break;
      case "title_text":
        if (entity.displayTitle === null) {
          entity.displayTitle = text;
        }
        break;
    }
  }

  private handleCloseTag(tag: string): void {
    this.flushText();

    if (TEXT_BEARING_TAGS.has(tag)) {
      this.state.capture = null;
    }

    if (tag !== ENTITY_ROOT_TAG || !this.state.current) {
      return;
    }
    if (this.state.linkDepth > 0) {
      this.state.linkDepth--;
      return;
    }

    const entity = finalizeDraft(this.state.current);
    this.entities.push(entity);
    logger.debug(
      `[Scanner] Card ${this.entities.length}: ${entity.identifier} (${entity.kind})`
    );
    this.state = initialState();
  }
}
