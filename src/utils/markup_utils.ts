/**
 * Helpers for reading values out of loosely structured attribute markup
 */

const BACKGROUND_IMAGE_PATTERN =
  /background-image:\s*url\(["']?([^"')\s]+)["']?\)/;
const WIDTH_PERCENT_PATTERN = /width:\s*([\d.]+)%/;
const POSTER_SHAPE_PATTERN = /poster-shape-(\w+)/;
const YEAR_PATTERN = /\b(?:19|20)\d{2}\b/;

/**
 * Case-insensitive substring test of a class attribute against several
 * naming conventions.
 * @param classes Raw class attribute value
 * @param needles Lowercase fragments, any of which may match
 */
export function classContainsAny(
  classes: string,
  needles: readonly string[]
): boolean {
  const lowered = classes.toLowerCase();
  return needles.some((needle) => lowered.includes(needle));
}

/**
 * Decodes %XX escapes. Runs that are not valid UTF-8 are left as written.
 * @param value Possibly percent-encoded string
 * @returns Decoded string
 */
export function percentDecode(value: string): string {
  return value.replace(/(?:%[0-9a-fA-F]{2})+/g, (sequence) => {
    try {
      return decodeURIComponent(sequence);
    } catch {
      return sequence;
    }
  });
}

/**
 * Extracts the URL of a `background-image: url(...)` declaration.
 * @param style Inline style attribute
 * @returns Percent-decoded URL, or null if the style has none
 */
export function extractBackgroundImageUrl(style: string): string | null {
  const match = style.match(BACKGROUND_IMAGE_PATTERN);
  if (!match || !match[1]) {
    return null;
  }
  return percentDecode(match[1]);
}

/**
 * Reads a `width: <n>%` declaration, clamped to 100.
 * @param style Inline style attribute
 * @returns Percentage, or null if absent or not a number
 */
export function extractWidthPercent(style: string): number | null {
  const match = style.match(WIDTH_PERCENT_PATTERN);
  if (!match || !match[1]) {
    return null;
  }
  const value = Number(match[1]);
  if (Number.isNaN(value)) {
    return null;
  }
  return Math.min(value, 100);
}

export function extractPosterShape(classes: string): string | null {
  if (!classes.includes("poster-shape")) {
    return null;
  }
  const match = classes.match(POSTER_SHAPE_PATTERN);
  return match && match[1] ? match[1] : null;
}

/**
 * Finds a standalone 19xx/20xx year in free text ("2019", "2015-2020").
 * @param text Release info text
 * @returns The first year found, or null
 */
export function extractYear(text: string): number | null {
  const match = text.match(YEAR_PATTERN);
  return match ? parseInt(match[0], 10) : null;
}
