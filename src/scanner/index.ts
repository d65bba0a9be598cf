import type { RawEntity } from "../types.js";
import { MarkupScanner } from "./markup_scanner.js";

export { MarkupScanner } from "./markup_scanner.js";
export { ENTITY_ROOT_CLASS } from "./element_rules.js";

/**
 * Extracts every library card from a Stremio HTML export.
 * @param html Full HTML document
 * @returns Finalized entities in document order (possibly empty)
 * @throws EmptyInputError for empty or whitespace-only input
 */
export function scanLibraryHtml(html: string): RawEntity[] {
  return new MarkupScanner().scan(html);
}
