import type { ConversionResult, TransformOptions } from "../types.js";
import { NoEntitiesFoundError } from "../errors.js";
import { ENTITY_ROOT_CLASS, scanLibraryHtml } from "../scanner/index.js";
import { summarizeEntities, transformEntities } from "../transformer/index.js";

/**
 * Runs the whole conversion on an in-memory document: scan, summarize,
 * filter and shape. Nothing is written; callers decide where the entries go.
 *
 * @param html Stremio library export
 * @param options Transformer settings
 * @returns Entries plus the pre-filter summary and the raw scan
 * @throws EmptyInputError if the document is blank
 * @throws NoEntitiesFoundError if no library card was recognized
 */
export function convertLibraryExport(
  html: string,
  options: TransformOptions
): ConversionResult {
  const scanned = scanLibraryHtml(html);
  if (scanned.length === 0) {
    throw new NoEntitiesFoundError(ENTITY_ROOT_CLASS);
  }

  return {
    entries: transformEntities(scanned, options),
    summary: summarizeEntities(scanned),
    scanned,
  };
}
