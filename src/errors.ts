export type ConversionErrorCode = "EmptyInput" | "NoEntitiesFound";

/**
 * Fatal conversion failure. The CLI prints `message`, then `hint` when set,
 * and exits non-zero without writing any output.
 */
export class ConversionError extends Error {
  readonly code: ConversionErrorCode;
  readonly hint?: string;

  constructor(code: ConversionErrorCode, message: string, hint?: string) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
    this.hint = hint;
  }
}

export class EmptyInputError extends ConversionError {
  constructor() {
    super(
      "EmptyInput",
      "Input is empty. Please provide a valid Stremio HTML export."
    );
    this.name = "EmptyInputError";
  }
}

export class NoEntitiesFoundError extends ConversionError {
  constructor(markerClass: string) {
    super(
      "NoEntitiesFound",
      "No media items found in the HTML.",
      `Make sure you're exporting from Stremio's Library page.\nThe HTML should contain elements with '${markerClass}' class.`
    );
    this.name = "NoEntitiesFoundError";
  }
}
