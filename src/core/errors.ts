// src/core/errors.ts

/**
 * Raised when font or glyph data cannot be interpreted: unsupported path
 * commands, malformed numbers, wrong parameter counts, or no fonts at all.
 */
export class FontDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FontDataError";
  }
}
