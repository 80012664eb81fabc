import { ParsingError, UnsupportedFormatError } from "@vectorbridge/errors";
import type { ParseFn } from "@vectorbridge/types";
import type { IParser } from "./parser.interface.js";
import { TextParser } from "./text-parser.js";
import { CsvParser } from "./csv-parser.js";
import { DocxParser } from "./docx-parser.js";

const allParsers: IParser[] = [new TextParser(), new CsvParser(), new DocxParser()];

/**
 * Normalize a file name or extension into ".ext" form.
 */
export function extensionOf(formatHint: string): string {
  const hint = formatHint.trim().toLowerCase();
  const dot = hint.lastIndexOf(".");
  if (dot === -1) return hint ? `.${hint}` : "";
  return hint.slice(dot);
}

/**
 * Select the parser for a file name or extension.
 */
export function getParser(formatHint: string): IParser {
  const ext = extensionOf(formatHint);
  const parser = allParsers.find((p) => p.supportedExtensions.includes(ext));
  if (!parser) {
    throw new UnsupportedFormatError(ext);
  }
  return parser;
}

export function supportedExtensions(): string[] {
  return allParsers.flatMap((p) => p.supportedExtensions);
}

/**
 * The `parse(blob, formatHint)` boundary used by the ingestion pipeline.
 * Every failure surfaces as a ParsingError.
 */
export const parseDocument: ParseFn = async (blob, formatHint) => {
  try {
    return await getParser(formatHint).parse(blob, extensionOf(formatHint));
  } catch (err: unknown) {
    if (err instanceof ParsingError) throw err;
    throw new ParsingError(err instanceof Error ? err.message : "Failed to parse document", {
      cause: err,
    });
  }
};
