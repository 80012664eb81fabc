import type { ParseResult } from "@vectorbridge/types";

export interface IParser {
  /** Lower-case extensions including the dot, e.g. ".md". */
  readonly supportedExtensions: string[];
  parse(input: Uint8Array, formatHint: string): Promise<ParseResult>;
}
