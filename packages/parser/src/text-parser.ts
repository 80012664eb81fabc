import type { ParseResult } from "@vectorbridge/types";
import type { IParser } from "./parser.interface.js";
import { decodeText } from "./decode.js";

export class TextParser implements IParser {
  readonly supportedExtensions = [".txt", ".md"];

  async parse(input: Uint8Array, formatHint: string): Promise<ParseResult> {
    const { text, encoding } = decodeText(input);
    return {
      text,
      metadata: { format: formatHint, encoding },
    };
  }
}
