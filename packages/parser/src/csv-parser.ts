import type { ParseResult } from "@vectorbridge/types";
import type { IParser } from "./parser.interface.js";
import { decodeText } from "./decode.js";

/**
 * RFC 4180 rows: quoted fields may contain commas, newlines and "" escapes.
 */
export function readCsvRows(source: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (quoted) {
      if (ch === '"') {
        if (source.charAt(i + 1) === '"') {
          field += '"';
          i++;
        } else {
          quoted = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
    } else if (ch === ",") {
      row.push(field);
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      if (ch === "\r" && source.charAt(i + 1) === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += ch;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

/**
 * One line of text per row, non-empty cells joined by a space.
 */
export class CsvParser implements IParser {
  readonly supportedExtensions = [".csv"];

  async parse(input: Uint8Array, formatHint: string): Promise<ParseResult> {
    const { text: source, encoding } = decodeText(input);
    const lines = readCsvRows(source)
      .map((cells) =>
        cells
          .map((c) => c.trim())
          .filter((c) => c.length > 0)
          .join(" "),
      )
      .filter((line) => line.length > 0);

    return {
      text: lines.length > 0 ? lines.join("\n") : source,
      metadata: { format: formatHint, encoding, rowCount: lines.length },
    };
  }
}
