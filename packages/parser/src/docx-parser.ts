import JSZip from "jszip";
import { ParsingError } from "@vectorbridge/errors";
import type { ParseResult } from "@vectorbridge/types";
import type { IParser } from "./parser.interface.js";

const DOCUMENT_PART = "word/document.xml";

const XML_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
};

function unescapeXml(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|apos);/g, (entity) => XML_ENTITIES[entity] ?? entity);
}

/**
 * Paragraph text from the main document part: `<w:t>` runs joined, one line
 * per `<w:p>`, empty paragraphs dropped.
 */
export function extractDocxParagraphs(xml: string): string[] {
  const paragraphs: string[] = [];
  for (const match of xml.matchAll(/<w:p[ >][\s\S]*?<\/w:p>/g)) {
    const runs = [...match[0].matchAll(/<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>/g)].map((m) =>
      unescapeXml(m[1] ?? ""),
    );
    const text = runs.join("").trim();
    if (text.length > 0) paragraphs.push(text);
  }
  return paragraphs;
}

export class DocxParser implements IParser {
  readonly supportedExtensions = [".docx"];

  async parse(input: Uint8Array, formatHint: string): Promise<ParseResult> {
    let xml: string | undefined;
    try {
      const zip = await JSZip.loadAsync(input);
      xml = await zip.file(DOCUMENT_PART)?.async("string");
    } catch (err: unknown) {
      throw new ParsingError("File is not a valid .docx archive", { cause: err });
    }
    if (xml === undefined) {
      throw new ParsingError("Archive has no word/document.xml");
    }

    const paragraphs = extractDocxParagraphs(xml);
    return {
      text: paragraphs.join("\n"),
      metadata: { format: formatHint, paragraphCount: paragraphs.length },
    };
  }
}
