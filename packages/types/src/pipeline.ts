export interface ParseResult {
  text: string;
  metadata: Record<string, unknown>;
}

/**
 * External parser contract: raw text out, or a ParsingError thrown.
 */
export type ParseFn = (blob: Uint8Array, formatHint: string) => Promise<ParseResult>;

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export type IngestOutcome =
  | { fileId: string; status: "stored"; segmentCount: number }
  | { fileId: string; status: "failed"; reason: string; message: string };
