import JSZip from "jszip";
import { z } from "zod";
import { NotFoundError, ParsingError } from "@vectorbridge/errors";
import type { StoredSegment, UploadedFile } from "@vectorbridge/types";
import type { IBlobStorage } from "./blob-storage.js";

const SEGMENTS_ENTRY = "segments.json";
const ORIGINAL_DIR = "original/";

const exportPayloadSchema = z.object({
  fileId: z.string(),
  fileName: z.string(),
  status: z.string(),
  dimensions: z.number().int().nonnegative(),
  segments: z.array(
    z.object({
      id: z.number().int(),
      title: z.string(),
      body: z.string(),
      vector: z.array(z.number()),
    }),
  ),
});

export type ExportPayload = z.infer<typeof exportPayloadSchema>;

export interface ExportArchive {
  fileName: string;
  mimeType: string;
  content: Uint8Array;
  segmentCount: number;
}

export interface ImportedExport {
  payload: ExportPayload;
  original: { fileName: string; content: Uint8Array };
}

export interface SegmentReader {
  read(tenantId: string, fileId: string): Promise<StoredSegment[]>;
}

/**
 * ZIP of the original upload and its stored segments with vectors, in
 * stored order.
 */
export class ExportBuilder {
  constructor(
    private readonly store: SegmentReader,
    private readonly blobs: IBlobStorage,
  ) {}

  async build(tenantId: string, file: UploadedFile): Promise<ExportArchive> {
    const segments = await this.store.read(tenantId, file.id);
    if (segments.length === 0) {
      throw new NotFoundError(`${file.fileName} has no stored vectors`);
    }
    const original = await this.blobs.get(file.storageKey);

    const payload: ExportPayload = {
      fileId: file.id,
      fileName: file.fileName,
      status: file.status,
      dimensions: segments[0]?.vector.length ?? 0,
      segments: segments.map(({ id, title, body, vector }) => ({ id, title, body, vector })),
    };

    const zip = new JSZip();
    zip.file(`${ORIGINAL_DIR}${archiveEntryName(file.fileName)}`, original);
    zip.file(SEGMENTS_ENTRY, JSON.stringify(payload, null, 2));
    const content = await zip.generateAsync({
      type: "uint8array",
      compression: "DEFLATE",
      compressionOptions: { level: 6 },
    });

    return {
      fileName: `${baseName(archiveEntryName(file.fileName))}_export.zip`,
      mimeType: "application/zip",
      content,
      segmentCount: segments.length,
    };
  }
}

/**
 * Parse an archive written by {@link ExportBuilder}.
 */
export async function readExportArchive(bytes: Uint8Array): Promise<ImportedExport> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (err: unknown) {
    throw new ParsingError("Not a valid export archive", { cause: err });
  }

  const listing = zip.file(SEGMENTS_ENTRY);
  if (!listing) throw new ParsingError(`Export archive has no ${SEGMENTS_ENTRY}`);
  const parsed = exportPayloadSchema.safeParse(parseJson(await listing.async("string")));
  if (!parsed.success) {
    throw new ParsingError(`Malformed ${SEGMENTS_ENTRY}: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }

  const entry = zip.file(`${ORIGINAL_DIR}${archiveEntryName(parsed.data.fileName)}`);
  if (!entry) throw new ParsingError("Export archive has no original file");
  return {
    payload: parsed.data,
    original: { fileName: parsed.data.fileName, content: await entry.async("uint8array") },
  };
}

/**
 * Last path segment of `fileName` with control characters removed. Names
 * that would resolve to a directory fall back to "original".
 */
export function archiveEntryName(fileName: string): string {
  const last = fileName.split(/[\\/]/).pop() ?? "";
  const name = last.replace(/[\u0000-\u001F\u007F]/g, "");
  return name === "" || /^\.+$/.test(name) ? "original" : name;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err: unknown) {
    throw new ParsingError(`${SEGMENTS_ENTRY} is not valid JSON`, { cause: err });
  }
}

function baseName(fileName: string): string {
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(0, dot) : fileName;
}
