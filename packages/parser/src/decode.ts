const FALLBACK_ENCODINGS = ["utf-8", "windows-1251"] as const;

/**
 * Decode bytes as UTF-8 (BOM stripped), then Windows-1251, then Latin-1.
 */
export function decodeText(input: Uint8Array): { text: string; encoding: string } {
  for (const encoding of FALLBACK_ENCODINGS) {
    try {
      const text = new TextDecoder(encoding, { fatal: true, ignoreBOM: false }).decode(input);
      return { text, encoding };
    } catch (err: unknown) {
      if (!(err instanceof TypeError)) throw err;
    }
  }
  return { text: Buffer.from(input).toString("latin1"), encoding: "latin1" };
}
