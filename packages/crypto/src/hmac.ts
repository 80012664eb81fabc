import crypto from "node:crypto";

const HMAC_ALGORITHM = "sha256";
const FINGERPRINT_LENGTH = 16;

export function generateHmac(data: string | Uint8Array, secret: string): string {
  return crypto.createHmac(HMAC_ALGORITHM, secret).update(data).digest("hex");
}

export function verifyHmac(data: string | Uint8Array, secret: string, hmac: string): boolean {
  const computed = generateHmac(data, secret);

  const computedBuffer = Buffer.from(computed, "hex");
  const providedBuffer = Buffer.from(hmac, "hex");

  if (computedBuffer.length !== providedBuffer.length) {
    return false;
  }

  return crypto.timingSafeEqual(computedBuffer, providedBuffer);
}

/**
 * Short, stable, non-reversible tag for a secret. Lets operators tell two
 * keys apart without storing or logging either.
 */
export function fingerprint(value: string, secret: string): string {
  return generateHmac(`fingerprint:${value}`, secret).slice(0, FINGERPRINT_LENGTH);
}
