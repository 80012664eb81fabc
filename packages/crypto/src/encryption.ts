import crypto from "node:crypto";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const SEALED_VERSION = "v1";

export interface EncryptedData {
  iv: string;
  ciphertext: string;
  tag: string;
  keyId: string;
}

/**
 * Symmetric cipher for secrets at rest. Ciphertext is an opaque string.
 */
export interface SecretCipher {
  encrypt(plaintext: string): string;
  decrypt(sealed: string): string;
}

function validateKey(key: string): Buffer {
  const keyBuffer = Buffer.from(key, "utf-8");
  if (keyBuffer.length !== KEY_LENGTH) {
    throw new Error(`Key must be exactly ${KEY_LENGTH} bytes, got ${keyBuffer.length}`);
  }
  return keyBuffer;
}

function deriveKeyId(key: string): string {
  return crypto.createHash("sha256").update(key).digest("hex").slice(0, 16);
}

export function encrypt(plaintext: string, key: string): EncryptedData {
  const keyBuffer = validateKey(key);
  const iv = crypto.randomBytes(IV_LENGTH);

  const cipher = crypto.createCipheriv(ALGORITHM, keyBuffer, iv);
  const encrypted = Buffer.concat([cipher.update(plaintext, "utf-8"), cipher.final()]);
  const tag = cipher.getAuthTag();

  return {
    iv: iv.toString("hex"),
    ciphertext: encrypted.toString("hex"),
    tag: tag.toString("hex"),
    keyId: deriveKeyId(key),
  };
}

export function decrypt(data: EncryptedData, key: string): string {
  const keyBuffer = validateKey(key);
  if (data.keyId !== deriveKeyId(key)) {
    throw new Error(`Ciphertext was sealed with key ${data.keyId}`);
  }
  const iv = Buffer.from(data.iv, "hex");
  const ciphertext = Buffer.from(data.ciphertext, "hex");
  const tag = Buffer.from(data.tag, "hex");

  const decipher = crypto.createDecipheriv(ALGORITHM, keyBuffer, iv);
  decipher.setAuthTag(tag);

  const decrypted = Buffer.concat([decipher.update(ciphertext), decipher.final()]);

  return decrypted.toString("utf-8");
}

/** `v1:<keyId>:<iv>:<tag>:<ciphertext>`, all hex. */
export function serializeEncrypted(data: EncryptedData): string {
  return [SEALED_VERSION, data.keyId, data.iv, data.tag, data.ciphertext].join(":");
}

export function parseEncrypted(sealed: string): EncryptedData {
  const parts = sealed.split(":");
  const [version, keyId, iv, tag, ciphertext] = parts;
  if (
    parts.length !== 5 ||
    version !== SEALED_VERSION ||
    keyId === undefined ||
    iv === undefined ||
    tag === undefined ||
    ciphertext === undefined
  ) {
    throw new Error("Malformed sealed secret");
  }
  return { keyId, iv, tag, ciphertext };
}

export class SecretBox implements SecretCipher {
  private readonly key: string;

  constructor(key: string) {
    validateKey(key);
    this.key = key;
  }

  encrypt(plaintext: string): string {
    return serializeEncrypted(encrypt(plaintext, this.key));
  }

  decrypt(sealed: string): string {
    return decrypt(parseEncrypted(sealed), this.key);
  }
}
