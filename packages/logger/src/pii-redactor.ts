/**
 * PII Redaction Logic
 *
 * Tenant credentials pass through chat text, so both structured fields and
 * free text need scrubbing before they reach a log line.
 */

const REDACTED = "[REDACTED]";

/**
 * Property names whose values are always replaced. Matched case-insensitively
 * by {@link redactValue}; used verbatim for Pino paths.
 */
const SENSITIVE_FIELDS = [
  "password",
  "storePassword",
  "secret",
  "webhookSecret",
  "token",
  "apiKey",
  "api_key",
  "providerApiKey",
  "authorization",
  "cookie",
  "encryptionKey",
  "signature",
  "ciphertext",
  "phoneNumber",
] as const;

const SENSITIVE_KEYS: ReadonlySet<string> = new Set(SENSITIVE_FIELDS.map((k) => k.toLowerCase()));

const EMAIL_REGEX = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g;

// E.164-ish: optional +, 10 to 15 digits, separators allowed between groups.
const PHONE_REGEX = /\+?\d(?:[\s-]?\d){9,14}/g;

function isSensitiveKey(key: string): boolean {
  return SENSITIVE_KEYS.has(key.toLowerCase());
}

/**
 * Replace emails and phone numbers inside free text.
 */
export function redactText(text: string): string {
  return text.replace(EMAIL_REGEX, REDACTED).replace(PHONE_REGEX, REDACTED);
}

/**
 * Redact a single key/value pair.
 *
 * Sensitive keys lose their whole value; other strings keep their shape with
 * emails and phone numbers masked.
 */
export function redactValue(key: string, value: unknown): unknown {
  if (isSensitiveKey(key)) {
    return REDACTED;
  }
  if (typeof value === "string") {
    return redactText(value);
  }
  return value;
}

/**
 * Paths for Pino's `redact` option: every sensitive field at the top level
 * and one level down (e.g. `store.password`).
 */
export const REDACT_PATHS: string[] = [
  ...SENSITIVE_FIELDS,
  ...SENSITIVE_FIELDS.map((k) => `*.${k}`),
];
