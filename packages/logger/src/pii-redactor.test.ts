import { describe, it, expect } from "vitest";
import { redactValue, redactText, REDACT_PATHS } from "./pii-redactor.js";

describe("PII Redactor", () => {
  describe("redactValue", () => {
    it("redacts sensitive keys entirely", () => {
      expect(redactValue("password", "test-password")).toBe("[REDACTED]");
      expect(redactValue("storePassword", "test-password")).toBe("[REDACTED]");
      expect(redactValue("providerApiKey", "test-key")).toBe("[REDACTED]");
      expect(redactValue("authorization", "Bearer xyz")).toBe("[REDACTED]");
      expect(redactValue("signature", "abc123")).toBe("[REDACTED]");
      expect(redactValue("phoneNumber", "+15550100")).toBe("[REDACTED]");
    });

    it("is case-insensitive for key matching", () => {
      expect(redactValue("Password", "x")).toBe("[REDACTED]");
      expect(redactValue("APIKEY", "x")).toBe("[REDACTED]");
    });

    it("masks emails and phone numbers in other strings", () => {
      expect(redactValue("text", "mail a@b.com now")).toBe("mail [REDACTED] now");
      expect(redactValue("text", "call +44 20 7946 0000 today")).toBe("call [REDACTED] today");
    });

    it("leaves non-sensitive values alone", () => {
      expect(redactValue("status", "stored")).toBe("stored");
      expect(redactValue("count", 42)).toBe(42);
      expect(redactValue("data", null)).toBe(null);
      expect(redactValue("port", "5432")).toBe("5432");
    });
  });

  describe("redactText", () => {
    it("handles repeated calls with global patterns", () => {
      expect(redactText("x@y.io")).toBe("[REDACTED]");
      expect(redactText("x@y.io")).toBe("[REDACTED]");
    });

    it("keeps short numbers", () => {
      expect(redactText("/export 123")).toBe("/export 123");
    });
  });

  describe("REDACT_PATHS", () => {
    it("has both top-level and nested for each sensitive key", () => {
      const topLevel = REDACT_PATHS.filter((p) => !p.startsWith("*."));
      const nested = REDACT_PATHS.filter((p) => p.startsWith("*."));

      expect(topLevel.length).toBe(nested.length);
      for (const key of topLevel) {
        expect(REDACT_PATHS).toContain(`*.${key}`);
      }
      expect(REDACT_PATHS).toContain("*.storePassword");
    });
  });
});
