import { describe, it, expect, beforeEach, vi } from "vitest";
import { SecretBox, fingerprint } from "@vectorbridge/crypto";
import { NotFoundError } from "@vectorbridge/errors";
import type { CredentialBundle } from "@vectorbridge/types";
import { InMemoryTenantRepository } from "./memory-repository.js";
import { TenantRegistry, schemaNameFor } from "./registry.js";

const KEY = "0123456789abcdef0123456789abcdef";

function bundle(apiKey = "test-key"): CredentialBundle {
  return {
    phoneNumber: "+15550001111",
    store: { host: "db.local", port: 5432, database: "docs", user: "owner", password: "test-secret" },
    provider: { provider: "mistral", model: "mistral-embed", dimensions: 1024, apiKey },
  };
}

describe("schemaNameFor", () => {
  it("strips separators and lower-cases", () => {
    expect(schemaNameFor("AB12-cd34")).toBe("vb_ab12cd34_segments");
  });
});

describe("TenantRegistry", () => {
  let repository: InMemoryTenantRepository;
  let registry: TenantRegistry;

  beforeEach(() => {
    repository = new InMemoryTenantRepository();
    registry = new TenantRegistry({
      repository,
      cipher: new SecretBox(KEY),
      fingerprintSecret: "test-secret",
    });
  });

  it("creates a tenant on first contact and reuses it after", async () => {
    const first = await registry.ensureTenant({ chatSessionId: "chat-1", username: "ann" });
    const again = await registry.ensureTenant({ chatSessionId: "chat-1" });

    expect(again.id).toBe(first.id);
    expect(again.username).toBe("ann");
    expect(first.onboardingState).toBe("CollectingIdentity");
    expect(repository.tenants.size).toBe(1);
  });

  it("refreshes display metadata when it changes", async () => {
    await registry.ensureTenant({ chatSessionId: "chat-1", username: "ann" });
    const renamed = await registry.ensureTenant({ chatSessionId: "chat-1", username: "anna" });
    expect(renamed.username).toBe("anna");
  });

  it("get throws NotFoundError for an unknown session", async () => {
    await expect(registry.get("nobody")).rejects.toBeInstanceOf(NotFoundError);
    await expect(registry.find("nobody")).resolves.toBeUndefined();
  });

  it("stores secrets as ciphertext only", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await registry.upsertCredential(tenant.id, bundle());

    const stored = repository.credentials.get(tenant.id);
    expect(stored?.storePasswordCiphertext).not.toContain("test-secret");
    expect(stored?.providerKeyCiphertext).not.toContain("test-key");
    expect(stored?.providerKeyFingerprint).toBe(fingerprint("test-key", "test-secret"));
    expect(stored?.schemaName).toBe(schemaNameFor(tenant.id));
  });

  it("marks onboarding complete together with the credential", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await registry.upsertCredential(tenant.id, bundle());

    const after = await registry.get("chat-1");
    expect(after.onboardingState).toBe("Complete");
    expect(after.phoneNumber).toBe("+15550001111");
  });

  it("writes nothing when the save fails", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    repository.failNextSave = new Error("connection reset");

    await expect(registry.upsertCredential(tenant.id, bundle())).rejects.toThrow("connection reset");
    expect(await registry.hasCredential(tenant.id)).toBe(false);
    expect((await registry.get("chat-1")).onboardingState).toBe("CollectingIdentity");
  });

  it("hands decrypted secrets to the callback", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await registry.upsertCredential(tenant.id, bundle());

    const seen = await registry.withSecrets(tenant.id, async (c) => [c.store.password, c.provider.apiKey]);
    expect(seen).toEqual(["test-secret", "test-key"]);
  });

  it("withSecrets rejects a tenant without a credential", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await expect(registry.withSecrets(tenant.id, async () => 1)).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rotateKey supersedes the credential and notifies listeners", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    const before = await registry.upsertCredential(tenant.id, bundle("old-key"));
    const listener = vi.fn();
    registry.onRotate(listener);

    const after = await registry.rotateKey(tenant.id, bundle("new-key"));

    expect(after.id).not.toBe(before.id);
    expect(listener).toHaveBeenCalledWith(tenant.id);
    const key = await registry.withSecrets(tenant.id, async (c) => c.provider.apiKey);
    expect(key).toBe("new-key");
  });

  it("rotateKey requires an existing credential", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await expect(registry.rotateKey(tenant.id, bundle())).rejects.toBeInstanceOf(NotFoundError);
  });

  it("records validation events without values", async () => {
    const tenant = await registry.ensureTenant({ chatSessionId: "chat-1" });
    await registry.recordValidationEvent(tenant.id, "store.host", "STORE_UNREACHABLE");

    const events = await registry.listValidationEvents(tenant.id);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ field: "store.host", reasonCode: "STORE_UNREACHABLE" });
  });
});
