import { describe, it, expect, beforeEach } from "vitest";
import { SecretBox } from "@vectorbridge/crypto";
import { EmbeddingClient } from "@vectorbridge/embeddings";
import { FatalProviderError, TransientProviderError } from "@vectorbridge/errors";
import { InMemoryTenantRepository, TenantRegistry, schemaNameFor } from "@vectorbridge/registry";
import { FakeEmbeddingService, FakeStoreCluster } from "@vectorbridge/testing";
import type { Tenant } from "@vectorbridge/types";
import { VectorStoreRouter } from "@vectorbridge/vector-store";
import { TRANSITIONS, transition } from "./transitions.js";
import { FIELDS, phoneNumberSchema, portSchema } from "./fields.js";
import { OnboardingValidator, type OnboardingValidatorOptions } from "./validator.js";

const STORE_ANSWERS = ["5432", "docs", "owner", "test-secret"];

function setup(overrides: Partial<OnboardingValidatorOptions> = {}) {
  const repository = new InMemoryTenantRepository();
  const registry = new TenantRegistry({
    repository,
    cipher: new SecretBox("0123456789abcdef0123456789abcdef"),
    fingerprintSecret: "test-secret",
  });
  const cluster = new FakeStoreCluster();
  const router = new VectorStoreRouter({ credentials: registry, createClient: cluster.createClient });
  registry.onRotate((tenantId) => router.invalidate(tenantId));
  const embeddings = new FakeEmbeddingService();
  const client = new EmbeddingClient({
    policy: {
      batchSize: 10,
      maxAttempts: 1,
      retryBaseDelayMs: 0,
      retryMaxDelayMs: 0,
      requestDelayMs: 0,
      requestTimeoutMs: 1000,
    },
    createProvider: embeddings.createProvider,
  });
  const validator = new OnboardingValidator({
    registry,
    store: router,
    keys: client,
    provider: { provider: "mistral", model: "mistral-embed", dimensions: 4 },
    probeTimeoutMs: 50,
    sessionTtlMs: 60_000,
    ...overrides,
  });
  return { repository, registry, cluster, router, embeddings, validator };
}

type Harness = ReturnType<typeof setup>;

async function answerAll(h: Harness, tenant: Tenant, answers: string[]) {
  let reply = await h.validator.start(tenant);
  for (const answer of answers) reply = await h.validator.answer(tenant, answer);
  return reply;
}

function storedState(h: Harness, tenant: Tenant) {
  return h.repository.tenants.get(tenant.id)?.onboardingState;
}

describe("transition table", () => {
  it("only advances Validating on check results", () => {
    expect(transition("Validating", "checksPassed")).toBe("Complete");
    expect(transition("Validating", "storeRejected")).toBe("CollectingStoreParams");
    expect(transition("Validating", "keyRejected")).toBe("CollectingProviderKey");
    expect(() => transition("Validating", "fieldsCollected")).toThrow(
      "No transition from Validating on fieldsCollected",
    );
  });

  it("lets every non-terminal state be abandoned", () => {
    for (const state of ["CollectingIdentity", "CollectingStoreParams", "CollectingProviderKey", "Validating"] as const) {
      expect(TRANSITIONS[state].abandon).toBe("Abandoned");
    }
    expect(TRANSITIONS.Complete.abandon).toBeUndefined();
  });
});

describe("field checks", () => {
  it("normalizes phone numbers to E.164", () => {
    expect(phoneNumberSchema.parse("+1 (555) 000-1111")).toBe("+15550001111");
    expect(phoneNumberSchema.safeParse("5550001111").success).toBe(false);
  });

  it("rejects ports outside 1..65535", () => {
    expect(portSchema.parse("5432")).toBe(5432);
    expect(portSchema.safeParse("0").success).toBe(false);
    expect(portSchema.safeParse("65536").success).toBe(false);
    expect(portSchema.safeParse("54x").success).toBe(false);
  });

  it("rejects identifiers with spaces", () => {
    const answers = { store: {} };
    expect(FIELDS["store.database"].accept("my docs", answers)).toBe("Database name must not contain spaces");
  });
});

describe("OnboardingValidator", () => {
  let h: Harness;
  let tenant: Tenant;

  beforeEach(async () => {
    h = setup();
    tenant = await h.registry.ensureTenant({ chatSessionId: "chat-1", username: "ann" });
  });

  it("asks for the phone number first", async () => {
    const reply = await h.validator.start(tenant);
    expect(reply.state).toBe("CollectingIdentity");
    expect(reply.awaiting).toBe("phoneNumber");
  });

  it("re-requests the same field on invalid input without advancing", async () => {
    await h.validator.start(tenant);
    const reply = await h.validator.answer(tenant, "not a phone");

    expect(reply.state).toBe("CollectingIdentity");
    expect(reply.awaiting).toBe("phoneNumber");
    expect(reply.error?.code).toBe("VALIDATION_ERROR");
    expect(storedState(h, tenant)).toBe("CollectingIdentity");
  });

  it("walks the store fields in order", async () => {
    const reply = await answerAll(h, tenant, ["+15550001111", "db.example.com", "5432"]);
    expect(reply.state).toBe("CollectingStoreParams");
    expect(reply.awaiting).toBe("store.database");
    expect(storedState(h, tenant)).toBe("CollectingStoreParams");
  });

  it("returns an unreachable store to CollectingStoreParams with one event", async () => {
    const reply = await answerAll(h, tenant, [
      "+15550001111",
      "nowhere.example.com",
      ...STORE_ANSWERS,
      "test-key-0001",
    ]);

    expect(reply.state).toBe("CollectingStoreParams");
    expect(reply.awaiting).toBe("store.host");
    expect(reply.error?.code).toBe("STORE_UNREACHABLE");
    expect(storedState(h, tenant)).toBe("CollectingStoreParams");
    const events = await h.registry.listValidationEvents(tenant.id);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ field: "store", reasonCode: "STORE_UNREACHABLE" });
    expect(await h.registry.hasCredential(tenant.id)).toBe(false);
  });

  it("reports a store without vector support", async () => {
    h.cluster.addServer("plain.example.com").vectorCapable = false;
    const reply = await answerAll(h, tenant, [
      "+15550001111",
      "plain.example.com",
      ...STORE_ANSWERS,
      "test-key-0001",
    ]);

    expect(reply.state).toBe("CollectingStoreParams");
    expect(reply.error?.code).toBe("MISSING_CAPABILITY");
  });

  it("sends a rejected key back to CollectingProviderKey", async () => {
    h.cluster.addServer("db.example.com");
    h.embeddings.failures.set(
      "bad-key-0001",
      new FatalProviderError("mistral returned 401", "mistral", { details: { status: 401, reason: "auth" } }),
    );

    const reply = await answerAll(h, tenant, ["+15550001111", "db.example.com", ...STORE_ANSWERS, "bad-key-0001"]);

    expect(reply.state).toBe("CollectingProviderKey");
    expect(reply.awaiting).toBe("provider.apiKey");
    expect(reply.error?.code).toBe("INVALID_KEY");
    const events = await h.registry.listValidationEvents(tenant.id);
    expect(events.map((e) => e.reasonCode)).toEqual(["INVALID_KEY"]);
  });

  it("tells the user to wait on a rate-limited key", async () => {
    h.cluster.addServer("db.example.com");
    h.embeddings.failures.set(
      "busy-key-0001",
      new TransientProviderError("mistral returned 429", "mistral", { details: { status: 429, retryAfter: 30 } }),
    );

    const reply = await answerAll(h, tenant, ["+15550001111", "db.example.com", ...STORE_ANSWERS, "busy-key-0001"]);

    expect(reply.error?.code).toBe("RATE_LIMITED");
    expect(reply.text).toContain("Wait 30 seconds");
  });

  it("completes, stores the credential and provisions the table", async () => {
    const server = h.cluster.addServer("db.example.com");
    const reply = await answerAll(h, tenant, ["+15550001111", "db.example.com", ...STORE_ANSWERS, "test-key-0001"]);

    expect(reply.state).toBe("Complete");
    expect(reply.text).toBe("Setup complete. Send a document to index it.");
    expect(storedState(h, tenant)).toBe("Complete");
    expect(server.tables.has(schemaNameFor(tenant.id))).toBe(true);
    expect(h.validator.isActive(tenant.id)).toBe(false);
  });

  it("fills the store from the shared default", async () => {
    h = setup({
      fallback: {
        store: { host: "shared.example.com", port: 5432, database: "shared", user: "bot", password: "test-secret" },
        providerApiKey: "shared-key-0001",
      },
    });
    tenant = await h.registry.ensureTenant({ chatSessionId: "chat-2" });
    h.cluster.addServer("shared.example.com");

    const reply = await answerAll(h, tenant, ["+15550001111", "default", "default"]);

    expect(reply.state).toBe("Complete");
    const host = await h.registry.withSecrets(tenant.id, async (c) => c.store.host);
    expect(host).toBe("shared.example.com");
  });

  it("refuses default when no shared store is configured", async () => {
    const reply = await answerAll(h, tenant, ["+15550001111", "default"]);
    expect(reply.awaiting).toBe("store.host");
    expect(reply.error?.message).toBe("No shared store is configured. Enter your own host.");
  });

  it("abandon discards answers and marks the tenant", async () => {
    await answerAll(h, tenant, ["+15550001111", "db.example.com"]);
    const reply = await h.validator.abandon(tenant);

    expect(reply.state).toBe("Abandoned");
    expect(storedState(h, tenant)).toBe("Abandoned");
    const resumed = await h.validator.start({ ...tenant, onboardingState: "Abandoned" });
    expect(resumed.awaiting).toBe("phoneNumber");
  });

  it("restart starts over from the phone number", async () => {
    await answerAll(h, tenant, ["+15550001111", "db.example.com"]);
    const reply = await h.validator.restart(tenant);
    expect(reply.state).toBe("CollectingIdentity");
    expect(reply.awaiting).toBe("phoneNumber");
  });

  it("rotation keeps the tenant Complete until the new key validates", async () => {
    h.cluster.addServer("db.example.com");
    await answerAll(h, tenant, ["+15550001111", "db.example.com", ...STORE_ANSWERS, "test-key-0001"]);
    const complete = { ...tenant, onboardingState: "Complete" as const, phoneNumber: "+15550001111" };

    const first = await h.validator.startRotation(complete);
    expect(first.awaiting).toBe("store.host");
    expect(storedState(h, tenant)).toBe("Complete");

    for (const answer of ["db.example.com", ...STORE_ANSWERS]) await h.validator.answer(complete, answer);
    const done = await h.validator.answer(complete, "test-key-0002");

    expect(done.text).toBe("Credentials replaced. New uploads use them from now on.");
    const key = await h.registry.withSecrets(tenant.id, async (c) => c.provider.apiKey);
    expect(key).toBe("test-key-0002");
  });
});
