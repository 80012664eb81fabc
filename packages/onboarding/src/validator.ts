import {
  AppError,
  FatalProviderError,
  RateLimitedError,
  StoreConnectionError,
  ValidationError,
  errorMessage,
} from "@vectorbridge/errors";
import { createChildLogger, type Logger } from "@vectorbridge/logger";
import type { TenantRegistry } from "@vectorbridge/registry";
import type {
  CredentialBundle,
  FallbackConfig,
  OnboardingState,
  ProviderSettings,
  StoreConnectionParams,
  Tenant,
} from "@vectorbridge/types";
import {
  FIELDS_BY_STATE,
  FIELDS,
  clearState,
  completeStore,
  emptyAnswers,
  hostSchema,
  nextField,
  type FieldName,
  type FieldSpec,
} from "./fields.js";
import { SessionStore, type OnboardingSession, type SessionMode } from "./session-store.js";
import { isCollecting, transition, type CollectingState, type OnboardingEvent } from "./transitions.js";

/** Connectivity, capability and provisioning against a tenant's store. */
export interface StoreChecks {
  probe(params: StoreConnectionParams, options: { timeoutMs: number }): Promise<void>;
  ensureSchema(tenantId: string): Promise<void>;
}

/** A minimal embedding call with the tenant's key. */
export interface KeyChecks {
  probe(credential: ProviderSettings & { apiKey: string }): Promise<void>;
}

export type OnboardingRegistry = Pick<
  TenantRegistry,
  "setOnboardingState" | "upsertCredential" | "rotateKey" | "hasCredential" | "recordValidationEvent"
>;

export interface OnboardingValidatorOptions {
  registry: OnboardingRegistry;
  store: StoreChecks;
  keys: KeyChecks;
  /** Provider, model and dimensions every tenant is validated against. */
  provider: ProviderSettings;
  fallback?: FallbackConfig;
  probeTimeoutMs: number;
  sessionTtlMs: number;
  logger?: Logger;
}

export interface OnboardingReply {
  state: OnboardingState;
  text: string;
  /** Field the next answer is taken for. */
  awaiting?: FieldName;
  /** Present when the last answer or check was rejected. */
  error?: { code: string; message: string };
}

interface CheckFailure {
  owner: CollectingState;
  field: string;
  error: AppError;
}

const DEFAULT_ANSWER = "default";

/**
 * Onboarding conversation as an explicit state machine.
 *
 * Each collecting state owns a fixed list of fields and only advances once
 * all of them passed their own check. Entering Validating runs the
 * connectivity, capability and key checks; a failure records one
 * ValidationEvent and returns to the state owning the failed input with
 * that state's answers cleared.
 */
export class OnboardingValidator {
  private readonly registry: OnboardingRegistry;
  private readonly store: StoreChecks;
  private readonly keys: KeyChecks;
  private readonly provider: ProviderSettings;
  private readonly fallback: FallbackConfig;
  private readonly probeTimeoutMs: number;
  private readonly sessions: SessionStore;
  private readonly logger?: Logger;

  constructor(options: OnboardingValidatorOptions) {
    this.registry = options.registry;
    this.store = options.store;
    this.keys = options.keys;
    this.provider = options.provider;
    this.fallback = options.fallback ?? {};
    this.probeTimeoutMs = options.probeTimeoutMs;
    this.sessions = new SessionStore({ ttlMs: options.sessionTtlMs });
    this.logger = options.logger && createChildLogger(options.logger, { component: "onboarding" });
  }

  isActive(tenantId: string): boolean {
    return this.sessions.has(tenantId);
  }

  /**
   * Begin onboarding, or re-prompt the pending field of a live session.
   */
  async start(tenant: Tenant): Promise<OnboardingReply> {
    const session = this.sessions.get(tenant.id);
    if (session) return this.prompt(session);
    if (tenant.onboardingState === "Complete") {
      return {
        state: "Complete",
        text: "Setup is complete. Send a document to index it, or use /rotate_keys to change credentials.",
      };
    }
    // Answers of an expired session are gone; start over.
    return this.begin(tenant, "onboard", "CollectingIdentity", {});
  }

  /** Discard unconfirmed answers and start from the first field. */
  async restart(tenant: Tenant): Promise<OnboardingReply> {
    const current = this.sessions.get(tenant.id)?.state ?? tenant.onboardingState;
    const next = transition(current, "restart");
    this.sessions.delete(tenant.id);
    const mode: SessionMode = (await this.registry.hasCredential(tenant.id)) ? "rotate" : "onboard";
    return this.begin(tenant, mode, next, {});
  }

  /**
   * Collect and validate a replacement credential. The current one stays in
   * use until the replacement passes every check.
   */
  async startRotation(tenant: Tenant): Promise<OnboardingReply> {
    if (!(await this.registry.hasCredential(tenant.id))) {
      return { state: tenant.onboardingState, text: "Finish setup first with /start." };
    }
    const next = transition("Complete", "rotate");
    return this.begin(tenant, "rotate", next, { phoneNumber: tenant.phoneNumber ?? undefined });
  }

  async abandon(tenant: Tenant): Promise<OnboardingReply> {
    const session = this.sessions.get(tenant.id);
    if (!session) {
      return { state: tenant.onboardingState, text: "Nothing to cancel." };
    }
    this.sessions.delete(tenant.id);
    if (session.mode === "rotate") {
      return { state: "Complete", text: "Rotation cancelled. Your current credentials stay in use." };
    }
    const state = transition(session.state, "abandon");
    await this.registry.setOnboardingState(tenant.id, state);
    this.logger?.info({ tenantId: tenant.id }, "Onboarding abandoned");
    return { state, text: "Setup cancelled. Send /start to begin again." };
  }

  /**
   * Feed one free-text answer to the pending field.
   */
  async answer(tenant: Tenant, input: string): Promise<OnboardingReply> {
    const session = this.sessions.get(tenant.id);
    if (!session) return this.start(tenant);
    if (!isCollecting(session.state)) return this.prompt(session);

    const spec = nextField(session.state, session.answers);
    if (!spec) return this.advance(tenant, session);

    const rejection =
      input.trim().toLowerCase() === DEFAULT_ANSWER
        ? this.applyDefault(spec, session)
        : spec.accept(input, session.answers);
    if (rejection !== undefined) {
      return {
        state: session.state,
        text: `${rejection}\n${spec.prompt}`,
        awaiting: spec.name,
        error: { code: "VALIDATION_ERROR", message: rejection },
      };
    }
    return this.advance(tenant, session);
  }

  private async begin(
    tenant: Tenant,
    mode: SessionMode,
    state: OnboardingState,
    seed: { phoneNumber?: string },
  ): Promise<OnboardingReply> {
    const session: OnboardingSession = {
      tenantId: tenant.id,
      mode,
      state,
      answers: { ...emptyAnswers(), ...seed },
    };
    this.sessions.set(session);
    if (mode === "onboard") {
      await this.registry.setOnboardingState(tenant.id, state);
    }
    this.logger?.debug({ tenantId: tenant.id, mode, state }, "Onboarding session started");
    return this.advance(tenant, session);
  }

  /** Move through every state whose fields are all answered. */
  private async advance(tenant: Tenant, session: OnboardingSession): Promise<OnboardingReply> {
    while (isCollecting(session.state) && !nextField(session.state, session.answers)) {
      await this.moveTo(session, "fieldsCollected");
    }
    if (session.state === "Validating") return this.validate(tenant, session);
    return this.prompt(session);
  }

  private async validate(tenant: Tenant, session: OnboardingSession): Promise<OnboardingReply> {
    const bundle = this.bundleOf(session);
    const failure = await this.runChecks(bundle);
    if (failure) return this.reject(tenant, session, failure);

    try {
      if (session.mode === "rotate") {
        await this.registry.rotateKey(tenant.id, bundle);
      } else {
        await this.registry.upsertCredential(tenant.id, bundle);
      }
    } catch (err: unknown) {
      this.logger?.error({ tenantId: tenant.id, err }, "Credential could not be saved");
      return this.reject(tenant, session, {
        owner: "CollectingProviderKey",
        field: "credential",
        error: AppError.isAppError(err)
          ? err
          : new AppError({ message: errorMessage(err), statusCode: 500, code: "PERSISTENCE_ERROR" }),
      });
    }
    session.state = transition(session.state, "checksPassed");
    this.sessions.delete(tenant.id);
    this.logger?.info({ tenantId: tenant.id, mode: session.mode }, "Onboarding complete");

    try {
      await this.store.ensureSchema(tenant.id);
    } catch (err: unknown) {
      this.logger?.error({ tenantId: tenant.id, err }, "Provisioning after onboarding failed");
      const message = `Your credentials were saved, but the vector table could not be created (${errorMessage(err)}). Send /reset_store confirm to try again.`;
      return {
        state: "Complete",
        text: message,
        error: { code: AppError.isAppError(err) ? err.code : "SCHEMA_ERROR", message },
      };
    }

    return {
      state: "Complete",
      text:
        session.mode === "rotate"
          ? "Credentials replaced. New uploads use them from now on."
          : "Setup complete. Send a document to index it.",
    };
  }

  /** Checks run in order; the first failure stops the rest. */
  private async runChecks(bundle: CredentialBundle): Promise<CheckFailure | undefined> {
    const host = hostSchema.safeParse(bundle.store.host);
    const portValid = Number.isInteger(bundle.store.port) && bundle.store.port > 0 && bundle.store.port < 65536;
    if (!host.success || !portValid) {
      return {
        owner: "CollectingStoreParams",
        field: host.success ? "store.port" : "store.host",
        error: new ValidationError("The store host or port is not valid."),
      };
    }

    try {
      await this.store.probe(bundle.store, { timeoutMs: this.probeTimeoutMs });
    } catch (err: unknown) {
      return {
        owner: "CollectingStoreParams",
        field: "store",
        error: AppError.isAppError(err) ? err : new StoreConnectionError(undefined, { cause: err }),
      };
    }

    try {
      await this.keys.probe(bundle.provider);
    } catch (err: unknown) {
      return {
        owner: "CollectingProviderKey",
        field: "provider.apiKey",
        error: AppError.isAppError(err)
          ? err
          : new FatalProviderError(errorMessage(err), bundle.provider.provider, { cause: err }),
      };
    }
    return undefined;
  }

  private async reject(
    tenant: Tenant,
    session: OnboardingSession,
    failure: CheckFailure,
  ): Promise<OnboardingReply> {
    await this.registry.recordValidationEvent(tenant.id, failure.field, failure.error.code);
    const event: OnboardingEvent =
      failure.owner === "CollectingStoreParams" ? "storeRejected" : "keyRejected";
    await this.moveTo(session, event);
    clearState(failure.owner, session.answers);

    const message = describeFailure(failure.error);
    const first = FIELDS[FIELDS_BY_STATE[failure.owner][0] ?? "provider.apiKey"];
    return {
      state: session.state,
      text: `${message}\n\n${first.prompt}`,
      awaiting: first.name,
      error: { code: failure.error.code, message },
    };
  }

  private applyDefault(spec: FieldSpec, session: OnboardingSession): string | undefined {
    if (spec.name === "store.host") {
      if (!this.fallback.store) return "No shared store is configured. Enter your own host.";
      session.answers.store = { ...this.fallback.store };
      return undefined;
    }
    if (spec.name === "provider.apiKey") {
      if (!this.fallback.providerApiKey) return "No shared key is configured. Enter your own key.";
      session.answers.apiKey = this.fallback.providerApiKey;
      return undefined;
    }
    return spec.accept(DEFAULT_ANSWER, session.answers);
  }

  private async moveTo(session: OnboardingSession, event: OnboardingEvent): Promise<void> {
    session.state = transition(session.state, event);
    if (session.mode === "onboard") {
      await this.registry.setOnboardingState(session.tenantId, session.state);
    }
  }

  private prompt(session: OnboardingSession): OnboardingReply {
    if (!isCollecting(session.state)) {
      return { state: session.state, text: "Checking your credentials..." };
    }
    const spec = nextField(session.state, session.answers);
    return { state: session.state, text: spec?.prompt ?? "", awaiting: spec?.name };
  }

  private bundleOf(session: OnboardingSession): CredentialBundle {
    const { phoneNumber, apiKey } = session.answers;
    const store = completeStore(session.answers.store);
    if (phoneNumber === undefined || apiKey === undefined || !store) {
      throw new AppError({
        message: "Validation reached with unanswered fields",
        statusCode: 500,
        code: "INVALID_TRANSITION",
        isOperational: false,
      });
    }
    return { phoneNumber, store, provider: { ...this.provider, apiKey } };
  }
}

function describeFailure(error: AppError): string {
  switch (error.code) {
    case "STORE_UNREACHABLE":
      return "Could not connect to the vector store. Check the host, port, database, user and password, then send them again.";
    case "INVALID_KEY":
      return "The embedding provider rejected this API key. Send a different key.";
    case "RATE_LIMITED":
      return error instanceof RateLimitedError && error.retryAfter > 0
        ? `The provider is rate limiting this key. Wait ${String(error.retryAfter)} seconds and send it again.`
        : "The provider is rate limiting this key. Wait a moment and send it again.";
    default:
      return error.message;
  }
}
