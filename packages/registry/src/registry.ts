import { fingerprint, type SecretCipher } from "@vectorbridge/crypto";
import { NotFoundError } from "@vectorbridge/errors";
import { createChildLogger, type Logger } from "@vectorbridge/logger";
import type {
  Credential,
  CredentialBundle,
  DecryptedCredential,
  OnboardingState,
  Tenant,
  TenantIdentity,
  ValidationEvent,
} from "@vectorbridge/types";
import type { ITenantRepository } from "./repository.interface.js";

export interface TenantRegistryOptions {
  repository: ITenantRepository;
  cipher: SecretCipher;
  /** HMAC secret for provider-key fingerprints. */
  fingerprintSecret: string;
  logger?: Logger;
  now?: () => Date;
}

export type RotationListener = (tenantId: string) => Promise<void> | void;

/**
 * Table name for a tenant's segments. Deterministic in the tenant id and
 * safe as an unquoted identifier.
 */
export function schemaNameFor(tenantId: string): string {
  return `vb_${tenantId.replace(/[^0-9a-zA-Z]/g, "").toLowerCase()}_segments`;
}

/**
 * Tenants and their credentials. Secrets are encrypted before they reach
 * the repository and decrypted only inside {@link TenantRegistry.withSecrets}.
 */
export class TenantRegistry {
  private readonly repository: ITenantRepository;
  private readonly cipher: SecretCipher;
  private readonly fingerprintSecret: string;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly rotationListeners: RotationListener[] = [];

  constructor(options: TenantRegistryOptions) {
    this.repository = options.repository;
    this.cipher = options.cipher;
    this.fingerprintSecret = options.fingerprintSecret;
    this.logger = options.logger && createChildLogger(options.logger, { component: "registry" });
    this.now = options.now ?? (() => new Date());
  }

  find(chatSessionId: string): Promise<Tenant | undefined> {
    return this.repository.findBySession(chatSessionId);
  }

  async get(chatSessionId: string): Promise<Tenant> {
    const tenant = await this.repository.findBySession(chatSessionId);
    if (!tenant) throw new NotFoundError(`No tenant for chat session ${chatSessionId}`);
    return tenant;
  }

  async getById(tenantId: string): Promise<Tenant> {
    const tenant = await this.repository.findById(tenantId);
    if (!tenant) throw new NotFoundError(`Tenant ${tenantId} not found`);
    return tenant;
  }

  /**
   * First contact creates the tenant. Later contacts refresh the display
   * metadata when the chat platform reports a change.
   */
  async ensureTenant(identity: TenantIdentity): Promise<Tenant> {
    const tenant = await this.repository.create(identity);
    const username = identity.username ?? tenant.username;
    const displayName = identity.displayName ?? tenant.displayName;
    if (username === tenant.username && displayName === tenant.displayName) return tenant;
    return this.repository.update(tenant.id, { username, displayName });
  }

  setOnboardingState(tenantId: string, onboardingState: OnboardingState): Promise<Tenant> {
    return this.repository.update(tenantId, { onboardingState });
  }

  async hasCredential(tenantId: string): Promise<boolean> {
    return (await this.repository.findCredential(tenantId)) !== undefined;
  }

  /**
   * Persist a validated bundle and mark onboarding complete, atomically.
   */
  async upsertCredential(tenantId: string, bundle: CredentialBundle): Promise<Credential> {
    const credential = await this.repository.saveCredential(
      tenantId,
      { phoneNumber: bundle.phoneNumber, onboardingState: "Complete" },
      {
        tenantId,
        storeHost: bundle.store.host,
        storePort: bundle.store.port,
        storeDatabase: bundle.store.database,
        storeUser: bundle.store.user,
        storePasswordCiphertext: this.cipher.encrypt(bundle.store.password),
        provider: bundle.provider.provider,
        providerModel: bundle.provider.model,
        embeddingDimensions: bundle.provider.dimensions,
        providerKeyCiphertext: this.cipher.encrypt(bundle.provider.apiKey),
        providerKeyFingerprint: fingerprint(bundle.provider.apiKey, this.fingerprintSecret),
        schemaName: schemaNameFor(tenantId),
        lastValidatedAt: this.now(),
      },
    );
    this.logger?.info(
      { tenantId, provider: credential.provider, keyFingerprint: credential.providerKeyFingerprint },
      "Credential stored",
    );
    return credential;
  }

  /**
   * Replace an existing credential and drop every cached connection built
   * from the old one.
   */
  async rotateKey(tenantId: string, bundle: CredentialBundle): Promise<Credential> {
    if (!(await this.hasCredential(tenantId))) {
      throw new NotFoundError(`Tenant ${tenantId} has no credential to rotate`);
    }
    const credential = await this.upsertCredential(tenantId, bundle);
    for (const listener of this.rotationListeners) {
      await listener(tenantId);
    }
    this.logger?.info({ tenantId }, "Credential rotated");
    return credential;
  }

  onRotate(listener: RotationListener): void {
    this.rotationListeners.push(listener);
  }

  /**
   * Id of the tenant's current credential. Every save issues a new one, so
   * other processes can tell their cached connections are stale.
   */
  async credentialVersion(tenantId: string): Promise<string | undefined> {
    const stored = await this.repository.findCredential(tenantId);
    return stored?.id;
  }

  /**
   * Decrypt the tenant's secrets for the duration of `fn`. The decrypted
   * object is not cached and must not be retained by the caller.
   */
  async withSecrets<T>(
    tenantId: string,
    fn: (credential: DecryptedCredential) => Promise<T>,
  ): Promise<T> {
    const stored = await this.repository.findCredential(tenantId);
    if (!stored) throw new NotFoundError(`Tenant ${tenantId} has not completed onboarding`);
    return fn({
      tenantId,
      version: stored.id,
      schemaName: stored.schemaName,
      store: {
        host: stored.storeHost,
        port: stored.storePort,
        database: stored.storeDatabase,
        user: stored.storeUser,
        password: this.cipher.decrypt(stored.storePasswordCiphertext),
      },
      provider: {
        provider: stored.provider,
        model: stored.providerModel,
        dimensions: stored.embeddingDimensions,
        apiKey: this.cipher.decrypt(stored.providerKeyCiphertext),
      },
    });
  }

  /** Field name and reason code only. */
  async recordValidationEvent(
    tenantId: string,
    field: string,
    reasonCode: string,
  ): Promise<ValidationEvent> {
    const event = await this.repository.addValidationEvent({ tenantId, field, reasonCode });
    this.logger?.info({ tenantId, field, reasonCode }, "Validation failed");
    return event;
  }

  listValidationEvents(tenantId: string): Promise<ValidationEvent[]> {
    return this.repository.listValidationEvents(tenantId);
  }
}
