import { randomUUID } from "node:crypto";
import { NotFoundError } from "@vectorbridge/errors";
import type { Credential, Tenant, TenantIdentity, ValidationEvent } from "@vectorbridge/types";
import type {
  ITenantRepository,
  NewCredential,
  NewValidationEvent,
  TenantPatch,
} from "./repository.interface.js";

/**
 * Process-local repository. Used by tests and single-process development
 * runs; contents vanish with the process.
 */
export class InMemoryTenantRepository implements ITenantRepository {
  readonly tenants = new Map<string, Tenant>();
  readonly credentials = new Map<string, Credential>();
  readonly events: ValidationEvent[] = [];
  /** When set, the next saveCredential throws it before writing anything. */
  failNextSave?: Error;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findBySession(chatSessionId: string): Promise<Tenant | undefined> {
    for (const tenant of this.tenants.values()) {
      if (tenant.chatSessionId === chatSessionId) return { ...tenant };
    }
    return undefined;
  }

  async findById(tenantId: string): Promise<Tenant | undefined> {
    const tenant = this.tenants.get(tenantId);
    return tenant && { ...tenant };
  }

  async create(identity: TenantIdentity): Promise<Tenant> {
    const existing = await this.findBySession(identity.chatSessionId);
    if (existing) return existing;
    const at = this.now();
    const tenant: Tenant = {
      id: randomUUID(),
      chatSessionId: identity.chatSessionId,
      username: identity.username ?? null,
      displayName: identity.displayName ?? null,
      phoneNumber: null,
      onboardingState: "CollectingIdentity",
      createdAt: at,
      updatedAt: at,
    };
    this.tenants.set(tenant.id, tenant);
    return { ...tenant };
  }

  async update(tenantId: string, patch: TenantPatch): Promise<Tenant> {
    const next = this.patched(tenantId, patch);
    this.tenants.set(tenantId, next);
    return { ...next };
  }

  async findCredential(tenantId: string): Promise<Credential | undefined> {
    const credential = this.credentials.get(tenantId);
    return credential && { ...credential };
  }

  async saveCredential(
    tenantId: string,
    patch: TenantPatch,
    credential: NewCredential,
  ): Promise<Credential> {
    if (this.failNextSave) {
      const err = this.failNextSave;
      this.failNextSave = undefined;
      throw err;
    }
    const tenant = this.patched(tenantId, patch);
    const row: Credential = { ...credential, id: randomUUID(), createdAt: this.now() };
    this.tenants.set(tenantId, tenant);
    this.credentials.set(tenantId, row);
    return { ...row };
  }

  async addValidationEvent(event: NewValidationEvent): Promise<ValidationEvent> {
    const row: ValidationEvent = { ...event, id: randomUUID(), createdAt: this.now() };
    this.events.push(row);
    return { ...row };
  }

  async listValidationEvents(tenantId: string): Promise<ValidationEvent[]> {
    return this.events
      .filter((event) => event.tenantId === tenantId)
      .reverse()
      .map((event) => ({ ...event }));
  }

  private patched(tenantId: string, patch: TenantPatch): Tenant {
    const tenant = this.tenants.get(tenantId);
    if (!tenant) throw new NotFoundError(`Tenant ${tenantId} not found`);
    return { ...tenant, ...patch, updatedAt: this.now() };
  }
}
