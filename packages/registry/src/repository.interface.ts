import type {
  Credential,
  Tenant,
  TenantIdentity,
  ValidationEvent,
} from "@vectorbridge/types";

export type NewCredential = Omit<Credential, "id" | "createdAt">;

export type TenantPatch = Partial<
  Pick<Tenant, "username" | "displayName" | "phoneNumber" | "onboardingState">
>;

export interface NewValidationEvent {
  tenantId: string;
  field: string;
  reasonCode: string;
}

/**
 * Control-plane persistence for tenants and their credentials.
 */
export interface ITenantRepository {
  findBySession(chatSessionId: string): Promise<Tenant | undefined>;
  findById(tenantId: string): Promise<Tenant | undefined>;
  /** Returns the existing tenant when the session is already known. */
  create(identity: TenantIdentity): Promise<Tenant>;
  update(tenantId: string, patch: TenantPatch): Promise<Tenant>;
  findCredential(tenantId: string): Promise<Credential | undefined>;
  /**
   * Writes the tenant patch and replaces the tenant's credential in one
   * transaction.
   */
  saveCredential(tenantId: string, patch: TenantPatch, credential: NewCredential): Promise<Credential>;
  addValidationEvent(event: NewValidationEvent): Promise<ValidationEvent>;
  listValidationEvents(tenantId: string): Promise<ValidationEvent[]>;
}
