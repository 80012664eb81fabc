import { desc, eq } from "drizzle-orm";
import { tenantCredentials, tenants, validationEvents, type DbClient } from "@vectorbridge/db";
import { NotFoundError, PersistenceError } from "@vectorbridge/errors";
import type { Credential, Tenant, TenantIdentity, ValidationEvent } from "@vectorbridge/types";
import type {
  ITenantRepository,
  NewCredential,
  NewValidationEvent,
  TenantPatch,
} from "./repository.interface.js";

export class DrizzleTenantRepository implements ITenantRepository {
  constructor(private readonly db: DbClient) {}

  async findBySession(chatSessionId: string): Promise<Tenant | undefined> {
    const [row] = await this.db
      .select()
      .from(tenants)
      .where(eq(tenants.chatSessionId, chatSessionId))
      .limit(1);
    return row;
  }

  async findById(tenantId: string): Promise<Tenant | undefined> {
    const [row] = await this.db.select().from(tenants).where(eq(tenants.id, tenantId)).limit(1);
    return row;
  }

  async create(identity: TenantIdentity): Promise<Tenant> {
    await this.db
      .insert(tenants)
      .values({
        chatSessionId: identity.chatSessionId,
        username: identity.username ?? null,
        displayName: identity.displayName ?? null,
      })
      .onConflictDoNothing({ target: tenants.chatSessionId });

    const tenant = await this.findBySession(identity.chatSessionId);
    if (!tenant) throw new PersistenceError("Tenant insert did not persist");
    return tenant;
  }

  async update(tenantId: string, patch: TenantPatch): Promise<Tenant> {
    const [row] = await this.db
      .update(tenants)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(tenants.id, tenantId))
      .returning();
    if (!row) throw new NotFoundError(`Tenant ${tenantId} not found`);
    return row;
  }

  async findCredential(tenantId: string): Promise<Credential | undefined> {
    const [row] = await this.db
      .select()
      .from(tenantCredentials)
      .where(eq(tenantCredentials.tenantId, tenantId))
      .limit(1);
    return row;
  }

  async saveCredential(
    tenantId: string,
    patch: TenantPatch,
    credential: NewCredential,
  ): Promise<Credential> {
    return this.db.transaction(async (tx) => {
      const updated = await tx
        .update(tenants)
        .set({ ...patch, updatedAt: new Date() })
        .where(eq(tenants.id, tenantId))
        .returning({ id: tenants.id });
      if (updated.length === 0) throw new NotFoundError(`Tenant ${tenantId} not found`);

      // A rotation supersedes the row: fresh id, previous ciphertext gone.
      const [row] = await tx
        .insert(tenantCredentials)
        .values(credential)
        .onConflictDoUpdate({
          target: tenantCredentials.tenantId,
          set: { ...credential, id: crypto.randomUUID(), createdAt: new Date() },
        })
        .returning();
      if (!row) throw new PersistenceError("Credential upsert returned no row");
      return row;
    });
  }

  async addValidationEvent(event: NewValidationEvent): Promise<ValidationEvent> {
    const [row] = await this.db.insert(validationEvents).values(event).returning();
    if (!row) throw new PersistenceError("Validation event insert returned no row");
    return row;
  }

  async listValidationEvents(tenantId: string): Promise<ValidationEvent[]> {
    return this.db
      .select()
      .from(validationEvents)
      .where(eq(validationEvents.tenantId, tenantId))
      .orderBy(desc(validationEvents.createdAt));
  }
}
