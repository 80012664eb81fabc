import { pgTable, text, timestamp, integer, pgEnum } from "drizzle-orm/pg-core";
import { tenants } from "./tenants.js";

export const embeddingProviderEnum = pgEnum("embedding_provider", ["mistral", "cohere"]);

/**
 * One row per tenant. Rotation overwrites in place; the previous key is
 * never kept.
 */
export const tenantCredentials = pgTable("tenant_credentials", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  tenantId: text("tenant_id")
    .notNull()
    .unique()
    .references(() => tenants.id, { onDelete: "cascade" }),
  storeHost: text("store_host").notNull(),
  storePort: integer("store_port").notNull().default(5432),
  storeDatabase: text("store_database").notNull(),
  storeUser: text("store_user").notNull(),
  storePasswordCiphertext: text("store_password_ciphertext").notNull(),
  provider: embeddingProviderEnum("provider").notNull().default("mistral"),
  providerModel: text("provider_model").notNull(),
  embeddingDimensions: integer("embedding_dimensions").notNull(),
  providerKeyCiphertext: text("provider_key_ciphertext").notNull(),
  providerKeyFingerprint: text("provider_key_fingerprint").notNull(),
  schemaName: text("schema_name").notNull(),
  lastValidatedAt: timestamp("last_validated_at", { withTimezone: true }).notNull().defaultNow(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
});
