export { TenantRegistry, schemaNameFor } from "./registry.js";
export type { RotationListener, TenantRegistryOptions } from "./registry.js";
export type {
  ITenantRepository,
  NewCredential,
  NewValidationEvent,
  TenantPatch,
} from "./repository.interface.js";
export { DrizzleTenantRepository } from "./drizzle-repository.js";
export { InMemoryTenantRepository } from "./memory-repository.js";
