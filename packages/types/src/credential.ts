export type EmbeddingProviderName = "mistral" | "cohere";

export interface StoreConnectionParams {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
}

export interface ProviderSettings {
  provider: EmbeddingProviderName;
  model: string;
  dimensions: number;
}

/**
 * Plaintext bundle collected during onboarding or key rotation.
 * Lives only in memory for the duration of validation and persistence.
 */
export interface CredentialBundle {
  phoneNumber: string | null;
  store: StoreConnectionParams;
  provider: ProviderSettings & { apiKey: string };
}

/**
 * Persisted credential. Secrets are held as ciphertext only.
 */
export interface Credential {
  id: string;
  tenantId: string;
  storeHost: string;
  storePort: number;
  storeDatabase: string;
  storeUser: string;
  storePasswordCiphertext: string;
  provider: EmbeddingProviderName;
  providerModel: string;
  embeddingDimensions: number;
  providerKeyCiphertext: string;
  providerKeyFingerprint: string;
  schemaName: string;
  lastValidatedAt: Date;
  createdAt: Date;
}

/**
 * Decrypted view handed to a single scoped callback by the registry.
 */
export interface DecryptedCredential {
  tenantId: string;
  /** Changes whenever the credential is replaced. */
  version: string;
  schemaName: string;
  store: StoreConnectionParams;
  provider: ProviderSettings & { apiKey: string };
}
