export const ONBOARDING_STATES = [
  "CollectingIdentity",
  "CollectingStoreParams",
  "CollectingProviderKey",
  "Validating",
  "Complete",
  "Abandoned",
] as const;

export type OnboardingState = (typeof ONBOARDING_STATES)[number];

export interface Tenant {
  id: string;
  /** External chat session id. Unique and never reassigned. */
  chatSessionId: string;
  username: string | null;
  displayName: string | null;
  phoneNumber: string | null;
  onboardingState: OnboardingState;
  createdAt: Date;
  updatedAt: Date;
}

export interface TenantIdentity {
  chatSessionId: string;
  username?: string | null;
  displayName?: string | null;
}

export interface ValidationEvent {
  id: string;
  tenantId: string;
  field: string;
  reasonCode: string;
  createdAt: Date;
}
