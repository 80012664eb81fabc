import { LRUCache } from "lru-cache";
import type { OnboardingState } from "@vectorbridge/types";
import type { Answers } from "./fields.js";

/**
 * `onboard` persists every state change on the tenant. `rotate` replaces
 * an existing credential and leaves the tenant Complete until it commits.
 */
export type SessionMode = "onboard" | "rotate";

export interface OnboardingSession {
  tenantId: string;
  mode: SessionMode;
  state: OnboardingState;
  answers: Answers;
}

export interface SessionStoreOptions {
  ttlMs: number;
  maxSessions?: number;
}

/**
 * In-flight conversations keyed by tenant id. Unconfirmed answers expire
 * with the session.
 */
export class SessionStore {
  private readonly cache: LRUCache<string, OnboardingSession>;

  constructor(options: SessionStoreOptions) {
    this.cache = new LRUCache<string, OnboardingSession>({
      max: options.maxSessions ?? 10_000,
      ttl: options.ttlMs,
      updateAgeOnGet: true,
    });
  }

  get(tenantId: string): OnboardingSession | undefined {
    return this.cache.get(tenantId);
  }

  set(session: OnboardingSession): void {
    this.cache.set(session.tenantId, session);
  }

  delete(tenantId: string): void {
    this.cache.delete(tenantId);
  }

  has(tenantId: string): boolean {
    return this.cache.has(tenantId);
  }
}
