import { AppError } from "@vectorbridge/errors";
import type { OnboardingState } from "@vectorbridge/types";

export type OnboardingEvent =
  | "fieldsCollected"
  | "checksPassed"
  | "storeRejected"
  | "keyRejected"
  | "abandon"
  | "restart"
  | "rotate";

export type CollectingState = Extract<
  OnboardingState,
  "CollectingIdentity" | "CollectingStoreParams" | "CollectingProviderKey"
>;

export const TRANSITIONS: Readonly<
  Record<OnboardingState, Readonly<Partial<Record<OnboardingEvent, OnboardingState>>>>
> = {
  CollectingIdentity: {
    fieldsCollected: "CollectingStoreParams",
    abandon: "Abandoned",
    restart: "CollectingIdentity",
  },
  CollectingStoreParams: {
    fieldsCollected: "CollectingProviderKey",
    abandon: "Abandoned",
    restart: "CollectingIdentity",
  },
  CollectingProviderKey: {
    fieldsCollected: "Validating",
    abandon: "Abandoned",
    restart: "CollectingIdentity",
  },
  Validating: {
    checksPassed: "Complete",
    storeRejected: "CollectingStoreParams",
    keyRejected: "CollectingProviderKey",
    abandon: "Abandoned",
    restart: "CollectingIdentity",
  },
  Complete: {
    restart: "CollectingIdentity",
    rotate: "CollectingStoreParams",
  },
  Abandoned: {
    restart: "CollectingIdentity",
  },
};

export function transition(state: OnboardingState, event: OnboardingEvent): OnboardingState {
  const next = TRANSITIONS[state][event];
  if (!next) {
    throw new AppError({
      message: `No transition from ${state} on ${event}`,
      statusCode: 409,
      code: "INVALID_TRANSITION",
      isOperational: false,
    });
  }
  return next;
}

export function isCollecting(state: OnboardingState): state is CollectingState {
  return (
    state === "CollectingIdentity" ||
    state === "CollectingStoreParams" ||
    state === "CollectingProviderKey"
  );
}
