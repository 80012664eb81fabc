export { OnboardingValidator } from "./validator.js";
export type {
  KeyChecks,
  OnboardingRegistry,
  OnboardingReply,
  OnboardingValidatorOptions,
  StoreChecks,
} from "./validator.js";
export { TRANSITIONS, transition, isCollecting } from "./transitions.js";
export type { CollectingState, OnboardingEvent } from "./transitions.js";
export { FIELDS, FIELDS_BY_STATE, nextField, phoneNumberSchema, hostSchema, portSchema } from "./fields.js";
export type { Answers, FieldName, FieldSpec } from "./fields.js";
export { SessionStore } from "./session-store.js";
export type { OnboardingSession, SessionMode } from "./session-store.js";
