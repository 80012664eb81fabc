import { z } from "zod";
import type { StoreConnectionParams } from "@vectorbridge/types";
import type { CollectingState } from "./transitions.js";

export type FieldName =
  | "phoneNumber"
  | "store.host"
  | "store.port"
  | "store.database"
  | "store.user"
  | "store.password"
  | "provider.apiKey";

/** Plaintext answers collected so far. Held in memory only. */
export interface Answers {
  phoneNumber?: string;
  store: Partial<StoreConnectionParams>;
  apiKey?: string;
}

export interface FieldSpec {
  name: FieldName;
  prompt: string;
  /** Validate and record `input`. Returns the rejection message, if any. */
  accept(input: string, answers: Answers): string | undefined;
  isAnswered(answers: Answers): boolean;
  clear(answers: Answers): void;
}

function field<T>(
  name: FieldName,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  get: (answers: Answers) => T | undefined,
  set: (answers: Answers, value: T | undefined) => void,
): FieldSpec {
  return {
    name,
    prompt,
    accept(input, answers) {
      const result = schema.safeParse(input);
      if (!result.success) return result.error.issues[0]?.message ?? "Invalid value";
      set(answers, result.data);
      return undefined;
    },
    isAnswered: (answers) => get(answers) !== undefined,
    clear: (answers) => set(answers, undefined),
  };
}

const hasNoSpaces = (value: string) => !/\s/.test(value);

const identifier = (label: string) =>
  z
    .string()
    .trim()
    .min(1, `${label} is required`)
    .max(128, `${label} is too long`)
    .refine(hasNoSpaces, `${label} must not contain spaces`);

export const phoneNumberSchema = z
  .string()
  .transform((value) => value.replace(/[\s().-]/g, ""))
  .pipe(
    z.string().regex(/^\+[1-9]\d{7,14}$/, "Phone number must be in international format, e.g. +15551234567"),
  );

export const hostSchema = z
  .string()
  .trim()
  .min(3, "Host is too short")
  .max(255, "Host is too long")
  .refine(
    (host) => hasNoSpaces(host) && (host.includes(".") || host === "localhost"),
    "Host must be a domain name or IP address",
  );

export const portSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, "Port must be a number")
  .transform(Number)
  .pipe(
    z
      .number()
      .int()
      .gt(0, "Port must be between 1 and 65535")
      .lt(65536, "Port must be between 1 and 65535"),
  );

export const FIELDS: Readonly<Record<FieldName, FieldSpec>> = {
  phoneNumber: field(
    "phoneNumber",
    "Send your phone number in international format (e.g. +15551234567).",
    phoneNumberSchema,
    (a) => a.phoneNumber,
    (a, v) => {
      a.phoneNumber = v;
    },
  ),
  "store.host": field(
    "store.host",
    'Vector store host (e.g. db.example.com). Send "default" to use the shared store.',
    hostSchema,
    (a) => a.store.host,
    (a, v) => {
      a.store.host = v;
    },
  ),
  "store.port": field(
    "store.port",
    "Port (usually 5432).",
    portSchema,
    (a) => a.store.port,
    (a, v) => {
      a.store.port = v;
    },
  ),
  "store.database": field(
    "store.database",
    "Database name.",
    identifier("Database name"),
    (a) => a.store.database,
    (a, v) => {
      a.store.database = v;
    },
  ),
  "store.user": field(
    "store.user",
    "Database user.",
    identifier("User"),
    (a) => a.store.user,
    (a, v) => {
      a.store.user = v;
    },
  ),
  "store.password": field(
    "store.password",
    "Database password.",
    z.string().min(6, "Password must be at least 6 characters"),
    (a) => a.store.password,
    (a, v) => {
      a.store.password = v;
    },
  ),
  "provider.apiKey": field(
    "provider.apiKey",
    'Embedding provider API key. Send "default" to use the shared key.',
    z
      .string()
      .trim()
      .min(10, "API key looks too short")
      .refine(hasNoSpaces, "API key must not contain spaces"),
    (a) => a.apiKey,
    (a, v) => {
      a.apiKey = v;
    },
  ),
};

export const FIELDS_BY_STATE: Readonly<Record<CollectingState, readonly FieldName[]>> = {
  CollectingIdentity: ["phoneNumber"],
  CollectingStoreParams: ["store.host", "store.port", "store.database", "store.user", "store.password"],
  CollectingProviderKey: ["provider.apiKey"],
};

export function emptyAnswers(): Answers {
  return { store: {} };
}

/** First field of `state` that still lacks an answer. */
export function nextField(state: CollectingState, answers: Answers): FieldSpec | undefined {
  return FIELDS_BY_STATE[state].map((name) => FIELDS[name]).find((spec) => !spec.isAnswered(answers));
}

export function clearState(state: CollectingState, answers: Answers): void {
  for (const name of FIELDS_BY_STATE[state]) FIELDS[name].clear(answers);
}

export function completeStore(store: Partial<StoreConnectionParams>): StoreConnectionParams | undefined {
  const { host, port, database, user, password } = store;
  if (host === undefined || port === undefined || database === undefined) return undefined;
  if (user === undefined || password === undefined) return undefined;
  return { host, port, database, user, password };
}
