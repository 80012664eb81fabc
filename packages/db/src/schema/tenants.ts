import { pgTable, text, timestamp, pgEnum } from "drizzle-orm/pg-core";
import { ONBOARDING_STATES } from "@vectorbridge/types";

export const onboardingStateEnum = pgEnum("onboarding_state", ONBOARDING_STATES);

export const tenants = pgTable("tenants", {
  id: text("id")
    .primaryKey()
    .$defaultFn(() => crypto.randomUUID()),
  chatSessionId: text("chat_session_id").notNull().unique(),
  username: text("username"),
  displayName: text("display_name"),
  phoneNumber: text("phone_number"),
  onboardingState: onboardingStateEnum("onboarding_state")
    .notNull()
    .default("CollectingIdentity"),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
});
