import { pgTable, text, timestamp, integer, boolean, pgEnum, uniqueIndex } from "drizzle-orm/pg-core";
import { UPLOAD_STATUSES } from "@vectorbridge/types";
import { tenants } from "./tenants.js";

export const uploadStatusEnum = pgEnum("upload_status", UPLOAD_STATUSES);

export const uploadedFiles = pgTable(
  "uploaded_files",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    tenantId: text("tenant_id")
      .notNull()
      .references(() => tenants.id, { onDelete: "cascade" }),
    fileName: text("file_name").notNull(),
    storageKey: text("storage_key").notNull(),
    mimeType: text("mime_type").notNull().default("text/plain"),
    sizeBytes: integer("size_bytes").notNull().default(0),
    status: uploadStatusEnum("status").notNull().default("pending"),
    errorMessage: text("error_message"),
    segmentCount: integer("segment_count").notNull().default(0),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    processedAt: timestamp("processed_at", { withTimezone: true }),
    cancelRequested: boolean("cancel_requested").notNull().default(false),
  },
  (table) => [uniqueIndex("uploaded_files_tenant_name_idx").on(table.tenantId, table.fileName)],
);
