import {
  customType,
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
} from "drizzle-orm/pg-core";
import type { AnalysisResult } from "../../core/entities/analysis";

const bytea = customType<{ data: Uint8Array; driverData: Buffer }>({
  dataType() {
    return "bytea";
  },
  toDriver(value) {
    return Buffer.from(value);
  },
  fromDriver(value) {
    return new Uint8Array(value);
  },
});

export const documentsTable = pgTable(
  "documents",
  {
    fileId: text("file_id").primaryKey(),
    fileName: text("file_name").notNull(),
    content: bytea("content").notNull(),
    pageCount: integer("page_count").notNull(),
    byteSize: integer("byte_size").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
  },
  (table) => ({
    createdAtIdx: index("documents_created_at_idx").on(table.createdAt),
  }),
);

export const analysesTable = pgTable("analyses", {
  fileId: text("file_id")
    .primaryKey()
    .references(() => documentsTable.fileId, { onDelete: "cascade" }),
  result: jsonb("result").$type<AnalysisResult>().notNull(),
  createdAt: timestamp("created_at", { withTimezone: true }).notNull(),
});
