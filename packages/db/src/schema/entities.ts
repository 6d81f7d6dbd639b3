import {
  pgTable,
  text,
  timestamp,
  integer,
  doublePrecision,
  date,
  pgEnum,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { documents } from "./documents.js";

export const costTypeEnum = pgEnum("cost_type", ["local", "foreign", "unspecified"]);

// Every entity table is keyed by (document_id, sequence); a second insert of the
// same document's rows fails on the unique index.

export const costItems = pgTable(
  "cost_items",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    sequence: integer("sequence").notNull(),
    itemRef: text("item_ref"),
    description: text("description").notNull(),
    quantity: doublePrecision("quantity").notNull(),
    unit: text("unit").notNull(),
    unitRate: doublePrecision("unit_rate").notNull(),
    amount: doublePrecision("amount").notNull(),
    currency: text("currency"),
    costType: costTypeEnum("cost_type").notNull().default("unspecified"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex("cost_items_document_sequence_idx").on(table.documentId, table.sequence)],
);

export const projectTasks = pgTable(
  "project_tasks",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    sequence: integer("sequence").notNull(),
    taskRef: text("task_ref"),
    name: text("name").notNull(),
    phase: text("phase"),
    durationDays: integer("duration_days"),
    startDate: date("start_date", { mode: "string" }),
    finishDate: date("finish_date", { mode: "string" }),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("project_tasks_document_sequence_idx").on(table.documentId, table.sequence),
  ],
);

export const regulatoryRules = pgTable(
  "regulatory_rules",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    sequence: integer("sequence").notNull(),
    clauseRef: text("clause_ref").notNull(),
    clauseText: text("clause_text").notNull(),
    thresholdValue: doublePrecision("threshold_value"),
    thresholdUnit: text("threshold_unit"),
    measurementBasis: text("measurement_basis"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("regulatory_rules_document_sequence_idx").on(table.documentId, table.sequence),
  ],
);

export const approvalSteps = pgTable(
  "approval_steps",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    documentId: text("document_id")
      .notNull()
      .references(() => documents.id, { onDelete: "cascade" }),
    sequence: integer("sequence").notNull(),
    stepNumber: integer("step_number").notNull(),
    description: text("description").notNull(),
    authority: text("authority"),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("approval_steps_document_sequence_idx").on(table.documentId, table.sequence),
  ],
);

export type CostItemRow = typeof costItems.$inferSelect;
export type NewCostItemRow = typeof costItems.$inferInsert;
export type ProjectTaskRow = typeof projectTasks.$inferSelect;
export type NewProjectTaskRow = typeof projectTasks.$inferInsert;
export type RegulatoryRuleRow = typeof regulatoryRules.$inferSelect;
export type NewRegulatoryRuleRow = typeof regulatoryRules.$inferInsert;
export type ApprovalStepRow = typeof approvalSteps.$inferSelect;
export type NewApprovalStepRow = typeof approvalSteps.$inferInsert;
