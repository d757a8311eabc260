import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export * from "./models/auth";

// Ordered lowest to highest.
export const INCIDENT_SEVERITIES = ["low", "medium", "high", "critical"] as const;
export const INCIDENT_STATUSES = ["open", "in-progress", "resolved", "closed"] as const;
export const INCIDENT_TERMINAL_STATUSES = ["resolved", "closed"] as const;

export const TICKET_PRIORITIES = ["low", "medium", "high", "critical"] as const;
export const TICKET_STATUSES = ["open", "in-progress", "resolved"] as const;
export const TICKET_TERMINAL_STATUSES = ["resolved"] as const;

export type IncidentSeverity = (typeof INCIDENT_SEVERITIES)[number];
export type IncidentStatus = (typeof INCIDENT_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const cyberIncidents = sqliteTable(
  "cyber_incidents",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    description: text("description"),
    category: text("category").notNull(),
    severity: text("severity", { enum: INCIDENT_SEVERITIES }).notNull(),
    status: text("status", { enum: INCIDENT_STATUSES }).notNull().default("open"),
    reportedAt: integer("reported_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
    resolvedAt: integer("resolved_at", { mode: "timestamp_ms" }),
  },
  (table) => [
    index("idx_incidents_category").on(table.category),
    index("idx_incidents_severity").on(table.severity),
    index("idx_incidents_status").on(table.status),
    index("idx_incidents_reported").on(table.reportedAt),
  ],
);

export const datasetsMetadata = sqliteTable(
  "datasets_metadata",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    name: text("name").notNull(),
    rowCount: integer("row_count").notNull(),
    columnCount: integer("column_count").notNull(),
    uploader: text("uploader").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
  },
  (table) => [
    index("idx_datasets_uploader").on(table.uploader),
    index("idx_datasets_created").on(table.createdAt),
  ],
);

export const itTickets = sqliteTable(
  "it_tickets",
  {
    id: integer("id").primaryKey({ autoIncrement: true }),
    title: text("title").notNull(),
    description: text("description"),
    priority: text("priority", { enum: TICKET_PRIORITIES }).notNull(),
    status: text("status", { enum: TICKET_STATUSES }).notNull().default("open"),
    assignee: text("assignee").notNull(),
    createdAt: integer("created_at", { mode: "timestamp_ms" })
      .notNull()
      .$defaultFn(() => new Date()),
    resolvedAt: integer("resolved_at", { mode: "timestamp_ms" }),
  },
  (table) => [
    index("idx_tickets_priority").on(table.priority),
    index("idx_tickets_status").on(table.status),
    index("idx_tickets_assignee").on(table.assignee),
    index("idx_tickets_created").on(table.createdAt),
  ],
);

const MAX_TITLE = 200;
const MAX_NAME = 120;
const MAX_TEXT = 4000;

const requiredText = (max: number) =>
  z.string().trim().min(1, "Required").max(max, `Must be at most ${max} characters`);

const optionalText = z.string().trim().max(MAX_TEXT).nullable().optional();

// Coercion only sees numbers, dates and non-blank strings; null, "" and
// booleans are rejected.
const nonNegativeInt = z
  .union([z.number(), z.string().trim().min(1, "Required")], { errorMap: () => ({ message: "Must be a number" }) })
  .pipe(z.coerce.number().int("Must be a whole number").min(0, "Must not be negative"));

export const timestampField = z
  .union([z.date(), z.number(), z.string().trim().min(1, "Required")], {
    errorMap: () => ({ message: "Must be a date" }),
  })
  .pipe(z.coerce.date({ errorMap: () => ({ message: "Must be a date" }) }));

// Insert schemas
export const insertIncidentSchema = createInsertSchema(cyberIncidents)
  .omit({ id: true })
  .extend({
    title: requiredText(MAX_TITLE),
    description: optionalText,
    category: requiredText(MAX_NAME),
    reportedAt: timestampField.optional(),
    resolvedAt: timestampField.nullable().optional(),
  });

export const insertDatasetSchema = createInsertSchema(datasetsMetadata)
  .omit({ id: true })
  .extend({
    name: requiredText(MAX_NAME),
    rowCount: nonNegativeInt,
    columnCount: nonNegativeInt,
    uploader: requiredText(MAX_NAME),
    createdAt: timestampField.optional(),
  });

export const insertTicketSchema = createInsertSchema(itTickets)
  .omit({ id: true })
  .extend({
    title: requiredText(MAX_TITLE),
    description: optionalText,
    assignee: requiredText(MAX_NAME),
    createdAt: timestampField.optional(),
    resolvedAt: timestampField.nullable().optional(),
  });

export const updateIncidentSchema = insertIncidentSchema.partial();
export const updateDatasetSchema = insertDatasetSchema.partial();
export const updateTicketSchema = insertTicketSchema.partial();

// A stored row with an update applied, re-checked before it is written back.
export const incidentRecordSchema = insertIncidentSchema
  .omit({ resolvedAt: true })
  .required({ status: true, reportedAt: true });
export const datasetRecordSchema = insertDatasetSchema.required({ createdAt: true });
export const ticketRecordSchema = insertTicketSchema
  .omit({ resolvedAt: true })
  .required({ status: true, createdAt: true });

// Types
export type Incident = typeof cyberIncidents.$inferSelect;
export type InsertIncident = z.input<typeof insertIncidentSchema>;
export type UpdateIncident = z.input<typeof updateIncidentSchema>;
export type Dataset = typeof datasetsMetadata.$inferSelect;
export type InsertDataset = z.input<typeof insertDatasetSchema>;
export type UpdateDataset = z.input<typeof updateDatasetSchema>;
export type Ticket = typeof itTickets.$inferSelect;
export type InsertTicket = z.input<typeof insertTicketSchema>;
export type UpdateTicket = z.input<typeof updateTicketSchema>;

// List filters
export const incidentFilterSchema = z.object({
  severity: z.enum(INCIDENT_SEVERITIES).optional(),
  status: z.enum(INCIDENT_STATUSES).optional(),
  category: z.string().trim().min(1).max(MAX_NAME).optional(),
});

export const datasetFilterSchema = z.object({
  uploader: z.string().trim().min(1).max(MAX_NAME).optional(),
});

export const ticketFilterSchema = z.object({
  priority: z.enum(TICKET_PRIORITIES).optional(),
  status: z.enum(TICKET_STATUSES).optional(),
  assignee: z.string().trim().min(1).max(MAX_NAME).optional(),
});

export type IncidentFilter = z.input<typeof incidentFilterSchema>;
export type DatasetFilter = z.input<typeof datasetFilterSchema>;
export type TicketFilter = z.input<typeof ticketFilterSchema>;

export const recommendationRequestSchema = z.object({
  question: z.string().trim().max(2000, "Must be at most 2000 characters").optional(),
});

export type RecommendationRequest = z.infer<typeof recommendationRequestSchema>;
