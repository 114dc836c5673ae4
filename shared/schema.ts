import { sql } from "drizzle-orm";
import { pgTable, text, varchar, integer, numeric, boolean, date, jsonb, timestamp, uniqueIndex, index } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const departments = pgTable("departments", {
  id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
  name: varchar("name", { length: 50 }).notNull().unique(),
  description: varchar("description", { length: 200 }),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

export const employees = pgTable(
  "employees",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    name: varchar("name", { length: 100 }).notNull(),
    // always stored lower-cased
    email: varchar("email", { length: 255 }).notNull(),
    position: varchar("position", { length: 100 }),
    departmentId: varchar("department_id").references(() => departments.id, { onDelete: "set null" }),
    hireDate: date("hire_date", { mode: "string" }).notNull(),
    deletedAt: timestamp("deleted_at"),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    updatedAt: timestamp("updated_at").notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex("employees_active_email_idx").on(table.email).where(sql`${table.deletedAt} is null`),
    index("employees_department_idx").on(table.departmentId),
  ],
);

export const timeEntries = pgTable(
  "time_entries",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    employeeId: varchar("employee_id").notNull().references(() => employees.id, { onDelete: "restrict" }),
    date: date("date", { mode: "string" }).notNull(),
    hours: numeric("hours", { precision: 5, scale: 2 }).notNull(),
    description: varchar("description", { length: 500 }).notNull(),
    billable: boolean("billable").notNull().default(false),
    matterCode: varchar("matter_code", { length: 20 }),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    updatedAt: timestamp("updated_at").notNull().defaultNow(),
  },
  (table) => [
    index("time_entries_employee_date_idx").on(table.employeeId, table.date),
    index("time_entries_date_idx").on(table.date),
  ],
);

export const IMPORT_KINDS = ["employee-import", "time-entry-import"] as const;
export type ImportKind = typeof IMPORT_KINDS[number];

export const IMPORT_JOB_STATUSES = ["queued", "processing", "completed", "failed"] as const;
export type ImportJobStatus = typeof IMPORT_JOB_STATUSES[number];

export interface ImportRowError {
  /** 1-based, the header row is row 0 */
  rowNumber: number;
  rawData: Record<string, string>;
  errorMessage: string;
  code: string;
}

export const importJobs = pgTable(
  "import_jobs",
  {
    id: varchar("id").primaryKey().default(sql`gen_random_uuid()`),
    kind: text("kind").notNull().$type<ImportKind>(),
    status: text("status").notNull().$type<ImportJobStatus>().default("queued"),
    fileName: text("file_name"),
    totalRows: integer("total_rows").notNull().default(0),
    succeeded: integer("succeeded").notNull().default(0),
    failed: integer("failed").notNull().default(0),
    rowErrors: jsonb("row_errors").notNull().$type<ImportRowError[]>().default([]),
    error: text("error"),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    startedAt: timestamp("started_at"),
    completedAt: timestamp("completed_at"),
  },
  (table) => [index("import_jobs_created_idx").on(table.createdAt)],
);

export const insertDepartmentSchema = createInsertSchema(departments).omit({
  id: true,
  createdAt: true,
});

export const insertEmployeeSchema = createInsertSchema(employees).omit({
  id: true,
  deletedAt: true,
  createdAt: true,
  updatedAt: true,
});

export type InsertDepartment = z.infer<typeof insertDepartmentSchema>;
export type Department = typeof departments.$inferSelect;

export type InsertEmployee = z.infer<typeof insertEmployeeSchema>;
export type Employee = typeof employees.$inferSelect;

export type TimeEntry = typeof timeEntries.$inferSelect;

export type ImportJob = typeof importJobs.$inferSelect;

export type NewEmployee = typeof employees.$inferInsert;
export type NewTimeEntry = typeof timeEntries.$inferInsert;
export type NewImportJob = typeof importJobs.$inferInsert;
