import {
  type Department,
  type InsertDepartment,
  type Employee,
  type NewEmployee,
  type TimeEntry,
  type NewTimeEntry,
  departments,
  employees,
  timeEntries,
} from "@shared/schema";
import type * as schema from "@shared/schema";
import { and, asc, desc, eq, gte, ilike, isNull, lte, sql, type SQL } from "drizzle-orm";
import type { PgDatabase } from "drizzle-orm/pg-core";
import type { NodePgQueryResultHKT } from "drizzle-orm/node-postgres";

export interface ListEmployeesOptions {
  includeDeleted?: boolean;
  departmentId?: string;
}

export interface TimeEntryFilter {
  employeeId?: string;
  departmentId?: string;
  start?: string;
  end?: string;
  billable?: boolean;
  /** Substring match on the description */
  search?: string;
  limit?: number;
  offset?: number;
}

export interface TimeEntryPage {
  entries: TimeEntry[];
  total: number;
}

/**
 * Persistence collaborator.
 *
 * Soft-deleted employees are returned by `getEmployee` and
 * `listEmployees({ includeDeleted: true })` only; every other lookup sees
 * active employees. Time entries are never filtered on the owner's flag.
 */
export interface IStorage {
  listDepartments(): Promise<Department[]>;
  getDepartment(id: string): Promise<Department | undefined>;
  getDepartmentByName(name: string): Promise<Department | undefined>;
  createDepartment(department: InsertDepartment): Promise<Department>;
  deleteDepartment(id: string): Promise<boolean>;

  getEmployee(id: string): Promise<Employee | undefined>;
  findEmployeeByEmail(email: string): Promise<Employee | undefined>;
  listEmployees(options?: ListEmployeesOptions): Promise<Employee[]>;
  saveEmployee(employee: NewEmployee): Promise<Employee>;
  updateEmployee(id: string, updates: Partial<Omit<NewEmployee, "id">>): Promise<Employee | undefined>;
  softDeleteEmployee(id: string): Promise<Employee | undefined>;

  getTimeEntry(id: string): Promise<TimeEntry | undefined>;
  getTimeEntries(employeeId: string, date: string): Promise<TimeEntry[]>;
  getTimeEntriesInRange(start: string, end: string): Promise<TimeEntry[]>;
  listTimeEntries(filter: TimeEntryFilter): Promise<TimeEntryPage>;
  saveTimeEntry(entry: NewTimeEntry): Promise<TimeEntry>;
  updateTimeEntry(id: string, updates: Partial<Omit<NewTimeEntry, "id">>): Promise<TimeEntry | undefined>;
  deleteTimeEntry(id: string): Promise<boolean>;

  /**
   * Runs `fn` while holding the per-employee lock. Everything that checks the
   * daily hour cap and then writes must go through here, using the storage
   * handed to the callback.
   */
  withEmployeeLock<T>(employeeId: string, fn: (storage: IStorage) => Promise<T>): Promise<T>;

  /**
   * Runs `fn` while holding the lock for a normalized email. The uniqueness
   * check and the employee write must both happen inside it.
   */
  withEmailLock<T>(email: string, fn: (storage: IStorage) => Promise<T>): Promise<T>;
}

export type Executor = PgDatabase<NodePgQueryResultHKT, typeof schema>;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export class DatabaseStorage implements IStorage {
  constructor(private readonly db: Executor) {}

  async listDepartments(): Promise<Department[]> {
    return await this.db.select().from(departments).orderBy(asc(departments.name));
  }

  async getDepartment(id: string): Promise<Department | undefined> {
    const result = await this.db.select().from(departments).where(eq(departments.id, id));
    return result[0];
  }

  async getDepartmentByName(name: string): Promise<Department | undefined> {
    const result = await this.db
      .select()
      .from(departments)
      .where(sql`lower(${departments.name}) = ${name.trim().toLowerCase()}`);
    return result[0];
  }

  async createDepartment(department: InsertDepartment): Promise<Department> {
    const result = await this.db.insert(departments).values(department).returning();
    return result[0];
  }

  async deleteDepartment(id: string): Promise<boolean> {
    const result = await this.db.delete(departments).where(eq(departments.id, id)).returning({ id: departments.id });
    return result.length > 0;
  }

  async getEmployee(id: string): Promise<Employee | undefined> {
    const result = await this.db.select().from(employees).where(eq(employees.id, id));
    return result[0];
  }

  async findEmployeeByEmail(email: string): Promise<Employee | undefined> {
    const result = await this.db
      .select()
      .from(employees)
      .where(and(eq(employees.email, email.trim().toLowerCase()), isNull(employees.deletedAt)));
    return result[0];
  }

  async listEmployees(options: ListEmployeesOptions = {}): Promise<Employee[]> {
    const conditions: SQL[] = [];
    if (!options.includeDeleted) conditions.push(isNull(employees.deletedAt));
    if (options.departmentId) conditions.push(eq(employees.departmentId, options.departmentId));

    return await this.db
      .select()
      .from(employees)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .orderBy(asc(employees.name), asc(employees.id));
  }

  async saveEmployee(employee: NewEmployee): Promise<Employee> {
    const result = await this.db
      .insert(employees)
      .values({ ...employee, email: employee.email.toLowerCase() })
      .returning();
    return result[0];
  }

  async updateEmployee(id: string, updates: Partial<Omit<NewEmployee, "id">>): Promise<Employee | undefined> {
    const result = await this.db
      .update(employees)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(employees.id, id))
      .returning();
    return result[0];
  }

  async softDeleteEmployee(id: string): Promise<Employee | undefined> {
    const now = new Date();
    const result = await this.db
      .update(employees)
      .set({ deletedAt: now, updatedAt: now })
      .where(and(eq(employees.id, id), isNull(employees.deletedAt)))
      .returning();
    return result[0];
  }

  async getTimeEntry(id: string): Promise<TimeEntry | undefined> {
    const result = await this.db.select().from(timeEntries).where(eq(timeEntries.id, id));
    return result[0];
  }

  async getTimeEntries(employeeId: string, date: string): Promise<TimeEntry[]> {
    return await this.db
      .select()
      .from(timeEntries)
      .where(and(eq(timeEntries.employeeId, employeeId), eq(timeEntries.date, date)))
      .orderBy(asc(timeEntries.createdAt));
  }

  async getTimeEntriesInRange(start: string, end: string): Promise<TimeEntry[]> {
    return await this.db
      .select()
      .from(timeEntries)
      .where(and(gte(timeEntries.date, start), lte(timeEntries.date, end)))
      .orderBy(asc(timeEntries.date), asc(timeEntries.id));
  }

  async listTimeEntries(filter: TimeEntryFilter): Promise<TimeEntryPage> {
    const conditions: SQL[] = [];
    if (filter.employeeId) conditions.push(eq(timeEntries.employeeId, filter.employeeId));
    if (filter.start) conditions.push(gte(timeEntries.date, filter.start));
    if (filter.end) conditions.push(lte(timeEntries.date, filter.end));
    if (filter.billable !== undefined) conditions.push(eq(timeEntries.billable, filter.billable));
    if (filter.search) conditions.push(ilike(timeEntries.description, `%${filter.search}%`));
    if (filter.departmentId) {
      conditions.push(
        sql`${timeEntries.employeeId} in (select ${employees.id} from ${employees} where ${employees.departmentId} = ${filter.departmentId})`,
      );
    }
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const limit = Math.min(filter.limit ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    const entries = await this.db
      .select()
      .from(timeEntries)
      .where(where)
      .orderBy(desc(timeEntries.date), desc(timeEntries.createdAt))
      .limit(limit)
      .offset(filter.offset ?? 0);

    const [{ count }] = await this.db
      .select({ count: sql<number>`count(*)::int` })
      .from(timeEntries)
      .where(where);

    return { entries, total: count };
  }

  async saveTimeEntry(entry: NewTimeEntry): Promise<TimeEntry> {
    const result = await this.db.insert(timeEntries).values(entry).returning();
    return result[0];
  }

  async updateTimeEntry(id: string, updates: Partial<Omit<NewTimeEntry, "id">>): Promise<TimeEntry | undefined> {
    const result = await this.db
      .update(timeEntries)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(timeEntries.id, id))
      .returning();
    return result[0];
  }

  async deleteTimeEntry(id: string): Promise<boolean> {
    const result = await this.db.delete(timeEntries).where(eq(timeEntries.id, id)).returning({ id: timeEntries.id });
    return result.length > 0;
  }

  // pg_advisory_xact_lock serializes across connections and processes and is
  // released when the transaction ends
  async withEmployeeLock<T>(employeeId: string, fn: (storage: IStorage) => Promise<T>): Promise<T> {
    return await this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${employeeId}))`);
      return await fn(new DatabaseStorage(tx));
    });
  }

  async withEmailLock<T>(email: string, fn: (storage: IStorage) => Promise<T>): Promise<T> {
    return await this.db.transaction(async (tx) => {
      await tx.execute(sql`select pg_advisory_xact_lock(hashtext(${emailLockKey(email)}))`);
      return await fn(new DatabaseStorage(tx));
    });
  }
}

export function emailLockKey(email: string): string {
  return `email:${email}`;
}
