import { randomUUID } from "crypto";
import type {
  Department,
  InsertDepartment,
  Employee,
  NewEmployee,
  TimeEntry,
  NewTimeEntry,
} from "@shared/schema";
import {
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  emailLockKey,
  type IStorage,
  type ListEmployeesOptions,
  type TimeEntryFilter,
  type TimeEntryPage,
} from "./storage";
import { KeyedMutex } from "./keyedMutex";

function byText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Process-lifetime storage with the same contract as DatabaseStorage.
 * Used by the test suites and by `STORAGE=memory` for local runs.
 * Records are copied on the way in and out so callers never share state.
 */
export class MemStorage implements IStorage {
  private readonly departments = new Map<string, Department>();
  private readonly employees = new Map<string, Employee>();
  private readonly timeEntries = new Map<string, TimeEntry>();
  private readonly locks = new KeyedMutex();

  async listDepartments(): Promise<Department[]> {
    return Array.from(this.departments.values())
      .sort((a, b) => byText(a.name, b.name))
      .map((d) => ({ ...d }));
  }

  async getDepartment(id: string): Promise<Department | undefined> {
    const department = this.departments.get(id);
    return department ? { ...department } : undefined;
  }

  async getDepartmentByName(name: string): Promise<Department | undefined> {
    const wanted = name.trim().toLowerCase();
    const department = Array.from(this.departments.values()).find((d) => d.name.toLowerCase() === wanted);
    return department ? { ...department } : undefined;
  }

  async createDepartment(department: InsertDepartment): Promise<Department> {
    if (Array.from(this.departments.values()).some((d) => d.name === department.name)) {
      throw new Error(`duplicate key value violates unique constraint: department name ${department.name}`);
    }
    const created: Department = {
      id: randomUUID(),
      name: department.name,
      description: department.description ?? null,
      createdAt: new Date(),
    };
    this.departments.set(created.id, created);
    return { ...created };
  }

  async deleteDepartment(id: string): Promise<boolean> {
    if (!this.departments.delete(id)) return false;
    for (const employee of Array.from(this.employees.values())) {
      if (employee.departmentId === id) {
        this.employees.set(employee.id, { ...employee, departmentId: null });
      }
    }
    return true;
  }

  async getEmployee(id: string): Promise<Employee | undefined> {
    const employee = this.employees.get(id);
    return employee ? { ...employee } : undefined;
  }

  async findEmployeeByEmail(email: string): Promise<Employee | undefined> {
    const wanted = email.trim().toLowerCase();
    const employee = Array.from(this.employees.values()).find((e) => e.email === wanted && e.deletedAt === null);
    return employee ? { ...employee } : undefined;
  }

  async listEmployees(options: ListEmployeesOptions = {}): Promise<Employee[]> {
    return Array.from(this.employees.values())
      .filter((e) => options.includeDeleted || e.deletedAt === null)
      .filter((e) => !options.departmentId || e.departmentId === options.departmentId)
      .sort((a, b) => byText(a.name, b.name) || byText(a.id, b.id))
      .map((e) => ({ ...e }));
  }

  async saveEmployee(employee: NewEmployee): Promise<Employee> {
    const email = employee.email.toLowerCase();
    this.assertEmailFree(email);

    const now = new Date();
    const created: Employee = {
      id: employee.id ?? randomUUID(),
      name: employee.name,
      email,
      position: employee.position ?? null,
      departmentId: employee.departmentId ?? null,
      hireDate: employee.hireDate,
      deletedAt: employee.deletedAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.employees.set(created.id, created);
    return { ...created };
  }

  async updateEmployee(id: string, updates: Partial<Omit<NewEmployee, "id">>): Promise<Employee | undefined> {
    const existing = this.employees.get(id);
    if (!existing) return undefined;

    const email = updates.email?.toLowerCase() ?? existing.email;
    if (email !== existing.email) this.assertEmailFree(email, id);

    const updated: Employee = {
      ...existing,
      name: updates.name ?? existing.name,
      email,
      position: updates.position !== undefined ? updates.position : existing.position,
      departmentId: updates.departmentId !== undefined ? updates.departmentId : existing.departmentId,
      hireDate: updates.hireDate ?? existing.hireDate,
      updatedAt: new Date(),
    };
    this.employees.set(id, updated);
    return { ...updated };
  }

  async softDeleteEmployee(id: string): Promise<Employee | undefined> {
    const existing = this.employees.get(id);
    if (!existing || existing.deletedAt !== null) return undefined;

    const now = new Date();
    const deleted: Employee = { ...existing, deletedAt: now, updatedAt: now };
    this.employees.set(id, deleted);
    return { ...deleted };
  }

  async getTimeEntry(id: string): Promise<TimeEntry | undefined> {
    const entry = this.timeEntries.get(id);
    return entry ? { ...entry } : undefined;
  }

  async getTimeEntries(employeeId: string, date: string): Promise<TimeEntry[]> {
    return Array.from(this.timeEntries.values())
      .filter((t) => t.employeeId === employeeId && t.date === date)
      .map((t) => ({ ...t }));
  }

  async getTimeEntriesInRange(start: string, end: string): Promise<TimeEntry[]> {
    return Array.from(this.timeEntries.values())
      .filter((t) => t.date >= start && t.date <= end)
      .sort((a, b) => byText(a.date, b.date) || byText(a.id, b.id))
      .map((t) => ({ ...t }));
  }

  async listTimeEntries(filter: TimeEntryFilter): Promise<TimeEntryPage> {
    const search = filter.search?.toLowerCase();
    const matching = Array.from(this.timeEntries.values())
      .filter((t) => !filter.employeeId || t.employeeId === filter.employeeId)
      .filter((t) => !filter.start || t.date >= filter.start)
      .filter((t) => !filter.end || t.date <= filter.end)
      .filter((t) => filter.billable === undefined || t.billable === filter.billable)
      .filter((t) => !search || t.description.toLowerCase().includes(search))
      .filter((t) => !filter.departmentId || this.employees.get(t.employeeId)?.departmentId === filter.departmentId)
      .sort((a, b) => byText(b.date, a.date) || b.createdAt.getTime() - a.createdAt.getTime());

    const offset = filter.offset ?? 0;
    const limit = Math.min(filter.limit ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
    return {
      entries: matching.slice(offset, offset + limit).map((t) => ({ ...t })),
      total: matching.length,
    };
  }

  async saveTimeEntry(entry: NewTimeEntry): Promise<TimeEntry> {
    if (!this.employees.has(entry.employeeId)) {
      throw new Error(`insert violates foreign key constraint: employee ${entry.employeeId}`);
    }
    const now = new Date();
    const created: TimeEntry = {
      id: entry.id ?? randomUUID(),
      employeeId: entry.employeeId,
      date: entry.date,
      hours: entry.hours,
      description: entry.description,
      billable: entry.billable ?? false,
      matterCode: entry.matterCode ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.timeEntries.set(created.id, created);
    return { ...created };
  }

  async updateTimeEntry(id: string, updates: Partial<Omit<NewTimeEntry, "id">>): Promise<TimeEntry | undefined> {
    const existing = this.timeEntries.get(id);
    if (!existing) return undefined;

    const updated: TimeEntry = {
      ...existing,
      employeeId: updates.employeeId ?? existing.employeeId,
      date: updates.date ?? existing.date,
      hours: updates.hours ?? existing.hours,
      description: updates.description ?? existing.description,
      billable: updates.billable ?? existing.billable,
      matterCode: updates.matterCode !== undefined ? updates.matterCode : existing.matterCode,
      updatedAt: new Date(),
    };
    this.timeEntries.set(id, updated);
    return { ...updated };
  }

  async deleteTimeEntry(id: string): Promise<boolean> {
    return this.timeEntries.delete(id);
  }

  async withEmployeeLock<T>(employeeId: string, fn: (storage: IStorage) => Promise<T>): Promise<T> {
    return await this.locks.runExclusive(employeeId, () => fn(this));
  }

  async withEmailLock<T>(email: string, fn: (storage: IStorage) => Promise<T>): Promise<T> {
    return await this.locks.runExclusive(emailLockKey(email), () => fn(this));
  }

  private assertEmailFree(email: string, selfId?: string): void {
    const taken = Array.from(this.employees.values()).some(
      (e) => e.email === email && e.deletedAt === null && e.id !== selfId,
    );
    if (taken) {
      throw new Error(`duplicate key value violates unique constraint: employee email ${email}`);
    }
  }
}
