import type { Employee } from "@shared/schema";
import { toIsoDate } from "@shared/dates";
import type { IStorage, ListEmployeesOptions } from "../storage";
import { log } from "../logger";
import { NotFoundError, ViolationError } from "./people/errors";
import { normalizeEmail, validateEmployee, type EmployeeCandidate } from "./people/validation";
import { syncInBackground, toEmployeeDocument, type SearchIndex } from "./search";

export interface EmployeeServiceDeps {
  storage: IStorage;
  searchIndex: SearchIndex;
  today?: () => string;
}

export type EmployeeInput = EmployeeCandidate;
export type EmployeeUpdate = Partial<EmployeeCandidate>;

export const DEFAULT_SEARCH_LIMIT = 10;

/**
 * Direct employee writes. Rules come from the validation layer; a rejected
 * candidate surfaces as a ViolationError for the HTTP layer to render.
 * Search documents follow every write without holding it up.
 */
export function createEmployeeService(deps: EmployeeServiceDeps) {
  const { storage, searchIndex } = deps;
  const today = deps.today ?? (() => toIsoDate(new Date()));

  async function departmentName(departmentId: string | null): Promise<string | null> {
    if (!departmentId) return null;
    const department = await storage.getDepartment(departmentId);
    return department?.name ?? null;
  }

  async function validate(candidate: EmployeeCandidate, locked: IStorage, selfId?: string) {
    const departments = await locked.listDepartments();
    const email = normalizeEmail(candidate.email);
    const emailOwner = email ? await locked.findEmployeeByEmail(email) : undefined;

    const result = validateEmployee(candidate, {
      today: today(),
      departmentIds: new Set(departments.map((d) => d.id)),
      emailOwner,
      selfId,
    });
    if (!result.ok) throw new ViolationError(result.violations);
    return result.value;
  }

  /** Holds the email lock, when there is an email, across the uniqueness check and the write. */
  async function underEmailLock<T>(candidate: EmployeeCandidate, fn: (locked: IStorage) => Promise<T>): Promise<T> {
    const email = normalizeEmail(candidate.email);
    return email ? await storage.withEmailLock(email, fn) : await fn(storage);
  }

  async function reindex(employee: Employee): Promise<void> {
    const document = toEmployeeDocument(employee, await departmentName(employee.departmentId));
    syncInBackground(searchIndex.upsertEmployeeDocument(document), `upsert of ${employee.id}`);
  }

  async function list(options: ListEmployeesOptions = {}): Promise<Employee[]> {
    return await storage.listEmployees(options);
  }

  async function get(id: string): Promise<Employee> {
    const employee = await storage.getEmployee(id);
    if (!employee || employee.deletedAt !== null) throw new NotFoundError("Employee", id);
    return employee;
  }

  async function create(input: EmployeeInput): Promise<Employee> {
    const employee = await underEmailLock(input, async (locked) => {
      const value = await validate(input, locked);
      return await locked.saveEmployee(value);
    });
    await reindex(employee);
    return employee;
  }

  async function update(id: string, changes: EmployeeUpdate): Promise<Employee> {
    const existing = await get(id);
    const candidate: EmployeeCandidate = {
      name: changes.name ?? existing.name,
      email: changes.email ?? existing.email,
      departmentId: changes.departmentId !== undefined ? changes.departmentId : existing.departmentId,
      hireDate: changes.hireDate ?? existing.hireDate,
      position: changes.position !== undefined ? changes.position : existing.position,
    };

    const updated = await underEmailLock(candidate, async (locked) => {
      const value = await validate(candidate, locked, id);
      return await locked.updateEmployee(id, value);
    });
    if (!updated) throw new NotFoundError("Employee", id);
    await reindex(updated);
    return updated;
  }

  /** Soft delete; the employee's time entries are kept. */
  async function remove(id: string): Promise<void> {
    const deleted = await storage.softDeleteEmployee(id);
    if (!deleted) throw new NotFoundError("Employee", id);
    syncInBackground(searchIndex.removeEmployeeDocument(id), `removal of ${id}`);
  }

  async function search(text: string, limit: number = DEFAULT_SEARCH_LIMIT): Promise<Employee[]> {
    const hits = await searchIndex.query(text, limit);
    const found = await Promise.all(hits.map((hit) => storage.getEmployee(hit.id)));
    return found.filter((e): e is Employee => e !== undefined && e.deletedAt === null);
  }

  /** Rebuilds the index from storage, e.g. for an in-process index at startup. */
  async function rebuildIndex(): Promise<number> {
    const [employees, departments] = await Promise.all([storage.listEmployees(), storage.listDepartments()]);
    const names = new Map(departments.map((d) => [d.id, d.name]));
    for (const employee of employees) {
      const name = employee.departmentId ? names.get(employee.departmentId) ?? null : null;
      await searchIndex.upsertEmployeeDocument(toEmployeeDocument(employee, name));
    }
    log(`indexed ${employees.length} employees`, "search");
    return employees.length;
  }

  return { list, get, create, update, remove, search, rebuildIndex };
}

export type EmployeeService = ReturnType<typeof createEmployeeService>;
