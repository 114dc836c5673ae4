import type { TimeEntry } from "@shared/schema";
import { isIsoDate, toIsoDate } from "@shared/dates";
import type { IStorage, TimeEntryFilter, TimeEntryPage } from "../storage";
import { NotFoundError, ViolationError } from "./people/errors";
import { validateTimeEntry, type NormalizedTimeEntry, type TimeEntryCandidate } from "./people/validation";

export interface TimeEntryServiceDeps {
  storage: IStorage;
  today?: () => string;
}

export type TimeEntryInput = TimeEntryCandidate;
export type TimeEntryUpdate = Partial<TimeEntryCandidate>;

/**
 * Direct time-entry writes. The daily cap check and the write happen under
 * the same per-employee lock the import pipeline takes.
 */
export function createTimeEntryService(deps: TimeEntryServiceDeps) {
  const { storage } = deps;
  const today = deps.today ?? (() => toIsoDate(new Date()));

  async function checkedWrite(
    candidate: TimeEntryCandidate,
    write: (locked: IStorage, value: NormalizedTimeEntry) => Promise<TimeEntry | undefined>,
    selfId?: string,
  ): Promise<TimeEntry> {
    const employee = await storage.getEmployee(candidate.employeeId);

    return await storage.withEmployeeLock(candidate.employeeId, async (locked) => {
      const date = candidate.date.trim();
      const sameDayEntries = employee && isIsoDate(date) ? await locked.getTimeEntries(employee.id, date) : [];
      const result = validateTimeEntry(candidate, { today: today(), employee, sameDayEntries, selfId });
      if (!result.ok) throw new ViolationError(result.violations);

      const saved = await write(locked, result.value);
      if (!saved) throw new NotFoundError("Time entry", selfId ?? candidate.employeeId);
      return saved;
    });
  }

  async function list(filter: TimeEntryFilter): Promise<TimeEntryPage> {
    return await storage.listTimeEntries(filter);
  }

  async function get(id: string): Promise<TimeEntry> {
    const entry = await storage.getTimeEntry(id);
    if (!entry) throw new NotFoundError("Time entry", id);
    return entry;
  }

  async function create(input: TimeEntryInput): Promise<TimeEntry> {
    return await checkedWrite(input, (locked, value) => locked.saveTimeEntry(value));
  }

  async function update(id: string, changes: TimeEntryUpdate): Promise<TimeEntry> {
    const existing = await get(id);
    const candidate: TimeEntryCandidate = {
      employeeId: changes.employeeId ?? existing.employeeId,
      date: changes.date ?? existing.date,
      hours: changes.hours ?? existing.hours,
      description: changes.description ?? existing.description,
      billable: changes.billable ?? existing.billable,
      matterCode: changes.matterCode !== undefined ? changes.matterCode : existing.matterCode,
    };
    return await checkedWrite(candidate, (locked, value) => locked.updateTimeEntry(id, value), id);
  }

  async function remove(id: string): Promise<void> {
    if (!(await storage.deleteTimeEntry(id))) {
      throw new NotFoundError("Time entry", id);
    }
  }

  return { list, get, create, update, remove };
}

export type TimeEntryService = ReturnType<typeof createTimeEntryService>;
