import type { Department, Employee, TimeEntry } from "@shared/schema";
import { MemStorage } from "../server/memStorage";
import type { ImportCompletedEvent, NotificationHook } from "../server/services/imports/notifications";

export const TODAY = "2024-06-30";

const CREATED = new Date("2024-01-01T09:00:00Z");

export function department(id: string, name: string): Department {
  return { id, name, description: null, createdAt: CREATED };
}

export function employee(
  id: string,
  name: string,
  departmentId: string | null,
  overrides: Partial<Employee> = {},
): Employee {
  return {
    id,
    name,
    email: `${id}@example.com`,
    position: null,
    departmentId,
    hireDate: "2023-01-01",
    deletedAt: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function entry(
  id: string,
  employeeId: string,
  date: string,
  hours: string,
  billable: boolean,
): TimeEntry {
  return {
    id,
    employeeId,
    date,
    hours,
    description: "Worked on client matter",
    billable,
    matterCode: null,
    createdAt: CREATED,
    updatedAt: CREATED,
  };
}

/** MemStorage with two departments and one active employee in each. */
export async function seededStorage() {
  const storage = new MemStorage();
  const litigation = await storage.createDepartment({ name: "Litigation" });
  const corporate = await storage.createDepartment({ name: "Corporate" });
  const avery = await storage.saveEmployee({
    name: "Avery Stone",
    email: "avery@example.com",
    departmentId: litigation.id,
    hireDate: "2022-03-01",
  });
  const riley = await storage.saveEmployee({
    name: "Riley Chen",
    email: "riley@example.com",
    departmentId: corporate.id,
    hireDate: "2021-05-10",
  });
  return { storage, litigation, corporate, avery, riley };
}

export class RecordingHook implements NotificationHook {
  readonly events: ImportCompletedEvent[] = [];

  async notify(event: ImportCompletedEvent): Promise<void> {
    this.events.push(event);
  }
}

export function csv(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}
