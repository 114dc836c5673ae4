import { readFileSync } from "fs";
import { z } from "zod";
import { toIsoDate } from "@shared/dates";
import { createDb, getPool } from "../server/db";
import { describeError, log } from "../server/logger";
import { DatabaseStorage } from "../server/storage";
import { createDepartmentService } from "../server/services/departmentService";
import { createEmployeeService } from "../server/services/employeeService";
import { createTimeEntryService } from "../server/services/timeEntryService";
import { InMemorySearchIndex } from "../server/services/search";

const seedSchema = z.object({
  departments: z.array(z.object({ name: z.string(), description: z.string().optional() })),
  employees: z.array(
    z.object({
      name: z.string(),
      email: z.string(),
      department: z.string(),
      position: z.string(),
      hireDate: z.string(),
    }),
  ),
  activities: z.array(
    z.object({ description: z.string(), billable: z.boolean(), matterCode: z.string().optional() }),
  ),
});

const WORKDAYS = 20;
const HOURS_PATTERN = ["3.50", "2.75", "4.00", "1.25", "2.00", "3.25"];

function recentWorkdays(count: number): string[] {
  const days: string[] = [];
  const cursor = new Date();
  while (days.length < count) {
    const weekday = cursor.getDay();
    if (weekday !== 0 && weekday !== 6) days.push(toIsoDate(cursor));
    cursor.setDate(cursor.getDate() - 1);
  }
  return days.reverse();
}

async function seed() {
  const data = seedSchema.parse(
    JSON.parse(readFileSync(new URL("./data/seed.json", import.meta.url), "utf-8")),
  );

  const storage = new DatabaseStorage(createDb());
  const departments = createDepartmentService({ storage });
  const employees = createEmployeeService({ storage, searchIndex: new InMemorySearchIndex() });
  const timeEntries = createTimeEntryService({ storage });

  const departmentIds = new Map<string, string>();
  for (const department of data.departments) {
    const created = await departments.create({ name: department.name, description: department.description });
    departmentIds.set(created.name, created.id);
  }
  log(`created ${departmentIds.size} departments`, "seed");

  const days = recentWorkdays(WORKDAYS);
  let entryCount = 0;

  for (const [index, person] of data.employees.entries()) {
    const employee = await employees.create({
      name: person.name,
      email: person.email,
      departmentId: departmentIds.get(person.department),
      hireDate: person.hireDate,
      position: person.position,
    });

    for (const [dayIndex, date] of days.entries()) {
      for (let slot = 0; slot < 2; slot++) {
        const activity = data.activities[(index + dayIndex + slot) % data.activities.length];
        await timeEntries.create({
          employeeId: employee.id,
          date,
          hours: HOURS_PATTERN[(index * 3 + dayIndex + slot) % HOURS_PATTERN.length],
          description: activity.description,
          billable: activity.billable,
          matterCode: activity.matterCode,
        });
        entryCount++;
      }
    }
  }
  log(`created ${data.employees.length} employees and ${entryCount} time entries`, "seed");

  await getPool().end();
}

seed().catch((err: unknown) => {
  log.error(`seed failed: ${describeError(err)}`, "seed");
  process.exit(1);
});
