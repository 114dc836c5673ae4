import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { createDepartmentService } from "../server/services/departmentService";
import { createEmployeeService } from "../server/services/employeeService";
import { NotFoundError, ViolationError } from "../server/services/people/errors";
import { InMemorySearchIndex } from "../server/services/search";
import { seededStorage, TODAY } from "./fixtures";

async function setup() {
  const seeded = await seededStorage();
  const searchIndex = new InMemorySearchIndex();
  const employees = createEmployeeService({ storage: seeded.storage, searchIndex, today: () => TODAY });
  const departments = createDepartmentService({ storage: seeded.storage });
  return { ...seeded, searchIndex, employees, departments };
}

function violationCodes(error: unknown): string[] {
  assert.ok(error instanceof ViolationError);
  return error.violations.map((v) => v.code);
}

describe("employeeService", () => {
  it("creates a normalized employee and indexes it", async () => {
    const { employees, litigation } = await setup();
    const created = await employees.create({
      name: " Jordan   Price ",
      email: "Jordan@Example.com",
      departmentId: litigation.id,
      hireDate: "2023-02-01",
      position: "Associate",
    });

    assert.equal(created.name, "Jordan Price");
    assert.equal(created.email, "jordan@example.com");
    assert.deepEqual((await employees.search("jordan")).map((e) => e.id), [created.id]);
  });

  it("rejects an email already held by an active employee", async () => {
    const { employees, litigation } = await setup();
    await assert.rejects(
      employees.create({ name: "Avery Other", email: "AVERY@example.com", departmentId: litigation.id, hireDate: "2023-02-01" }),
      (error: unknown) => {
        assert.deepEqual(violationCodes(error), ["EMAIL_ALREADY_EXISTS"]);
        return error instanceof ViolationError && error.kind === "conflict";
      },
    );
  });

  it("creates only one of two concurrent employees with the same email", async () => {
    const { employees, storage, litigation, corporate } = await setup();

    const results = await Promise.allSettled([
      employees.create({ name: "Sam Ortiz", email: "sam@example.com", departmentId: litigation.id, hireDate: "2023-02-01" }),
      employees.create({ name: "Sam Ortiz", email: "SAM@example.com", departmentId: corporate.id, hireDate: "2023-02-01" }),
    ]);

    assert.deepEqual(results.map((r) => r.status), ["fulfilled", "rejected"]);
    const [, second] = results;
    assert.ok(second.status === "rejected");
    assert.deepEqual(violationCodes(second.reason), ["EMAIL_ALREADY_EXISTS"]);
    const all = await storage.listEmployees();
    assert.equal(all.filter((e) => e.email === "sam@example.com").length, 1);
  });

  it("lets a new employee reuse a deleted employee's email", async () => {
    const { employees, avery, litigation } = await setup();
    await employees.remove(avery.id);

    const created = await employees.create({
      name: "Avery Stone",
      email: "avery@example.com",
      departmentId: litigation.id,
      hireDate: "2024-06-01",
    });
    assert.notEqual(created.id, avery.id);
  });

  it("updates department and keeps the employee's own email", async () => {
    const { employees, searchIndex, avery, corporate } = await setup();
    const updated = await employees.update(avery.id, { departmentId: corporate.id });

    assert.equal(updated.departmentId, corporate.id);
    assert.equal(updated.email, "avery@example.com");
    const hits = await searchIndex.query("avery", 5);
    assert.equal(hits[0].document.departmentName, "Corporate");
  });

  it("reports every violation of an update", async () => {
    const { employees, avery } = await setup();
    await assert.rejects(employees.update(avery.id, { name: "Avery", hireDate: "2030-01-01" }), (error: unknown) => {
      assert.deepEqual(violationCodes(error), ["INVALID_NAME", "FUTURE_DATE"]);
      return true;
    });
  });

  it("soft deletes: hidden from get and search, kept in storage with its entries", async () => {
    const { employees, storage, avery } = await setup();
    await storage.saveTimeEntry({
      employeeId: avery.id,
      date: "2024-06-03",
      hours: "2.00",
      description: "Drafted reply brief",
      billable: true,
    });
    await employees.rebuildIndex();
    await employees.remove(avery.id);

    await assert.rejects(employees.get(avery.id), NotFoundError);
    assert.deepEqual(await employees.search("avery"), []);
    assert.equal((await employees.list()).some((e) => e.id === avery.id), false);
    assert.equal((await employees.list({ includeDeleted: true })).some((e) => e.id === avery.id), true);
    assert.equal((await storage.getTimeEntries(avery.id, "2024-06-03")).length, 1);
    await assert.rejects(employees.remove(avery.id), NotFoundError);
  });

  it("rebuilds the index from storage", async () => {
    const { employees } = await setup();
    assert.equal(await employees.rebuildIndex(), 2);
    assert.deepEqual((await employees.search("litigation")).map((e) => e.name), ["Avery Stone"]);
  });
});

describe("departmentService", () => {
  it("trims names and refuses case-insensitive duplicates", async () => {
    const { departments } = await setup();
    const tax = await departments.create({ name: "  Tax " });
    assert.equal(tax.name, "Tax");

    await assert.rejects(departments.create({ name: "litigation" }), (error: unknown) => {
      assert.deepEqual(violationCodes(error), ["DEPARTMENT_ALREADY_EXISTS"]);
      return true;
    });
    await assert.rejects(departments.create({ name: "   " }), (error: unknown) => {
      assert.deepEqual(violationCodes(error), ["REQUIRED"]);
      return true;
    });
  });

  it("unassigns the members of a removed department", async () => {
    const { departments, storage, litigation, avery } = await setup();
    await departments.remove(litigation.id);

    assert.equal((await storage.getEmployee(avery.id))?.departmentId, null);
    assert.deepEqual((await departments.list()).map((d) => d.name), ["Corporate"]);
    await assert.rejects(departments.remove(litigation.id), NotFoundError);
  });
});
