import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { MemStorage } from "../memStorage";
import { createAggregationEngine, type Summary } from "../services/people/aggregation";
import type { ApiRequest, ApiResponse } from "./httpErrors";
import { createReportController } from "./reportController";

class FakeResponse implements ApiResponse {
  statusCode = 200;
  body: unknown;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    return this;
  }

  type(): this {
    return this;
  }

  attachment(): this {
    return this;
  }

  send(body: string): this {
    this.body = body;
    return this;
  }
}

function isSummary(value: unknown): value is Summary {
  return typeof value === "object" && value !== null && "utilizationRate" in value && "range" in value;
}

async function setup() {
  const storage = new MemStorage();
  const department = await storage.createDepartment({ name: "Litigation" });
  const employee = await storage.saveEmployee({
    name: "Avery Stone",
    email: "avery@example.com",
    departmentId: department.id,
    hireDate: "2022-03-01",
  });
  await storage.saveTimeEntry({
    employeeId: employee.id,
    date: "2024-06-03",
    hours: "3.00",
    description: "Drafted reply brief",
    billable: true,
  });
  await storage.saveTimeEntry({
    employeeId: employee.id,
    date: "2024-06-04",
    hours: "1.00",
    description: "Internal training session",
    billable: false,
  });
  const engine = createAggregationEngine(storage, { includeDeletedEmployees: true });
  const controller = createReportController({ engine, today: () => "2024-06-30" });
  return { controller, employee };
}

function request(query: Record<string, string>): ApiRequest {
  return { params: {}, query, body: undefined };
}

describe("reportController", () => {
  it("defaults to the firm over the current month", async () => {
    const { controller } = await setup();
    const res = new FakeResponse();
    await controller.getSummary(request({}), res);

    assert.equal(res.statusCode, 200);
    assert.ok(isSummary(res.body));
    assert.deepEqual(res.body.range, { start: "2024-06-01", end: "2024-06-30" });
    assert.deepEqual(res.body.scope, { kind: "firm" });
    assert.equal(res.body.totalHours, 4);
    assert.equal(res.body.utilizationRate, 0.75);
  });

  it("summarizes one employee", async () => {
    const { controller, employee } = await setup();
    const res = new FakeResponse();
    await controller.getSummary(request({ scope: "employee", id: employee.id, start: "2024-06-04", end: "2024-06-04" }), res);

    assert.ok(isSummary(res.body));
    assert.equal(res.body.totalHours, 1);
    assert.equal(res.body.utilizationRate, 0);
  });

  it("answers 400 for a missing id or an inverted range", async () => {
    const { controller } = await setup();

    const missingId = new FakeResponse();
    await controller.getSummary(request({ scope: "department" }), missingId);
    assert.equal(missingId.statusCode, 400);
    assert.deepEqual(missingId.body, { error: "Invalid request", message: "id is required for department scope" });

    const inverted = new FakeResponse();
    await controller.getSummary(request({ start: "2024-06-30", end: "2024-06-01" }), inverted);
    assert.equal(inverted.statusCode, 400);
    assert.deepEqual(inverted.body, { error: "Invalid request", message: "start must be on or before end" });
  });

  it("answers 404 for an unknown department", async () => {
    const { controller } = await setup();
    const res = new FakeResponse();
    await controller.getSummary(request({ scope: "department", id: "missing" }), res);

    assert.equal(res.statusCode, 404);
    assert.deepEqual(res.body, { error: "Not found", message: "Department missing not found" });
  });

  it("returns the daily trend", async () => {
    const { controller } = await setup();
    const res = new FakeResponse();
    await controller.getTrend(request({ start: "2024-06-01", end: "2024-06-30" }), res);

    assert.equal(res.statusCode, 200);
    assert.ok(typeof res.body === "object" && res.body !== null && "averages" in res.body);
    assert.deepEqual(res.body.averages, { dailyTotalHours: 2, dailyBillableHours: 1.5, periodUtilizationRate: 0.75 });
  });
});
