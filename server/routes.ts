import express, { type Express } from "express";
import type { Server } from "http";
import type { ImportPipeline } from "./services/imports/importPipeline";
import type { AggregationEngine } from "./services/people";
import type { DepartmentService } from "./services/departmentService";
import type { EmployeeService } from "./services/employeeService";
import type { TimeEntryService } from "./services/timeEntryService";
import { createImportController } from "./controllers/importController";
import { createReportController } from "./controllers/reportController";
import { createPeopleController } from "./controllers/peopleController";
import { createImportRateLimiter } from "./rateLimit";

export interface RouteDeps {
  pipeline: ImportPipeline;
  engine: AggregationEngine;
  departments: DepartmentService;
  employees: EmployeeService;
  timeEntries: TimeEntryService;
  importRateLimitPerMinute: number;
  backends: { storage: string; jobStore: string };
}

const MAX_UPLOAD_SIZE = "10mb";

export function registerRoutes(httpServer: Server, app: Express, deps: RouteDeps): Server {
  const imports = createImportController({ pipeline: deps.pipeline });
  const reports = createReportController({ engine: deps.engine });
  const people = createPeopleController({
    departments: deps.departments,
    employees: deps.employees,
    timeEntries: deps.timeEntries,
  });

  app.get("/api/health", (_req, res) => {
    res.json({ status: "ok", ...deps.backends, timestamp: new Date().toISOString() });
  });

  // Imports
  app.post(
    "/api/imports/:kind",
    createImportRateLimiter(deps.importRateLimitPerMinute),
    express.text({ type: ["text/csv", "text/plain", "application/csv"], limit: MAX_UPLOAD_SIZE }),
    imports.submitImport,
  );
  app.get("/api/imports", imports.listImports);
  app.get("/api/imports/templates/:kind", imports.getTemplate);
  app.get("/api/imports/:id", imports.getImportStatus);

  // Reports
  app.get("/api/reports/summary", reports.getSummary);
  app.get("/api/reports/trend", reports.getTrend);

  // Departments
  app.get("/api/departments", people.listDepartments);
  app.post("/api/departments", people.createDepartment);
  app.delete("/api/departments/:id", people.deleteDepartment);

  // Employees (search before :id)
  app.get("/api/employees", people.listEmployees);
  app.post("/api/employees", people.createEmployee);
  app.get("/api/employees/search", people.searchEmployees);
  app.get("/api/employees/:id", people.getEmployee);
  app.put("/api/employees/:id", people.updateEmployee);
  app.delete("/api/employees/:id", people.deleteEmployee);

  // Time entries
  app.get("/api/time-entries", people.listTimeEntries);
  app.post("/api/time-entries", people.createTimeEntry);
  app.get("/api/time-entries/:id", people.getTimeEntry);
  app.put("/api/time-entries/:id", people.updateTimeEntry);
  app.delete("/api/time-entries/:id", people.deleteTimeEntry);

  return httpServer;
}
