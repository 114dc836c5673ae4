import { z } from "zod";
import { insertDepartmentSchema, insertEmployeeSchema } from "@shared/schema";
import { MAX_PAGE_SIZE } from "../storage";
import type { DepartmentService } from "../services/departmentService";
import type { EmployeeService } from "../services/employeeService";
import type { TimeEntryService } from "../services/timeEntryService";
import { sendError, type ApiRequest, type ApiResponse } from "./httpErrors";

// ============================================================================
// Request schemas
// ============================================================================

const flag = z.enum(["true", "false"]).transform((value) => value === "true");

const employeeUpdateSchema = insertEmployeeSchema.partial();

const timeEntryFieldsSchema = z.object({
  employeeId: z.string().min(1),
  date: z.string(),
  hours: z.union([z.string(), z.number()]),
  description: z.string(),
  billable: z.union([z.boolean(), z.string()]),
  matterCode: z.string().nullable().optional(),
});

const timeEntryBodySchema = timeEntryFieldsSchema.extend({
  billable: timeEntryFieldsSchema.shape.billable.default(false),
});

const timeEntryUpdateSchema = timeEntryFieldsSchema.partial();

const employeeListQuerySchema = z.object({
  includeDeleted: flag.optional(),
  departmentId: z.string().optional(),
});

const searchQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const timeEntryListQuerySchema = z.object({
  employeeId: z.string().optional(),
  departmentId: z.string().optional(),
  start: z.string().optional(),
  end: z.string().optional(),
  billable: flag.optional(),
  search: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).optional(),
  offset: z.coerce.number().int().min(0).optional(),
});

// ============================================================================
// Controller
// ============================================================================

export interface PeopleControllerDeps {
  departments: DepartmentService;
  employees: EmployeeService;
  timeEntries: TimeEntryService;
}

export function createPeopleController(deps: PeopleControllerDeps) {
  const { departments, employees, timeEntries } = deps;

  // --- Departments ---

  async function listDepartments(_req: ApiRequest, res: ApiResponse) {
    try {
      return res.json(await departments.list());
    } catch (error) {
      return sendError(res, error, "list departments");
    }
  }

  async function createDepartment(req: ApiRequest, res: ApiResponse) {
    try {
      const body = insertDepartmentSchema.parse(req.body);
      return res.status(201).json(await departments.create(body));
    } catch (error) {
      return sendError(res, error, "create department");
    }
  }

  async function deleteDepartment(req: ApiRequest, res: ApiResponse) {
    try {
      await departments.remove(req.params.id);
      return res.status(204).send("");
    } catch (error) {
      return sendError(res, error, "delete department");
    }
  }

  // --- Employees ---

  async function listEmployees(req: ApiRequest, res: ApiResponse) {
    try {
      const query = employeeListQuerySchema.parse(req.query);
      return res.json(await employees.list(query));
    } catch (error) {
      return sendError(res, error, "list employees");
    }
  }

  async function searchEmployees(req: ApiRequest, res: ApiResponse) {
    try {
      const { q, limit } = searchQuerySchema.parse(req.query);
      return res.json(await employees.search(q, limit));
    } catch (error) {
      return sendError(res, error, "search employees");
    }
  }

  async function getEmployee(req: ApiRequest, res: ApiResponse) {
    try {
      return res.json(await employees.get(req.params.id));
    } catch (error) {
      return sendError(res, error, "fetch employee");
    }
  }

  async function createEmployee(req: ApiRequest, res: ApiResponse) {
    try {
      const body = insertEmployeeSchema.parse(req.body);
      const employee = await employees.create({
        name: body.name,
        email: body.email,
        departmentId: body.departmentId,
        hireDate: body.hireDate,
        position: body.position,
      });
      return res.status(201).json(employee);
    } catch (error) {
      return sendError(res, error, "create employee");
    }
  }

  async function updateEmployee(req: ApiRequest, res: ApiResponse) {
    try {
      const changes = employeeUpdateSchema.parse(req.body);
      return res.json(await employees.update(req.params.id, changes));
    } catch (error) {
      return sendError(res, error, "update employee");
    }
  }

  async function deleteEmployee(req: ApiRequest, res: ApiResponse) {
    try {
      await employees.remove(req.params.id);
      return res.status(204).send("");
    } catch (error) {
      return sendError(res, error, "delete employee");
    }
  }

  // --- Time entries ---

  async function listTimeEntries(req: ApiRequest, res: ApiResponse) {
    try {
      const filter = timeEntryListQuerySchema.parse(req.query);
      return res.json(await timeEntries.list(filter));
    } catch (error) {
      return sendError(res, error, "list time entries");
    }
  }

  async function getTimeEntry(req: ApiRequest, res: ApiResponse) {
    try {
      return res.json(await timeEntries.get(req.params.id));
    } catch (error) {
      return sendError(res, error, "fetch time entry");
    }
  }

  async function createTimeEntry(req: ApiRequest, res: ApiResponse) {
    try {
      const body = timeEntryBodySchema.parse(req.body);
      return res.status(201).json(await timeEntries.create(body));
    } catch (error) {
      return sendError(res, error, "create time entry");
    }
  }

  async function updateTimeEntry(req: ApiRequest, res: ApiResponse) {
    try {
      const changes = timeEntryUpdateSchema.parse(req.body);
      return res.json(await timeEntries.update(req.params.id, changes));
    } catch (error) {
      return sendError(res, error, "update time entry");
    }
  }

  async function deleteTimeEntry(req: ApiRequest, res: ApiResponse) {
    try {
      await timeEntries.remove(req.params.id);
      return res.status(204).send("");
    } catch (error) {
      return sendError(res, error, "delete time entry");
    }
  }

  return {
    listDepartments,
    createDepartment,
    deleteDepartment,
    listEmployees,
    searchEmployees,
    getEmployee,
    createEmployee,
    updateEmployee,
    deleteEmployee,
    listTimeEntries,
    getTimeEntry,
    createTimeEntry,
    updateTimeEntry,
    deleteTimeEntry,
  };
}
