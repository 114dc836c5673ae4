import type { Department, InsertDepartment } from "@shared/schema";
import type { IStorage } from "../storage";
import { NotFoundError, ViolationError } from "./people/errors";

export function createDepartmentService(deps: { storage: IStorage }) {
  const { storage } = deps;

  async function list(): Promise<Department[]> {
    return await storage.listDepartments();
  }

  async function create(input: InsertDepartment): Promise<Department> {
    const name = input.name.trim();
    if (!name) {
      throw new ViolationError([{ field: "name", code: "REQUIRED", kind: "validation", message: "Name is required" }]);
    }
    if (await storage.getDepartmentByName(name)) {
      throw new ViolationError([
        {
          field: "name",
          code: "DEPARTMENT_ALREADY_EXISTS",
          kind: "conflict",
          message: `Department ${name} already exists`,
        },
      ]);
    }
    return await storage.createDepartment({ name, description: input.description?.trim() || null });
  }

  /** Employees of a deleted department become unassigned. */
  async function remove(id: string): Promise<void> {
    if (!(await storage.deleteDepartment(id))) {
      throw new NotFoundError("Department", id);
    }
  }

  return { list, create, remove };
}

export type DepartmentService = ReturnType<typeof createDepartmentService>;
