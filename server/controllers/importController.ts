import { z } from "zod";
import { IMPORT_KINDS } from "@shared/schema";
import type { ImportPipeline } from "../services/imports/importPipeline";
import { sendError, type ApiRequest, type ApiResponse } from "./httpErrors";

export type ImportControllerPipeline = Pick<ImportPipeline, "submit" | "getStatus" | "listJobs" | "templateFor">;

const kindSchema = z.enum(IMPORT_KINDS, {
  errorMap: () => ({ message: `kind must be one of ${IMPORT_KINDS.join(", ")}` }),
});

const listQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const submitQuerySchema = z.object({
  fileName: z.string().trim().min(1).max(255).optional(),
});

/**
 * Import endpoints. The pipeline is injected so the handlers can be driven
 * with an in-process pipeline in tests.
 */
export function createImportController(deps: { pipeline: ImportControllerPipeline }) {
  const { pipeline } = deps;

  /**
   * POST /api/imports/:kind
   *
   * Body is the raw CSV (Content-Type: text/csv). Answers 202 with the job
   * id as soon as the job is registered; poll GET /api/imports/:id.
   */
  async function submitImport(req: ApiRequest, res: ApiResponse) {
    try {
      const kind = kindSchema.parse(req.params.kind);
      const { fileName } = submitQuerySchema.parse(req.query);

      if (typeof req.body !== "string") {
        return res.status(415).json({
          error: "Unsupported media type",
          message: "Send the file as text/csv",
        });
      }

      const jobId = await pipeline.submit(req.body, kind, fileName);
      return res.status(202).json({ jobId });
    } catch (error) {
      return sendError(res, error, "submit import");
    }
  }

  /** GET /api/imports/:id */
  async function getImportStatus(req: ApiRequest, res: ApiResponse) {
    try {
      const job = await pipeline.getStatus(req.params.id);
      if (!job) {
        return res.status(404).json({ error: "Not found", message: `Import job ${req.params.id} not found` });
      }
      return res.json(job);
    } catch (error) {
      return sendError(res, error, "fetch import job");
    }
  }

  /** GET /api/imports?limit= */
  async function listImports(req: ApiRequest, res: ApiResponse) {
    try {
      const { limit } = listQuerySchema.parse(req.query);
      return res.json(await pipeline.listJobs(limit));
    } catch (error) {
      return sendError(res, error, "list import jobs");
    }
  }

  /** GET /api/imports/templates/:kind */
  async function getTemplate(req: ApiRequest, res: ApiResponse) {
    try {
      const kind = kindSchema.parse(req.params.kind);
      return res.type("text/csv").attachment(`${kind}-template.csv`).send(pipeline.templateFor(kind));
    } catch (error) {
      return sendError(res, error, "build import template");
    }
  }

  return { submitImport, getImportStatus, listImports, getTemplate };
}
