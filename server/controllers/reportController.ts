import { z } from "zod";
import { firstOfMonth, toIsoDate } from "@shared/dates";
import { InvalidRequestError, type AggregationEngine, type DateRange, type SummaryScope } from "../services/people";
import { sendError, type ApiRequest, type ApiResponse } from "./httpErrors";

const flag = z.enum(["true", "false"]).transform((value) => value === "true");

const rangeQuerySchema = z.object({
  start: z.string().optional(),
  end: z.string().optional(),
  includeDeleted: flag.optional(),
});

const summaryQuerySchema = rangeQuerySchema.extend({
  scope: z.enum(["employee", "department", "firm"]).default("firm"),
  id: z.string().trim().min(1).optional(),
});

export function createReportController(deps: { engine: AggregationEngine; today?: () => string }) {
  const { engine } = deps;
  const today = deps.today ?? (() => toIsoDate(new Date()));

  // Default: first of the current month through today
  function rangeFrom(query: { start?: string; end?: string }): DateRange {
    const end = query.end ?? today();
    return { start: query.start ?? firstOfMonth(end), end };
  }

  /** GET /api/reports/summary?scope=&id=&start=&end=&includeDeleted= */
  async function getSummary(req: ApiRequest, res: ApiResponse) {
    try {
      const query = summaryQuerySchema.parse(req.query);

      let scope: SummaryScope;
      if (query.scope === "firm") {
        scope = { kind: "firm" };
      } else if (!query.id) {
        throw new InvalidRequestError(`id is required for ${query.scope} scope`);
      } else if (query.scope === "employee") {
        scope = { kind: "employee", employeeId: query.id };
      } else {
        scope = { kind: "department", departmentId: query.id };
      }

      const options = query.includeDeleted === undefined ? {} : { includeDeletedEmployees: query.includeDeleted };
      return res.json(await engine.summarize(scope, rangeFrom(query), options));
    } catch (error) {
      return sendError(res, error, "compute summary");
    }
  }

  /** GET /api/reports/trend?start=&end= */
  async function getTrend(req: ApiRequest, res: ApiResponse) {
    try {
      const query = rangeQuerySchema.parse(req.query);
      const options = query.includeDeleted === undefined ? {} : { includeDeletedEmployees: query.includeDeleted };
      return res.json(await engine.dailyTrend(rangeFrom(query), options));
    } catch (error) {
      return sendError(res, error, "compute trend");
    }
  }

  return { getSummary, getTrend };
}
