import type { Request } from "express";
import { ZodError } from "zod";
import { describeError, log } from "../logger";
import {
  IllegalJobTransitionError,
  InvalidRequestError,
  NotFoundError,
  ViolationError,
  violationStatus,
} from "../services/people";

/** The parts of an Express request the controllers read. */
export type ApiRequest = Pick<Request, "params" | "query" | "body">;

/** The parts of an Express response the controllers write. */
export interface ApiResponse {
  status(code: number): ApiResponse;
  json(body: unknown): ApiResponse;
  type(contentType: string): ApiResponse;
  attachment(filename?: string): ApiResponse;
  send(body: string): ApiResponse;
}

/**
 * Maps an error to a response. Domain errors carry their own status;
 * everything else is logged and answered with a generic 500 so raw
 * exception text never reaches the client.
 */
export function sendError(res: ApiResponse, error: unknown, context: string) {
  if (error instanceof ViolationError) {
    return res.status(violationStatus(error.kind)).json({
      error: error.kind === "conflict" ? "Conflict" : error.kind === "not_found" ? "Not found" : "Validation failed",
      message: error.message,
      violations: error.violations,
    });
  }
  if (error instanceof NotFoundError) {
    return res.status(404).json({ error: "Not found", message: error.message });
  }
  if (error instanceof InvalidRequestError) {
    return res.status(400).json({ error: "Invalid request", message: error.message });
  }
  if (error instanceof ZodError) {
    return res.status(400).json({
      error: "Invalid request",
      message: error.errors.map((e) => `${e.path.join(".") || "body"}: ${e.message}`).join("; "),
    });
  }
  if (error instanceof IllegalJobTransitionError) {
    return res.status(409).json({ error: "Conflict", message: error.message });
  }

  log.error(`${context}: ${describeError(error)}`);
  return res.status(500).json({ error: "Internal server error", message: `Failed to ${context}` });
}
