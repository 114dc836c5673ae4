import { randomUUID } from "crypto";
import { and, desc, eq, sql } from "drizzle-orm";
import { importJobs, type ImportJob, type ImportJobStatus, type ImportKind, type ImportRowError } from "@shared/schema";
import type { Executor } from "../../storage";
import { IllegalJobTransitionError, NotFoundError } from "../people/errors";

export interface CreateImportJobInput {
  kind: ImportKind;
  fileName?: string | null;
  totalRows: number;
}

/**
 * Registry of import jobs. Status only changes through the named
 * transitions below; each one checks the current status and throws
 * IllegalJobTransitionError otherwise. Reads hand out copies.
 */
export interface ImportJobStore {
  create(input: CreateImportJobInput): Promise<ImportJob>;
  get(jobId: string): Promise<ImportJob | undefined>;
  /** Most recent first */
  list(limit: number): Promise<ImportJob[]>;
  markProcessing(jobId: string): Promise<ImportJob>;
  recordSuccess(jobId: string): Promise<void>;
  recordFailure(jobId: string, rowError: ImportRowError): Promise<void>;
  complete(jobId: string): Promise<ImportJob>;
  fail(jobId: string, message: string): Promise<ImportJob>;
}

const ALLOWED: Record<ImportJobStatus, readonly ImportJobStatus[]> = {
  queued: ["processing", "failed"],
  processing: ["completed", "failed"],
  completed: [],
  failed: [],
};

export function canTransition(from: ImportJobStatus, to: ImportJobStatus): boolean {
  return ALLOWED[from].includes(to);
}

// ============================================================================
// In-process
// ============================================================================

export class MemoryImportJobStore implements ImportJobStore {
  private readonly jobs = new Map<string, ImportJob>();

  async create(input: CreateImportJobInput): Promise<ImportJob> {
    const job: ImportJob = {
      id: randomUUID(),
      kind: input.kind,
      status: "queued",
      fileName: input.fileName ?? null,
      totalRows: input.totalRows,
      succeeded: 0,
      failed: 0,
      rowErrors: [],
      error: null,
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
    };
    this.jobs.set(job.id, job);
    return structuredClone(job);
  }

  async get(jobId: string): Promise<ImportJob | undefined> {
    const job = this.jobs.get(jobId);
    return job ? structuredClone(job) : undefined;
  }

  async list(limit: number): Promise<ImportJob[]> {
    // Map iteration is insertion order; newest last
    return Array.from(this.jobs.values())
      .reverse()
      .slice(0, Math.max(limit, 0))
      .map((job) => structuredClone(job));
  }

  async markProcessing(jobId: string): Promise<ImportJob> {
    const job = this.transition(jobId, "processing");
    job.startedAt = new Date();
    return structuredClone(job);
  }

  async recordSuccess(jobId: string): Promise<void> {
    const job = this.requireProcessing(jobId, "completed");
    job.succeeded += 1;
  }

  async recordFailure(jobId: string, rowError: ImportRowError): Promise<void> {
    const job = this.requireProcessing(jobId, "failed");
    job.failed += 1;
    job.rowErrors.push(structuredClone(rowError));
  }

  async complete(jobId: string): Promise<ImportJob> {
    const job = this.transition(jobId, "completed");
    job.completedAt = new Date();
    return structuredClone(job);
  }

  async fail(jobId: string, message: string): Promise<ImportJob> {
    const job = this.transition(jobId, "failed");
    job.error = message;
    job.completedAt = new Date();
    return structuredClone(job);
  }

  private find(jobId: string): ImportJob {
    const job = this.jobs.get(jobId);
    if (!job) throw new NotFoundError("Import job", jobId);
    return job;
  }

  private transition(jobId: string, to: ImportJobStatus): ImportJob {
    const job = this.find(jobId);
    if (!canTransition(job.status, to)) {
      throw new IllegalJobTransitionError(jobId, job.status, to);
    }
    job.status = to;
    return job;
  }

  // counters only move while the job is running
  private requireProcessing(jobId: string, attempted: ImportJobStatus): ImportJob {
    const job = this.find(jobId);
    if (job.status !== "processing") {
      throw new IllegalJobTransitionError(jobId, job.status, attempted);
    }
    return job;
  }
}

// ============================================================================
// PostgreSQL
// ============================================================================

export class DatabaseImportJobStore implements ImportJobStore {
  constructor(private readonly db: Executor) {}

  async create(input: CreateImportJobInput): Promise<ImportJob> {
    const result = await this.db
      .insert(importJobs)
      .values({ kind: input.kind, fileName: input.fileName ?? null, totalRows: input.totalRows })
      .returning();
    return result[0];
  }

  async get(jobId: string): Promise<ImportJob | undefined> {
    const result = await this.db.select().from(importJobs).where(eq(importJobs.id, jobId));
    return result[0];
  }

  async list(limit: number): Promise<ImportJob[]> {
    return await this.db
      .select()
      .from(importJobs)
      .orderBy(desc(importJobs.createdAt), desc(importJobs.id))
      .limit(Math.max(limit, 0));
  }

  async markProcessing(jobId: string): Promise<ImportJob> {
    const result = await this.db
      .update(importJobs)
      .set({ status: "processing", startedAt: new Date() })
      .where(and(eq(importJobs.id, jobId), eq(importJobs.status, "queued")))
      .returning();
    return result[0] ?? (await this.rejectTransition(jobId, "processing"));
  }

  async recordSuccess(jobId: string): Promise<void> {
    const result = await this.db
      .update(importJobs)
      .set({ succeeded: sql`${importJobs.succeeded} + 1` })
      .where(and(eq(importJobs.id, jobId), eq(importJobs.status, "processing")))
      .returning({ id: importJobs.id });
    if (result.length === 0) await this.rejectTransition(jobId, "completed");
  }

  async recordFailure(jobId: string, rowError: ImportRowError): Promise<void> {
    const result = await this.db
      .update(importJobs)
      .set({
        failed: sql`${importJobs.failed} + 1`,
        rowErrors: sql`${importJobs.rowErrors} || ${JSON.stringify([rowError])}::jsonb`,
      })
      .where(and(eq(importJobs.id, jobId), eq(importJobs.status, "processing")))
      .returning({ id: importJobs.id });
    if (result.length === 0) await this.rejectTransition(jobId, "failed");
  }

  async complete(jobId: string): Promise<ImportJob> {
    const result = await this.db
      .update(importJobs)
      .set({ status: "completed", completedAt: new Date() })
      .where(and(eq(importJobs.id, jobId), eq(importJobs.status, "processing")))
      .returning();
    return result[0] ?? (await this.rejectTransition(jobId, "completed"));
  }

  async fail(jobId: string, message: string): Promise<ImportJob> {
    const result = await this.db
      .update(importJobs)
      .set({ status: "failed", error: message, completedAt: new Date() })
      .where(and(eq(importJobs.id, jobId), sql`${importJobs.status} in ('queued', 'processing')`))
      .returning();
    return result[0] ?? (await this.rejectTransition(jobId, "failed"));
  }

  private async rejectTransition(jobId: string, to: ImportJobStatus): Promise<never> {
    const job = await this.get(jobId);
    if (!job) throw new NotFoundError("Import job", jobId);
    throw new IllegalJobTransitionError(jobId, job.status, to);
  }
}
