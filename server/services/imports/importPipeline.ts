/**
 * Bulk CSV Import Pipeline
 *
 * `submit` parses and checks the file, registers a job and hands it to the
 * worker pool; `process` walks the rows in file order, validating and
 * persisting each one and recording a row error for every row that fails.
 * A job moves queued -> processing -> completed | failed, or straight from
 * queued to failed when the file itself is unusable.
 */

import type { Employee, ImportJob, ImportKind, ImportRowError } from "@shared/schema";
import { isIsoDate, toIsoDate } from "@shared/dates";
import type { IStorage } from "../../storage";
import { describeError, log } from "../../logger";
import { FatalImportError, NotFoundError, type Violation } from "../people/errors";
import { normalizeEmail, validateEmployee, validateTimeEntry } from "../people/validation";
import { syncInBackground, toEmployeeDocument, type SearchIndex } from "../search";
import { parseImportCsv, type CsvRow } from "./csv";
import type { ImportJobStore } from "./jobStore";
import type { NotificationHook } from "./notifications";
import { csvTemplate } from "./templates";
import type { WorkerPool } from "./workerPool";

export const INFRASTRUCTURE_FAILURE_MESSAGE =
  "Import stopped by an internal error; rows imported before it were kept";

export interface ImportPipelineDeps {
  storage: IStorage;
  jobs: ImportJobStore;
  pool: WorkerPool;
  notifier: NotificationHook;
  searchIndex?: SearchIndex;
  /** Current local date, YYYY-MM-DD */
  today?: () => string;
  now?: () => number;
}

type RowOutcome = { ok: true } | { ok: false; violations: Violation[] };
type SavedEmployeeOutcome = { ok: true; saved: Employee } | { ok: false; violations: Violation[] };

interface BatchState {
  /** email -> row that imported it */
  emails: Map<string, number>;
  /** employeeId|date|description -> row that imported it */
  entries: Map<string, number>;
}

function duplicate(field: string, message: string): RowOutcome {
  return { ok: false, violations: [{ field, code: "DUPLICATE_IN_BATCH", kind: "conflict", message }] };
}

export class ImportPipeline {
  private readonly pendingRows = new Map<string, { kind: ImportKind; rows: CsvRow[] }>();
  private readonly today: () => string;
  private readonly now: () => number;

  constructor(private readonly deps: ImportPipelineDeps) {
    this.today = deps.today ?? (() => toIsoDate(new Date()));
    this.now = deps.now ?? (() => Date.now());
  }

  async submit(fileContent: string, kind: ImportKind, fileName?: string): Promise<string> {
    const submittedAt = this.now();

    let rows: CsvRow[];
    try {
      rows = parseImportCsv(fileContent, kind).rows;
    } catch (error) {
      if (!(error instanceof FatalImportError)) throw error;

      const job = await this.deps.jobs.create({ kind, fileName, totalRows: 0 });
      const failed = await this.deps.jobs.fail(job.id, error.message);
      log.warn(`job ${job.id} rejected: ${error.message}`, "imports");
      await this.notify(failed, submittedAt);
      return job.id;
    }

    const job = await this.deps.jobs.create({ kind, fileName, totalRows: rows.length });
    this.pendingRows.set(job.id, { kind, rows });
    this.deps.pool.enqueue(() => this.process(job.id));
    log(`job ${job.id} queued: ${kind}, ${rows.length} rows`, "imports");
    return job.id;
  }

  async process(jobId: string): Promise<void> {
    const pending = this.pendingRows.get(jobId);
    if (!pending) throw new NotFoundError("Queued import", jobId);
    this.pendingRows.delete(jobId);

    const startedAt = this.now();
    await this.deps.jobs.markProcessing(jobId);

    let final: ImportJob;
    try {
      const batch: BatchState = { emails: new Map(), entries: new Map() };
      const today = this.today();

      for (const row of pending.rows) {
        const outcome =
          pending.kind === "employee-import"
            ? await this.importEmployeeRow(row, batch, today)
            : await this.importTimeEntryRow(row, batch, today);

        if (outcome.ok) {
          await this.deps.jobs.recordSuccess(jobId);
        } else {
          await this.deps.jobs.recordFailure(jobId, toRowError(row, outcome.violations));
        }
      }
      final = await this.deps.jobs.complete(jobId);
    } catch (error) {
      log.error(`job ${jobId} failed: ${describeError(error)}`, "imports");
      final = await this.deps.jobs.fail(jobId, INFRASTRUCTURE_FAILURE_MESSAGE);
    }

    log(`job ${jobId} ${final.status}: ${final.succeeded} succeeded, ${final.failed} failed`, "imports");
    await this.notify(final, startedAt);
  }

  async getStatus(jobId: string): Promise<ImportJob | undefined> {
    return await this.deps.jobs.get(jobId);
  }

  async listJobs(limit: number): Promise<ImportJob[]> {
    return await this.deps.jobs.list(limit);
  }

  templateFor(kind: ImportKind): string {
    return csvTemplate(kind);
  }

  async whenIdle(): Promise<void> {
    await this.deps.pool.onIdle();
  }

  // ==========================================================================
  // Rows
  // ==========================================================================

  private async importEmployeeRow(row: CsvRow, batch: BatchState, today: string): Promise<RowOutcome> {
    const { storage } = this.deps;
    const email = normalizeEmail(row.data.email ?? "");

    const earlier = batch.emails.get(email);
    if (email && earlier !== undefined) {
      return duplicate("email", `Email ${email} was already imported from row ${earlier} of this file`);
    }

    const departmentName = row.data.department ?? "";
    const department = departmentName ? await storage.getDepartmentByName(departmentName) : undefined;

    const validateAndSave = async (locked: IStorage): Promise<SavedEmployeeOutcome> => {
      const emailOwner = email ? await locked.findEmployeeByEmail(email) : undefined;
      const result = validateEmployee(
        {
          name: row.data.name ?? "",
          email,
          // an unresolved name is reported back as the missing department
          departmentId: department?.id ?? departmentName,
          hireDate: row.data.hire_date ?? "",
          position: row.data.position,
        },
        {
          today,
          departmentIds: new Set(department ? [department.id] : []),
          emailOwner,
        },
      );
      if (!result.ok) return result;
      return { ok: true, saved: await locked.saveEmployee(result.value) };
    };

    const outcome = email ? await storage.withEmailLock(email, validateAndSave) : await validateAndSave(storage);
    if (!outcome.ok) return outcome;

    const { saved } = outcome;
    batch.emails.set(saved.email, row.rowNumber);

    const { searchIndex } = this.deps;
    if (searchIndex) {
      syncInBackground(
        searchIndex.upsertEmployeeDocument(toEmployeeDocument(saved, department?.name ?? null)),
        `upsert of ${saved.id}`,
      );
    }
    return { ok: true };
  }

  private async importTimeEntryRow(row: CsvRow, batch: BatchState, today: string): Promise<RowOutcome> {
    const { storage } = this.deps;
    const email = normalizeEmail(row.data.employee_email ?? "");
    const employee = email ? await storage.findEmployeeByEmail(email) : undefined;

    const candidate = {
      employeeId: employee?.id ?? (email || "(blank)"),
      date: row.data.date ?? "",
      hours: row.data.hours ?? "",
      description: row.data.description ?? "",
      billable: row.data.billable ?? "",
      matterCode: row.data.matter_code,
    };

    if (!employee) {
      const result = validateTimeEntry(candidate, { today, employee: undefined, sameDayEntries: [] });
      return result.ok ? { ok: true } : result;
    }

    const key = `${employee.id}|${candidate.date.trim()}|${candidate.description.trim()}`;
    const earlier = batch.entries.get(key);
    if (earlier !== undefined) {
      return duplicate("description", `Same employee, date and description were already imported from row ${earlier} of this file`);
    }

    // re-read, validate and write under the employee's lock so concurrent
    // jobs cannot both pass the daily cap check
    return await storage.withEmployeeLock<RowOutcome>(employee.id, async (locked) => {
      const date = candidate.date.trim();
      const sameDayEntries = isIsoDate(date) ? await locked.getTimeEntries(employee.id, date) : [];
      const result = validateTimeEntry(candidate, { today, employee, sameDayEntries });
      if (!result.ok) return result;

      await locked.saveTimeEntry(result.value);
      batch.entries.set(key, row.rowNumber);
      return { ok: true };
    });
  }

  private async notify(job: ImportJob, startedAt: number): Promise<void> {
    if (job.status !== "completed" && job.status !== "failed") return;
    try {
      await this.deps.notifier.notify({
        jobId: job.id,
        kind: job.kind,
        status: job.status,
        succeeded: job.succeeded,
        failed: job.failed,
        durationMs: Math.max(this.now() - startedAt, 0),
      });
    } catch (error) {
      log.error(`notification for job ${job.id} failed: ${describeError(error)}`, "imports");
    }
  }
}

function toRowError(row: CsvRow, violations: Violation[]): ImportRowError {
  return {
    rowNumber: row.rowNumber,
    rawData: { ...row.raw },
    errorMessage: violations.map((v) => v.message).join("; "),
    code: violations[0]?.code ?? "INVALID_ROW",
  };
}
