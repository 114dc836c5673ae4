import express, { type Request, type Response, type NextFunction } from "express";
import { createServer } from "http";
import { config } from "./config";
import { describeError, log } from "./logger";
import { createDb, getPool } from "./db";
import { registerRoutes } from "./routes";
import { DatabaseStorage, type IStorage } from "./storage";
import { MemStorage } from "./memStorage";
import { createAggregationEngine } from "./services/people";
import { createDepartmentService } from "./services/departmentService";
import { createEmployeeService } from "./services/employeeService";
import { createTimeEntryService } from "./services/timeEntryService";
import { InMemorySearchIndex } from "./services/search";
import {
  CompositeNotificationHook,
  DatabaseImportJobStore,
  ImportPipeline,
  LogNotificationHook,
  MemoryImportJobStore,
  WebhookNotificationHook,
  WorkerPool,
  type ImportJobStore,
  type NotificationHook,
} from "./services/imports";

const app = express();
const httpServer = createServer(app);

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      log(`${req.method} ${path} ${res.statusCode} in ${duration}ms`);
    }
  });

  next();
});

const usesDatabase = config.storage === "database" || config.jobStore === "database";
const db = usesDatabase ? createDb() : null;

const storage: IStorage = db && config.storage === "database" ? new DatabaseStorage(db) : new MemStorage();
const jobs: ImportJobStore =
  db && config.jobStore === "database" ? new DatabaseImportJobStore(db) : new MemoryImportJobStore();

const hooks: NotificationHook[] = [new LogNotificationHook()];
if (config.importWebhookUrl) {
  hooks.push(new WebhookNotificationHook(config.importWebhookUrl));
}

const searchIndex = new InMemorySearchIndex();
const pool = new WorkerPool(config.importConcurrency);
const pipeline = new ImportPipeline({
  storage,
  jobs,
  pool,
  notifier: new CompositeNotificationHook(hooks),
  searchIndex,
});
const employees = createEmployeeService({ storage, searchIndex });

registerRoutes(httpServer, app, {
  pipeline,
  engine: createAggregationEngine(storage, { includeDeletedEmployees: config.summaryIncludeDeletedEmployees }),
  departments: createDepartmentService({ storage }),
  employees,
  timeEntries: createTimeEntryService({ storage }),
  importRateLimitPerMinute: config.importRateLimitPerMinute,
  backends: { storage: config.storage, jobStore: config.jobStore },
});

// body-parser errors (bad JSON, oversized upload) carry their own status
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const status =
    typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : 500;

  if (status >= 500) {
    log.error(`unhandled error: ${describeError(err)}`);
    res.status(500).json({ message: "Internal Server Error" });
    return;
  }
  res.status(status).json({ message: describeError(err) });
});

async function shutdown(signal: string) {
  log(`${signal} received, draining import jobs`);
  httpServer.close();
  await pipeline.whenIdle();
  if (db) await getPool().end();
  process.exit(0);
}

(async () => {
  await employees.rebuildIndex();

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port} (storage: ${config.storage}, jobs: ${config.jobStore})`);
  });

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        log.error(`shutdown failed: ${describeError(error)}`);
        process.exit(1);
      });
    });
  }
})().catch((error: unknown) => {
  log.error(`startup failed: ${describeError(error)}`);
  process.exit(1);
});
