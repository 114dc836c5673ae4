/**
 * Imports module: CSV intake, job tracking, background execution and
 * completion hooks.
 */

export { ImportPipeline, INFRASTRUCTURE_FAILURE_MESSAGE, type ImportPipelineDeps } from "./importPipeline";
export { parseImportCsv, REQUIRED_COLUMNS, OPTIONAL_COLUMNS, type CsvRow, type ParsedCsv } from "./csv";
export {
  MemoryImportJobStore,
  DatabaseImportJobStore,
  canTransition,
  type ImportJobStore,
  type CreateImportJobInput,
} from "./jobStore";
export { WorkerPool } from "./workerPool";
export {
  LogNotificationHook,
  WebhookNotificationHook,
  CompositeNotificationHook,
  type NotificationHook,
  type ImportCompletedEvent,
} from "./notifications";
export { csvTemplate } from "./templates";
