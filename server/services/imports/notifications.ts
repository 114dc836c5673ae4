import type { ImportJobStatus, ImportKind } from "@shared/schema";
import { describeError, log } from "../../logger";

export interface ImportCompletedEvent {
  jobId: string;
  kind: ImportKind;
  status: Extract<ImportJobStatus, "completed" | "failed">;
  succeeded: number;
  failed: number;
  durationMs: number;
}

/** Called once per job, after it reaches a terminal status. */
export interface NotificationHook {
  notify(event: ImportCompletedEvent): Promise<void>;
}

export class LogNotificationHook implements NotificationHook {
  async notify(event: ImportCompletedEvent): Promise<void> {
    log(
      `job ${event.jobId} (${event.kind}) ${event.status}: ${event.succeeded} succeeded, ${event.failed} failed in ${event.durationMs}ms`,
      "imports",
    );
  }
}

export class WebhookNotificationHook implements NotificationHook {
  constructor(
    private readonly url: string,
    private readonly fetchImpl: typeof fetch = fetch,
  ) {}

  async notify(event: ImportCompletedEvent): Promise<void> {
    const response = await this.fetchImpl(this.url, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(event),
    });
    if (!response.ok) {
      log.warn(`webhook for job ${event.jobId} answered ${response.status}`, "imports");
    }
  }
}

/** Runs every hook; one failing hook does not stop the others. */
export class CompositeNotificationHook implements NotificationHook {
  constructor(private readonly hooks: readonly NotificationHook[]) {}

  async notify(event: ImportCompletedEvent): Promise<void> {
    const results = await Promise.allSettled(this.hooks.map((hook) => hook.notify(event)));
    for (const result of results) {
      if (result.status === "rejected") {
        log.error(`notification hook failed for job ${event.jobId}: ${describeError(result.reason)}`, "imports");
      }
    }
  }
}
