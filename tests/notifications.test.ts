import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  CompositeNotificationHook,
  LogNotificationHook,
  WebhookNotificationHook,
  type ImportCompletedEvent,
  type NotificationHook,
} from "../server/services/imports/notifications";
import { RecordingHook } from "./fixtures";

const event: ImportCompletedEvent = {
  jobId: "job-1",
  kind: "time-entry-import",
  status: "completed",
  succeeded: 4,
  failed: 1,
  durationMs: 120,
};

describe("WebhookNotificationHook", () => {
  it("posts the event as JSON", async () => {
    const calls: Array<{ url: string; method?: string; body: unknown }> = [];
    const fakeFetch: typeof fetch = async (input, init) => {
      calls.push({ url: String(input), method: init?.method, body: init?.body });
      return new Response(null, { status: 204 });
    };

    await new WebhookNotificationHook("http://hooks.test/imports", fakeFetch).notify(event);

    assert.equal(calls.length, 1);
    assert.equal(calls[0].url, "http://hooks.test/imports");
    assert.equal(calls[0].method, "POST");
    const { body } = calls[0];
    assert.ok(typeof body === "string");
    assert.deepEqual(JSON.parse(body), event);
  });

  it("does not throw on a non-2xx answer", async () => {
    const fakeFetch: typeof fetch = async () => new Response("down", { status: 503 });
    await new WebhookNotificationHook("http://hooks.test/imports", fakeFetch).notify(event);
  });
});

describe("CompositeNotificationHook", () => {
  it("delivers to every hook even when one rejects", async () => {
    const first = new RecordingHook();
    const last = new RecordingHook();
    const broken: NotificationHook = {
      async notify(): Promise<void> {
        throw new Error("unreachable endpoint");
      },
    };

    await new CompositeNotificationHook([first, broken, new LogNotificationHook(), last]).notify(event);

    assert.deepEqual(first.events, [event]);
    assert.deepEqual(last.events, [event]);
  });
});
