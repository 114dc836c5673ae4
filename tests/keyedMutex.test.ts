import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { KeyedMutex } from "../server/keyedMutex";

function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe("KeyedMutex", () => {
  it("runs holders of one key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];

    const holder = (name: string) =>
      mutex.runExclusive("emp-1", async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
        return name;
      });

    const results = await Promise.all([holder("a"), holder("b"), holder("c")]);

    assert.deepEqual(results, ["a", "b", "c"]);
    assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("does not make different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const events: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = mutex.runExclusive("emp-1", async () => {
      await gate;
      events.push("emp-1");
    });
    await mutex.runExclusive("emp-2", async () => {
      events.push("emp-2");
    });
    release();
    await slow;

    assert.deepEqual(events, ["emp-2", "emp-1"]);
  });

  it("releases the key when the holder throws and forgets idle keys", async () => {
    const mutex = new KeyedMutex();

    await assert.rejects(
      mutex.runExclusive("emp-1", async () => {
        throw new Error("write failed");
      }),
      /write failed/,
    );
    assert.equal(mutex.isLocked("emp-1"), false);
    assert.equal(await mutex.runExclusive("emp-1", async () => 42), 42);
    assert.equal(mutex.isLocked("emp-1"), false);
  });
});
