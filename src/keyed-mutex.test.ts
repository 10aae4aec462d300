import { describe, it, expect } from "vitest";
import { KeyedMutex } from "./keyed-mutex.js";
import { createDeferred, type Deferred } from "./utils/deferred.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

/** Task that records its start and waits for the test to finish it. */
function gatedTask(name: string, started: string[]) {
  const gate: Deferred<void> = createDeferred<void>();
  const task = async () => {
    started.push(name);
    await gate.promise;
    return name;
  };
  return { task, gate };
}

describe("KeyedMutex.runExclusive", () => {
  it("runs tasks for one key one at a time in arrival order", async () => {
    const mutex = new KeyedMutex();
    const started: string[] = [];
    const [one, two, three] = ["one", "two", "three"].map((name) => gatedTask(name, started));

    const results = [one, two, three].map(({ task }) => mutex.runExclusive("k", task));
    await flush();
    expect(started).toEqual(["one"]);

    one.gate.resolve();
    await flush();
    expect(started).toEqual(["one", "two"]);

    two.gate.resolve();
    three.gate.resolve();
    await expect(Promise.all(results)).resolves.toEqual(["one", "two", "three"]);
    await expect(mutex.runExclusive("k", async () => "free")).resolves.toBe("free");
  });

  it("does not make different keys wait on each other", async () => {
    const mutex = new KeyedMutex();
    const started: string[] = [];
    const a = gatedTask("a", started);
    const b = gatedTask("b", started);

    const pending = [mutex.runExclusive("a", a.task), mutex.runExclusive("b", b.task)];
    await flush();
    expect(started).toEqual(["a", "b"]);

    a.gate.resolve();
    b.gate.resolve();
    await Promise.all(pending);
  });

  it("releases the key when a task fails", async () => {
    const mutex = new KeyedMutex();
    const failing = mutex.runExclusive("k", async () => {
      throw new Error("task failed");
    });
    const next = mutex.runExclusive("k", async () => "ran");

    await expect(failing).rejects.toThrow("task failed");
    await expect(next).resolves.toBe("ran");
  });
});

describe("KeyedMutex.runExclusiveAll", () => {
  it("holds every key while the task runs", async () => {
    const mutex = new KeyedMutex();
    const started: string[] = [];
    const all = gatedTask("all", started);
    const single = gatedTask("single", started);

    const whole = mutex.runExclusiveAll(["b", "a", "b"], all.task);
    await flush();
    const blocked = mutex.runExclusive("b", single.task);
    await flush();

    expect(started).toEqual(["all"]);

    all.gate.resolve();
    await expect(whole).resolves.toBe("all");
    await flush();
    expect(started).toEqual(["all", "single"]);
    single.gate.resolve();
    await blocked;
  });

  it("lets overlapping key sets complete in either order of arrival", async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];
    await Promise.all([
      mutex.runExclusiveAll(["x", "y"], async () => void order.push("first")),
      mutex.runExclusiveAll(["y", "x"], async () => void order.push("second")),
    ]);
    expect(order).toEqual(["first", "second"]);
  });
});
