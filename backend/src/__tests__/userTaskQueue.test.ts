import { describe, expect, it } from "vitest";
import { UserTaskQueue } from "../userTaskQueue.js";

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("UserTaskQueue", () => {
  it("runs one user's tasks in submission order", async () => {
    const queue = new UserTaskQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run("u", async () => {
      await gate.promise;
      order.push("first");
      return 1;
    });
    const second = queue.run("u", async () => {
      order.push("second");
      return 2;
    });

    await flush();
    expect(order).toEqual([]);
    expect(queue.isBusy("u")).toBe(true);

    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(order).toEqual(["first", "second"]);
  });

  it("does not hold other users behind a slow task", async () => {
    const queue = new UserTaskQueue();
    const gate = deferred();
    const slow = queue.run("slow", () => gate.promise);

    await expect(queue.run("fast", async () => "done")).resolves.toBe("done");

    gate.resolve();
    await slow;
  });

  it("keeps going after a task fails", async () => {
    const queue = new UserTaskQueue();
    const failing = queue.run("u", async () => {
      throw new Error("boom");
    });
    const next = queue.run("u", async () => "after");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("after");
  });

  it("forgets idle users", async () => {
    const queue = new UserTaskQueue();
    await queue.run("u", async () => undefined);
    await flush();
    expect(queue.isBusy("u")).toBe(false);
  });
});
