import { describe, it, expect } from "vitest";
import { SerialQueue } from "../serial-queue";
import { deferred } from "./helpers";

describe("SerialQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const gate = deferred();
    const log: string[] = [];

    const first = queue.run(async () => {
      log.push("first:start");
      await gate.promise;
      log.push("first:end");
      return 1;
    });
    const second = queue.run(() => {
      log.push("second");
      return 2;
    });
    expect(queue.size).toBe(2);

    await Promise.resolve();
    expect(log).toEqual(["first:start"]);
    gate.resolve();
    expect(await Promise.all([first, second])).toEqual([1, 2]);
    expect(log).toEqual(["first:start", "first:end", "second"]);
    expect(queue.size).toBe(0);
  });

  it("keeps going after a task fails", async () => {
    const queue = new SerialQueue();
    const failing = queue.run(() => {
      throw new Error("write failed");
    });
    const next = queue.run(() => "ok");
    await expect(failing).rejects.toThrow("write failed");
    expect(await next).toBe("ok");
    await expect(queue.idle()).resolves.toBeUndefined();
  });
});
