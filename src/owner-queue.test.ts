import { describe, expect, it } from "vitest";
import { OwnerQueue } from "./owner-queue.js";

const tick = () => new Promise((resolve) => setTimeout(resolve, 0));

describe("OwnerQueue", () => {
  it("runs one owner's tasks in order", async () => {
    const queue = new OwnerQueue();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run("s1", async () => {
      await gate;
      order.push("first");
    });
    const second = queue.run("s1", async () => {
      order.push("second");
    });
    const other = queue.run("s2", async () => {
      order.push("other");
    });

    await other;
    expect(order).toEqual(["other"]);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["other", "first", "second"]);
  });

  it("keeps going after a failed task and passes the failure to its caller", async () => {
    const queue = new OwnerQueue();
    const failed = queue.run("s1", async () => {
      throw new Error("boom");
    });
    const next = queue.run("s1", async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });

  it("drops an owner once nothing is pending", async () => {
    const queue = new OwnerQueue();
    const run = queue.run("s1", async () => 1);
    expect(queue.size).toBe(1);
    await run;
    await tick();
    expect(queue.size).toBe(0);
  });
});
