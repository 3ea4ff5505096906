import { describe, it, expect } from "vitest";
import { settleWithConcurrency } from "./concurrency.js";

function deferred<T>() {
  let resolve!: (value: T) => void;
  let reject!: (reason: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("settleWithConcurrency", () => {
  it("places each outcome at its submission index regardless of completion order", async () => {
    const gates = [deferred<string>(), deferred<string>(), deferred<string>()];

    const run = settleWithConcurrency([0, 1, 2], 3, (i) => gates[i]!.promise);

    gates[2]!.resolve("c");
    gates[1]!.reject(new Error("b failed"));
    gates[0]!.resolve("a");

    const settled = await run;
    expect(settled[0]).toEqual({ status: "fulfilled", value: "a" });
    expect(settled[1]).toEqual({
      status: "rejected",
      reason: new Error("b failed"),
    });
    expect(settled[2]).toEqual({ status: "fulfilled", value: "c" });
  });

  it("never runs more than `limit` calls at once", async () => {
    let inFlight = 0;
    let peak = 0;

    await settleWithConcurrency([1, 2, 3, 4, 5], 2, async (n) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 1));
      inFlight--;
      return n;
    });

    expect(peak).toBe(2);
  });

  it("returns an empty array for no items", async () => {
    expect(await settleWithConcurrency([], 4, async () => 1)).toEqual([]);
  });

  it("rejects a non-positive limit", async () => {
    await expect(settleWithConcurrency([1], 0, async () => 1)).rejects.toThrow(
      RangeError,
    );
  });
});
