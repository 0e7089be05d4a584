import { describe, it, expect, vi } from "vitest";

import { singleFlight } from "../../../utils/singleFlight";

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe("utils/singleFlight", () => {
  it("should share one run between overlapping calls", async () => {
    const run = deferred<number>();
    const task = vi.fn(() => run.promise);
    const guarded = singleFlight(task);

    const first = guarded();
    const second = guarded();
    run.resolve(42);

    await expect(first).resolves.toBe(42);
    await expect(second).resolves.toBe(42);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("should start a new run once the previous one settled", async () => {
    let runs = 0;
    const task = vi.fn(async () => ++runs);
    const guarded = singleFlight(task);

    await expect(guarded()).resolves.toBe(1);
    await expect(guarded()).resolves.toBe(2);
    expect(task).toHaveBeenCalledTimes(2);
  });

  it("should hand the same rejection to every waiter and then allow a retry", async () => {
    const run = deferred<string>();
    const task = vi.fn(() => run.promise);
    const guarded = singleFlight(task);

    const first = guarded();
    const second = guarded();
    run.reject(new Error("upstream down"));

    await expect(first).rejects.toThrow("upstream down");
    await expect(second).rejects.toThrow("upstream down");

    task.mockResolvedValueOnce("recovered");
    await expect(guarded()).resolves.toBe("recovered");
    expect(task).toHaveBeenCalledTimes(2);
  });
});
