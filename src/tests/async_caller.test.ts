import { describe, expect, jest, test } from "@jest/globals";
import { AsyncCaller, raceWithSignal } from "../utils/async_caller.js";
import { EvaluationAbortedError } from "../utils/error.js";

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe("AsyncCaller", () => {
  test("concurrency 1 runs calls one at a time", async () => {
    const caller = new AsyncCaller({ maxConcurrency: 1 });
    let active = 0;
    let maxActive = 0;
    const work = async (value: number) => {
      active += 1;
      maxActive = Math.max(maxActive, active);
      await sleep(5);
      active -= 1;
      return value * 2;
    };

    const output = await Promise.all(
      [1, 2, 3].map((v) => caller.call(work, v))
    );

    expect(output).toEqual([2, 4, 6]);
    expect(maxActive).toBe(1);
  });

  test("passes rejections through", async () => {
    const caller = new AsyncCaller();
    const error = new TypeError("bad input");
    await expect(caller.call(() => Promise.reject(error))).rejects.toBe(error);
  });
});

describe("raceWithSignal", () => {
  test("returns the promise when there is no signal", async () => {
    await expect(raceWithSignal(Promise.resolve("done"))).resolves.toBe(
      "done"
    );
  });

  test("rejects immediately on an aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(
      raceWithSignal(Promise.resolve("done"), controller.signal)
    ).rejects.toBeInstanceOf(EvaluationAbortedError);
  });

  test("rejects when aborted while waiting", async () => {
    const controller = new AbortController();
    const pending = raceWithSignal(
      sleep(50).then(() => "late"),
      controller.signal
    );
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(EvaluationAbortedError);
  });

  test("adds one listener and removes it once settled", async () => {
    const controller = new AbortController();
    const add = jest.spyOn(controller.signal, "addEventListener");
    const remove = jest.spyOn(controller.signal, "removeEventListener");

    await expect(
      raceWithSignal(Promise.resolve(1), controller.signal)
    ).resolves.toBe(1);

    expect(add).toHaveBeenCalledTimes(1);
    expect(remove).toHaveBeenCalledTimes(1);
  });
});
