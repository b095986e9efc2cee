import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { createLimiter, fanOut, resolveConcurrency, runConcurrently, withTimeout } from "../src/pool/index.js";


function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}


describe("runConcurrently", () => {
  it("任意并发数下结果与顺序执行一致", async () => {
    await fc.assert(
      fc.asyncProperty(fc.array(fc.integer({ min: -1000, max: 1000 }), { maxLength: 30 }), fc.integer({ min: 1, max: 10 }), async (values, concurrency) => {
        const parallel = values.map((v) => ({ v }));
        const sequential = values.map((v) => ({ v }));
        await runConcurrently(
          parallel,
          async (item, index) => {
            await Promise.resolve();
            item.v = item.v * 2 + index;
          },
          { concurrency },
        );
        sequential.forEach((item, index) => {
          item.v = item.v * 2 + index;
        });
        expect(parallel).toEqual(sequential);
      }),
      { numRuns: 50 },
    );
  });

  it("单个任务失败时其余任务仍全部完成，返回该错误", async () => {
    const done: number[] = [];
    const failure = new Error("task 3 failed");
    const run = runConcurrently(
      [1, 2, 3, 4, 5],
      async (n) => {
        await sleep(n === 3 ? 1 : 5);
        if (n === 3) throw failure;
        done.push(n);
      },
      { concurrency: 2 },
    );
    await expect(run).rejects.toBe(failure);
    expect(done.sort()).toEqual([1, 2, 4, 5]);
  });

  it("同时运行的任务不超过并发上限", async () => {
    let active = 0;
    let peak = 0;
    await runConcurrently(
      Array.from({ length: 8 }, (_, i) => i),
      async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(2);
        active--;
      },
      { concurrency: 3 },
    );
    expect(peak).toBe(3);
  });

  it("空列表直接完成", async () => {
    await expect(runConcurrently([], () => undefined)).resolves.toBeUndefined();
  });

  it("并发数规范化", () => {
    expect(resolveConcurrency(3.7)).toBe(3);
    expect(resolveConcurrency(0)).toBeGreaterThanOrEqual(1);
    expect(resolveConcurrency(Number.NaN)).toBeGreaterThanOrEqual(1);
    expect(resolveConcurrency()).toBeGreaterThanOrEqual(1);
  });
});


describe("fanOut", () => {
  it("5 个任务中第 3 个失败：全部完成，错误为第 3 个的错误，其余结果可逐个查看", async () => {
    const failure = new Error("fetch 3 failed");
    const tasks = [1, 2, 3, 4, 5].map((n) => async () => {
      await sleep(6 - n);
      if (n === 3) throw failure;
      return `result ${n}`;
    });
    const outcome = await fanOut(tasks, { concurrency: 2 });
    expect(outcome.failed).toBe(1);
    expect(outcome.firstError).toEqual({ index: 2, reason: failure });
    expect(outcome.results).toEqual([
      { status: "fulfilled", value: "result 1" },
      { status: "fulfilled", value: "result 2" },
      { status: "rejected", reason: failure },
      { status: "fulfilled", value: "result 4" },
      { status: "fulfilled", value: "result 5" },
    ]);
  });

  it("全部成功时没有 firstError", async () => {
    const outcome = await fanOut([async () => 1, async () => 2]);
    expect(outcome.firstError).toBeUndefined();
    expect(outcome.failed).toBe(0);
  });
});


describe("createLimiter / withTimeout", () => {
  it("限流器按提交顺序启动任务", async () => {
    const limit = createLimiter(1);
    const started: number[] = [];
    await Promise.all([1, 2, 3].map((n) => limit(async () => {
      started.push(n);
      await sleep(1);
    })));
    expect(started).toEqual([1, 2, 3]);
  });

  it("超时后 reject", async () => {
    await expect(withTimeout(sleep(50).then(() => "late"), 5, "slow")).rejects.toThrow("slow 超时（5ms）");
    await expect(withTimeout(Promise.resolve("fast"), 50, "fast")).resolves.toBe("fast");
  });
});
