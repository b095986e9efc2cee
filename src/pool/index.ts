// 并发处理：有界工作池。runConcurrently 记录首个错误但让所有任务跑完；fanOut 收集每个任务的结果，从不整体失败

import { availableParallelism } from "node:os";
import { errorMessage, logger } from "../logger/index.js";


export interface PoolOptions {
  /** 同时执行的任务数上限，默认为主机可用并行度，最小 1 */
  concurrency?: number;
}


/** 规范并发数：非正数、NaN 回退为默认值，结果至少为 1 */
export function resolveConcurrency(concurrency?: number): number {
  if (concurrency === undefined || !Number.isFinite(concurrency) || concurrency < 1) {
    return Math.max(1, availableParallelism());
  }
  return Math.floor(concurrency);
}


/** 限流器：返回的函数包装异步任务，保证同时执行的任务不超过 concurrency 个 */
export function createLimiter(concurrency: number): <T>(task: () => Promise<T>) => Promise<T> {
  const limit = Math.max(1, Math.floor(concurrency));
  const pending: Array<() => void> = [];
  let running = 0;

  const drain = (): void => {
    while (running < limit && pending.length > 0) {
      const start = pending.shift();
      if (start) start();
    }
  };

  return <T>(task: () => Promise<T>): Promise<T> =>
    new Promise<T>((resolve, reject) => {
      pending.push(() => {
        running++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            running--;
            drain();
          });
      });
      drain();
    });
}


/**
 * 以有界并发对每个条目执行 fn，等待全部完成。
 * 出错不会中断其余任务；全部结束后以首个错误 reject。
 */
export async function runConcurrently<T>(
  items: readonly T[],
  fn: (item: T, index: number) => void | Promise<void>,
  options: PoolOptions = {},
): Promise<void> {
  if (items.length === 0) return;
  const limit = Math.min(resolveConcurrency(options.concurrency), items.length);
  let cursor = 0;
  let failed = 0;
  let first: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        await fn(items[index], index);
      } catch (err) {
        failed++;
        if (!first) first = { error: err };
      }
    }
  };

  await Promise.all(Array.from({ length: limit }, worker));
  if (first) {
    logger.debug("pool", "并发任务存在失败", { total: items.length, failed, err: errorMessage(first.error) });
    throw first.error;
  }
}


export interface FanOutResult<T> {
  /** 与输入顺序一一对应 */
  results: PromiseSettledResult<T>[];
  /** 按输入顺序最靠前的失败任务 */
  firstError?: { index: number; reason: unknown };
  failed: number;
}


/** 有界并发执行一组独立任务，收集全部结果（成功或失败），本身永不 reject */
export async function fanOut<T>(tasks: ReadonlyArray<() => Promise<T>>, options: PoolOptions = {}): Promise<FanOutResult<T>> {
  const limit = createLimiter(resolveConcurrency(options.concurrency));
  const results = await Promise.allSettled(tasks.map((task) => limit(task)));
  let firstError: FanOutResult<T>["firstError"];
  let failed = 0;
  results.forEach((r, index) => {
    if (r.status !== "rejected") return;
    failed++;
    if (!firstError) firstError = { index, reason: r.reason };
  });
  return { results, firstError, failed };
}


/** 为单个异步操作加超时；超时后 reject，原操作的结果被丢弃 */
export function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} 超时（${ms}ms）`)), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}
