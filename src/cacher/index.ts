// 缓存：进程内 MemoryCache + 文件 JSON 缓存（写入时附 cachedAt，读取时由调用方传 maxAgeMs 判断过期）

import { createHash } from "node:crypto";
import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { errorMessage, logger } from "../logger/index.js";

export { MemoryCache, readCache } from "./memory.js";
export type { Cache, CacheLookup } from "./memory.js";


/** 文件缓存中的包装结构 */
interface CacheEnvelope {
  cachedAt: string;
  data: unknown;
}


/** 读文件缓存时的选项 */
export interface ReadCacheOptions {
  /** 最大存活毫秒数，超时视为未命中；不传则永不过期 */
  maxAgeMs?: number;
  now?: Date;
}


/** 任意字符串 → sha256 缓存 key */
export function cacheKey(input: string): string {
  return createHash("sha256").update(input).digest("hex");
}


function cacheFile(cacheDir: string, namespace: string, key: string): string {
  return join(cacheDir, namespace, `${cacheKey(key)}.json`);
}


function isEnvelope(value: unknown): value is CacheEnvelope {
  return typeof value === "object" && value !== null && "cachedAt" in value && typeof value.cachedAt === "string" && "data" in value;
}


/** 读取文件缓存；不存在、损坏、过期或类型不符均返回 null */
export async function readCachedJson<T>(
  cacheDir: string,
  namespace: string,
  key: string,
  guard: (value: unknown) => value is T,
  options: ReadCacheOptions = {},
): Promise<T | null> {
  let raw: string;
  try {
    raw = await readFile(cacheFile(cacheDir, namespace, key), "utf-8");
  } catch {
    // 未缓存
    return null;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    logger.warn("cache", "缓存文件损坏，已忽略", { namespace, key, err: errorMessage(err) });
    return null;
  }
  if (!isEnvelope(parsed)) return null;
  if (options.maxAgeMs != null) {
    const cachedAt = new Date(parsed.cachedAt).getTime();
    const now = (options.now ?? new Date()).getTime();
    if (Number.isNaN(cachedAt) || now - cachedAt > options.maxAgeMs) return null;
  }
  return guard(parsed.data) ? parsed.data : null;
}


/** 写入文件缓存，附带写入时间 */
export async function writeCachedJson(cacheDir: string, namespace: string, key: string, data: unknown, now: Date = new Date()): Promise<void> {
  const file = cacheFile(cacheDir, namespace, key);
  await mkdir(join(cacheDir, namespace), { recursive: true });
  const envelope: CacheEnvelope = { cachedAt: now.toISOString(), data };
  await writeFile(file, JSON.stringify(envelope), "utf-8");
}


/** 删除某个命名空间下的全部文件缓存 */
export async function clearCachedNamespace(cacheDir: string, namespace: string): Promise<void> {
  await rm(join(cacheDir, namespace), { recursive: true, force: true });
}
