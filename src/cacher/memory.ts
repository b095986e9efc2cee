// 进程内缓存：键 → 任意载荷，无淘汰、无 TTL；新鲜度由调用方在载荷中存时间戳自行判断

/** get 的结果：found 区分「不存在」与「存了 undefined」 */
export type CacheLookup = { found: true; value: unknown } | { found: false; value: undefined };


export interface Cache {
  get(key: string): CacheLookup;
  set(key: string, value: unknown): void;
  has(key: string): boolean;
  delete(key: string): boolean;
  clear(): void;
  readonly size: number;
}


export class MemoryCache implements Cache {
  private readonly store = new Map<string, unknown>();

  get(key: string): CacheLookup {
    if (!this.store.has(key)) return { found: false, value: undefined };
    return { found: true, value: this.store.get(key) };
  }

  /** 同一键后写覆盖先写 */
  set(key: string, value: unknown): void {
    this.store.set(key, value);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}


/** 按类型守卫读取缓存值，类型不符视为未命中 */
export function readCache<T>(cache: Cache, key: string, guard: (value: unknown) => value is T): T | undefined {
  const hit = cache.get(key);
  if (!hit.found || !guard(hit.value)) return undefined;
  return hit.value;
}
