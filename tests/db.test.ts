import { afterEach, beforeEach, describe, it, expect } from "vitest";
import type Database from "better-sqlite3";
import { finishBuild, listBuilds, openDatabase, queryLogs, recordItems, startBuild } from "../src/db/index.js";
import { shouldLogToConsole, shouldLogToDb } from "../src/logger/config.js";
import { itemHash, itemRecords, recordBuild } from "../src/plugins/manifest.js";
import { createItem, createSyntheticItem } from "../src/types/item.js";


let db: Database.Database;

beforeEach(() => {
  db = openDatabase(":memory:");
});

afterEach(() => {
  db.close();
});


describe("构建记录", () => {
  it("startBuild / finishBuild 记录状态", () => {
    const id = startBuild(db, new Date("2024-01-01T00:00:00Z"));
    expect(listBuilds(db)[0]).toMatchObject({ id, status: "running", started_at: "2024-01-01T00:00:00.000Z", finished_at: null });
    finishBuild(db, id, { status: "failed", itemCount: 2, error: "boom" });
    expect(listBuilds(db)[0]).toMatchObject({ id, status: "failed", item_count: 2, error: "boom" });
  });

  it("listBuilds 新的在前", () => {
    const first = startBuild(db);
    const second = startBuild(db);
    expect(listBuilds(db).map((b) => b.id)).toEqual([second, first]);
    expect(listBuilds(db, 1)).toHaveLength(1);
  });
});


describe("条目哈希对比", () => {
  it("区分新增、变更与未变", () => {
    const first = recordItems(db, [
      { slug: "a", href: "/a/", hash: "1" },
      { slug: "b", href: "/b/", hash: "2" },
    ]);
    expect(first).toEqual({ added: ["a", "b"], changed: [], unchanged: 0 });

    const second = recordItems(db, [
      { slug: "a", href: "/a/", hash: "1" },
      { slug: "b", href: "/b/", hash: "3" },
      { slug: "c", href: "/c/", hash: "4" },
    ]);
    expect(second).toEqual({ added: ["c"], changed: ["b"], unchanged: 1 });
  });

  it("itemRecords 排除 skip 条目，哈希优先取 html", () => {
    const page = createItem({ slug: "a", content: "md", html: "<p>md</p>" });
    const raw = createItem({ slug: "b", content: "md" });
    const records = itemRecords([page, raw, createSyntheticItem({ slug: "tags/x" })]);
    expect(records.map((r) => r.slug)).toEqual(["a", "b"]);
    expect(itemHash(page)).not.toBe(itemHash(raw));
    expect(itemHash(raw)).toBe(itemHash(createItem({ slug: "other", content: "md" })));
  });

  it("recordBuild 登记一次成功的构建", () => {
    const diff = recordBuild(db, [createItem({ slug: "a", content: "x" })], new Date("2024-05-01T00:00:00Z"));
    expect(diff).toEqual({ added: ["a"], changed: [], unchanged: 0 });
    expect(listBuilds(db)[0]).toMatchObject({ status: "success", item_count: 1 });
  });
});


describe("日志", () => {
  it("queryLogs 按级别与分类过滤，新的在前", () => {
    const insert = db.prepare("INSERT INTO logs (level, category, message, payload, created_at) VALUES (?, ?, ?, ?, ?)");
    insert.run("warn", "blogroll", "first", null, "2024-01-01T00:00:00.000Z");
    insert.run("error", "lifecycle", "second", "{\"stage\":\"write\"}", "2024-01-01T00:00:01.000Z");
    insert.run("warn", "lifecycle", "third", null, "2024-01-01T00:00:02.000Z");

    expect(queryLogs(db).map((r) => r.message)).toEqual(["third", "second", "first"]);
    expect(queryLogs(db, { level: "warn" }).map((r) => r.message)).toEqual(["third", "first"]);
    expect(queryLogs(db, { category: "lifecycle", level: "error" })[0]).toMatchObject({ message: "second", payload: "{\"stage\":\"write\"}" });
    expect(queryLogs(db, { limit: 1 })).toHaveLength(1);
  });

  it("级别阈值", () => {
    expect(shouldLogToConsole("info", "debug")).toBe(false);
    expect(shouldLogToConsole("info", "warn")).toBe(true);
    expect(shouldLogToDb(false, "warn", "error")).toBe(false);
    expect(shouldLogToDb(true, "warn", "info")).toBe(false);
    expect(shouldLogToDb(true, "warn", "warn")).toBe(true);
  });
});
