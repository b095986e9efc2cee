import { access, mkdir, mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { runBuild } from "../src/app/build.js";
import { parseSiteConfig } from "../src/config/index.js";
import { outputPathFor } from "../src/writer/index.js";
import { MANIFEST_DIFF_KEY } from "../src/plugins/manifest.js";
import { aliasesOf, redirectPage } from "../src/plugins/redirects.js";
import { buildGraph } from "../src/plugins/graph.js";
import { createItem } from "../src/types/item.js";


const FILES: Record<string, string> = {
  "posts/hello.md": "---\ntitle: Hello\ndate: 2024-01-01\ntags: [intro]\naliases:\n  - old-hello\n---\nHello! See [[World]].\n",
  "world.md": "---\ntitle: World\ndate: 2024-02-01\n---\nThe world.\n",
  "draft.md": "---\ntitle: Draft\ndraft: true\ndate: 2024-03-01\n---\nWIP\n",
};


let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "stagepress-publish-"));
  for (const [path, raw] of Object.entries(FILES)) {
    const full = join(dir, "content", path);
    await mkdir(dirname(full), { recursive: true });
    await writeFile(full, raw, "utf-8");
  }
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});


function siteConfig() {
  return parseSiteConfig({
    title: "Site",
    url: "https://example.com/",
    contentDir: join(dir, "content"),
    outputDir: join(dir, "output"),
    dbFile: ":memory:",
    autoFeeds: { categories: false, archives: false },
    feeds: [{ slug: "blog", title: "Blog", formats: { atom: true, json: true } }],
  });
}


async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}


function output(rel: string): string {
  return join(dir, "output", rel);
}


describe("完整构建", () => {
  it("写出条目页面，草稿不输出", async () => {
    await runBuild({ config: siteConfig(), external: false });
    expect(await exists(output("posts/hello/index.html"))).toBe(true);
    expect(await exists(output("world/index.html"))).toBe(true);
    expect(await exists(output("draft/index.html"))).toBe(false);
    const html = await readFile(output("posts/hello/index.html"), "utf-8");
    expect(html).toContain("<title>Hello | Site</title>");
    expect(html).toContain("<a href=\"/world/\">World</a>");
    expect(html).toContain("<link rel=\"alternate\" type=\"application/rss+xml\" title=\"Blog\" href=\"/blog/rss.xml\">");
  });

  it("feed 输出全部格式，按日期降序且排除草稿", async () => {
    await runBuild({ config: siteConfig(), external: false });
    for (const file of ["blog/index.html", "blog/rss.xml", "blog/atom.xml", "blog/feed.json", "tags/intro/index.html", "tags/intro/rss.xml"]) {
      expect(await exists(output(file))).toBe(true);
    }
    const json = JSON.parse(await readFile(output("blog/feed.json"), "utf-8"));
    expect(json.feed_url).toBe("https://example.com/blog/feed.json");
    expect(json.items.map((i: { url: string }) => i.url)).toEqual(["https://example.com/world/", "https://example.com/posts/hello/"]);
    const rss = await readFile(output("blog/rss.xml"), "utf-8");
    expect(rss).toContain("<link>https://example.com/posts/hello/</link>");
    expect(rss).not.toContain("https://example.com/draft/");
  });

  it("别名写出跳转页", async () => {
    await runBuild({ config: siteConfig(), external: false });
    const page = await readFile(output("old-hello/index.html"), "utf-8");
    expect(page).toBe(redirectPage("https://example.com/posts/hello/"));
    expect(page).toContain("<meta http-equiv=\"refresh\" content=\"0; url=https://example.com/posts/hello/\">");
  });

  it("graph.json 记录站内链接", async () => {
    await runBuild({ config: siteConfig(), external: false });
    const graph = JSON.parse(await readFile(output("graph.json"), "utf-8"));
    expect(graph.edges).toEqual([{ source: "posts/hello", target: "world" }]);
    expect(graph.nodes.map((n: { slug: string }) => n.slug)).toEqual(["draft", "posts/hello", "world", "tags/intro"]);
  });

  it("manifest 报告新增条目", async () => {
    const m = await runBuild({ config: siteConfig(), external: false });
    expect(m.cache.get(MANIFEST_DIFF_KEY)).toEqual({
      found: true,
      value: { added: ["draft", "posts/hello", "world"], changed: [], unchanged: 0 },
    });
  });

  it("until 只运行到指定阶段", async () => {
    const m = await runBuild({ config: siteConfig(), external: false, until: "collect" });
    expect(m.feed("blog")?.items.map((i) => i.slug)).toEqual(["world", "posts/hello"]);
    expect(m.hasRun("render")).toBe(false);
    expect(await exists(output("graph.json"))).toBe(false);
  });
});


describe("写出辅助函数", () => {
  it("href 映射到输出文件", () => {
    expect(outputPathFor("/")).toBe("index.html");
    expect(outputPathFor("/a/b/")).toBe("a/b/index.html");
    expect(outputPathFor("/blog/rss.xml")).toBe("blog/rss.xml");
    expect(outputPathFor("/a")).toBe("a/index.html");
  });

  it("aliasesOf 规范化别名", () => {
    const item = createItem({ slug: "a", extra: { aliases: ["Old Post", 3, ""] } });
    expect(aliasesOf(item)).toEqual(["old-post"]);
    expect(aliasesOf(createItem({ slug: "b" }))).toEqual([]);
  });

  it("同一对条目之间的多条链接只计一条边", () => {
    const a = createItem({
      slug: "a",
      outlinks: [
        { sourceSlug: "a", targetSlug: "b", href: "/b/", internal: true },
        { sourceSlug: "a", targetSlug: "b", href: "/b/#x", internal: true },
        { sourceSlug: "a", href: "https://other.org/", internal: false },
      ],
    });
    const graph = buildGraph([a, createItem({ slug: "b" })]);
    expect(graph.edges).toEqual([{ source: "a", target: "b" }]);
    expect(graph.nodes).toHaveLength(2);
  });
});
