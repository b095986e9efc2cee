import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect } from "vitest";
import { createSite, registerExternal } from "../src/app/build.js";
import { parseSiteConfig } from "../src/config/index.js";
import { Manager, PluginLoadError } from "../src/lifecycle/index.js";
import { loadPluginFile, loadPlugins } from "../src/plugins/loader.js";
import { createItem } from "../src/types/item.js";
import sitemap, { buildSitemap } from "../plugins/sitemap.stagepress.js";


const FIXTURES = fileURLToPath(new URL("./fixtures/plugins/", import.meta.url));
const DUPLICATES = fileURLToPath(new URL("./fixtures/duplicate/", import.meta.url));


describe("插件加载", () => {
  it("加载 default 导出的插件", async () => {
    const plugin = await loadPluginFile(join(FIXTURES, "hello.stagepress.ts"));
    expect(plugin.name).toBe("hello");
    const m = new Manager().register(plugin);
    await m.runTo("discover");
    expect(m.items().map((i) => i.slug)).toEqual(["hello"]);
  });

  it("导出不是合法插件时抛出 PluginLoadError", async () => {
    const file = join(FIXTURES, "broken.stagepress.ts");
    await expect(loadPluginFile(file)).rejects.toBeInstanceOf(PluginLoadError);
    await expect(loadPluginFile(file)).rejects.toMatchObject({ file });
  });

  it("文件不存在时抛出 PluginLoadError", async () => {
    await expect(loadPluginFile(join(FIXTURES, "missing.stagepress.ts"))).rejects.toBeInstanceOf(PluginLoadError);
  });

  it("批量加载跳过无效文件与不存在的目录", async () => {
    const plugins = await loadPlugins([FIXTURES, join(FIXTURES, "does-not-exist")]);
    expect(plugins.map((p) => p.name)).toEqual(["hello"]);
  });
});


describe("外部插件注册", () => {
  it("与内置插件重名的外部插件被跳过，其余照常注册", async () => {
    const m = await createSite({ config: parseSiteConfig({}), pluginDirs: [DUPLICATES, FIXTURES] });
    const names = m.plugins().map((p) => p.name);
    expect(names.filter((n) => n === "glob")).toHaveLength(1);
    expect(names[names.length - 1]).toBe("hello");
    expect(m.plugins().find((p) => p.name === "glob")?.priority).toBeTypeOf("function");
  });

  it("registerExternal 不会因重名抛错", async () => {
    const m = new Manager().register({ name: "hello" });
    const external = await loadPlugins([FIXTURES]);
    expect(() => registerExternal(m, external)).not.toThrow();
    expect(m.plugins()).toHaveLength(1);
    await m.runTo("discover");
    expect(m.items()).toEqual([]);
  });
});


describe("sitemap 插件", () => {
  it("只列出可公开的条目", () => {
    const items = [
      createItem({ slug: "a", date: new Date("2024-01-02T00:00:00Z") }),
      createItem({ slug: "b", date: new Date("2024-01-01T00:00:00Z"), modified: new Date("2024-02-03T10:00:00Z") }),
      createItem({ slug: "c", draft: true }),
      createItem({ slug: "d" }),
      createItem({ slug: "e", skip: true }),
    ];
    expect(buildSitemap("https://example.com/", items)).toBe(`<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">
  <url>
    <loc>https://example.com/a/</loc>
    <lastmod>2024-01-02</lastmod>
  </url>
  <url>
    <loc>https://example.com/b/</loc>
    <lastmod>2024-02-03</lastmod>
  </url>
  <url>
    <loc>https://example.com/d/</loc>
  </url>
</urlset>
`);
  });

  it("在 write 阶段靠后执行", () => {
    expect(sitemap.name).toBe("sitemap");
    expect(sitemap.priority?.("write")).toBe(100);
  });
});
