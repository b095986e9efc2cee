// 内置插件：按注册顺序排列，阶段内的先后由优先级决定

import type { Plugin } from "../lifecycle/plugin.js";
import type { MarkdownRenderer } from "../render/markdown.js";
import type { TemplateRenderer } from "../render/template.js";
import { autoFeedsPlugin } from "./autoFeeds.js";
import { blogrollPlugin, type FeedFetcher } from "./blogroll.js";
import { descriptionPlugin } from "./description.js";
import { feedsPlugin } from "./feeds.js";
import { globPlugin } from "./glob.js";
import { graphPlugin } from "./graph.js";
import { layoutPlugin } from "./layout.js";
import { linkCollectorPlugin } from "./linkCollector.js";
import { loadPlugin } from "./load.js";
import { manifestPlugin, type ManifestOptions } from "./manifest.js";
import { markdownPlugin } from "./markdown.js";
import { publishFeedsPlugin } from "./publishFeeds.js";
import { publishHtmlPlugin } from "./publishHtml.js";
import { readingTimePlugin } from "./readingTime.js";
import { redirectsPlugin } from "./redirects.js";
import { seriesPlugin } from "./series.js";

export { loadPluginFile, loadPlugins } from "./loader.js";


export interface DefaultPluginOptions {
  markdown?: MarkdownRenderer;
  templates?: TemplateRenderer;
  fetcher?: FeedFetcher;
  manifest?: ManifestOptions;
}


export function defaultPlugins(options: DefaultPluginOptions = {}): Plugin[] {
  return [
    globPlugin(),
    loadPlugin(),
    autoFeedsPlugin(),
    seriesPlugin(),
    blogrollPlugin({ fetcher: options.fetcher, templates: options.templates }),
    feedsPlugin(),
    descriptionPlugin(),
    readingTimePlugin(),
    markdownPlugin(options.markdown),
    layoutPlugin(options.templates),
    linkCollectorPlugin(),
    publishHtmlPlugin(),
    publishFeedsPlugin(options.templates),
    redirectsPlugin(),
    graphPlugin(),
    manifestPlugin(options.manifest),
  ];
}
