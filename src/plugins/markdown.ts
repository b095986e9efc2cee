// markdown：render 阶段把正文渲染为 articleHtml，渲染器可替换

import type { RenderPlugin } from "../lifecycle/plugin.js";
import { basicMarkdownRenderer, type MarkdownRenderer } from "../render/markdown.js";


export function markdownPlugin(renderer: MarkdownRenderer = basicMarkdownRenderer): RenderPlugin {
  return {
    name: "markdown",
    render(m) {
      const targets = m.items().filter((item) => !item.skip);
      return m.runConcurrently(async (item) => {
        item.articleHtml = await renderer.render(item.content, item);
      }, targets);
    },
  };
}
