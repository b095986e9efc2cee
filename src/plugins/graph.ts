// graph：write 阶段输出 graph.json（全部条目为节点，站内链接为边）

import type { Plugin } from "../lifecycle/plugin.js";
import { PRIORITY } from "../lifecycle/stages.js";
import type { Item } from "../types/item.js";
import { writeOutputJson } from "../writer/index.js";


export interface GraphNode {
  slug: string;
  href: string;
  title: string;
  tags: string[];
  synthetic: boolean;
  skip: boolean;
}

export interface GraphEdge {
  source: string;
  target: string;
}

export interface LinkGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}


/** 同一对条目之间的多条链接只计一条边 */
export function buildGraph(items: readonly Item[]): LinkGraph {
  const nodes = items.map((item) => ({
    slug: item.slug,
    href: item.href,
    title: item.title ?? item.slug,
    tags: item.tags,
    synthetic: item.synthetic,
    skip: item.skip,
  }));
  const seen = new Set<string>();
  const edges: GraphEdge[] = [];
  for (const item of items) {
    for (const link of item.outlinks) {
      if (!link.internal || link.targetSlug === undefined) continue;
      const key = `${item.slug}\u0000${link.targetSlug}`;
      if (seen.has(key)) continue;
      seen.add(key);
      edges.push({ source: item.slug, target: link.targetSlug });
    }
  }
  return { nodes, edges };
}


export function graphPlugin(): Plugin {
  return {
    name: "graph",
    priority: (stage) => (stage === "write" ? PRIORITY.late : PRIORITY.default),
    async write(m) {
      await writeOutputJson(m.config.outputDir, "graph.json", buildGraph(m.items()));
    },
  };
}
