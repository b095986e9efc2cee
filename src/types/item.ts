/**
 * 系统内部统一的内容条目（Item）定义
 * discover 阶段创建（源文件或合成条目），后续阶段原地修改，永不删除
 */

/** 条目之间的链接（outlinks / inlinks） */
export interface ItemLink {
  /** 发出链接的条目 slug */
  sourceSlug: string;
  /** 站内链接解析到的目标 slug；站外链接为空 */
  targetSlug?: string;
  /** 原始 href */
  href: string;
  /** 链接文本 */
  text?: string;
  /** 是否为站内链接 */
  internal: boolean;
}

export interface Item {
  /** 稳定标识 */
  slug: string;
  /** 输出路径，形如 /slug/ */
  href: string;
  /** 源文件路径（相对内容目录）；合成条目为空字符串 */
  path: string;
  title?: string;
  description?: string;
  /** 原始正文（markdown） */
  content: string;
  /** 正文渲染结果 */
  articleHtml: string;
  /** 套用布局后的完整页面 */
  html: string;
  tags: string[];
  category?: string;
  date?: Date;
  modified?: Date;
  published: boolean;
  draft: boolean;
  private: boolean;
  /** 不输出页面，但仍留在条目集合中供链接与别名解析 */
  skip: boolean;
  /** 由插件注册的合成条目（标签页、归档页、blogroll 等） */
  synthetic: boolean;
  /** 扩展字段，给插件留后门（aliases、自定义 frontmatter 等） */
  extra: Record<string, unknown>;
  prev?: Item;
  next?: Item;
  outlinks: ItemLink[];
  inlinks: ItemLink[];
}

/** 创建条目时可传入的字段，其余取默认值 */
export type ItemInit = Partial<Omit<Item, "slug">> & { slug: string };

/** 将任意文本转为 URL 友好的 slug（保留 / 以支持层级） */
export function slugify(input: string): string {
  return input
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .split("/")
    .map((part) =>
      part
        .replace(/[^\p{L}\p{N}\s_-]/gu, "")
        .trim()
        .replace(/[\s_]+/g, "-")
        .replace(/-+/g, "-")
        .replace(/^-|-$/g, ""),
    )
    .filter((part) => part.length > 0)
    .join("/");
}

/** slug → 输出路径 */
export function hrefFor(slug: string): string {
  return slug === "" ? "/" : `/${slug}/`;
}

export function createItem(init: ItemInit): Item {
  return {
    path: "",
    content: "",
    articleHtml: "",
    html: "",
    tags: [],
    published: true,
    draft: false,
    private: false,
    skip: false,
    synthetic: false,
    outlinks: [],
    inlinks: [],
    ...init,
    href: init.href ?? hrefFor(init.slug),
    extra: { ...(init.extra ?? {}) },
  };
}

/** 创建合成条目：skip 默认开启，由生成它的插件自行输出页面 */
export function createSyntheticItem(init: ItemInit): Item {
  return createItem({ skip: true, ...init, synthetic: true });
}

/** 条目是否可以对外发布（非草稿、已发布） */
export function isPublic(item: Item): boolean {
  return item.published && !item.draft && !item.private;
}
