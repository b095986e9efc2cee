// feed 输出结构：RSS 2.0 / Atom / JSON Feed 共用

export interface FeedChannel {
  title: string;
  /** 站点或 feed 页面地址 */
  link: string;
  /** feed 自身地址（Atom self 链接、JSON Feed feed_url） */
  feedUrl: string;
  description?: string;
  language?: string;
  author?: string;
  /** 最近更新时间，缺省取条目中最新的日期 */
  updated?: Date;
}

export interface FeedEntry {
  title: string;
  link: string;
  /** 摘要，可含 HTML */
  description: string;
  /** 正文 HTML */
  contentHtml?: string;
  guid?: string;
  published?: Date;
  updated?: Date;
  categories?: string[];
}
