// RSS 2.0 输入结构：纯数据，可直接来自 JSON

export interface RssImage {
  url: string;
  title: string;
  link: string;
  width?: number;
  height?: number;
}

export interface RssCloud {
  domain: string;
  port: number;
  path: string;
  registerProcedure: string;
  protocol: string;
}

export interface RssTextInput {
  title: string;
  description: string;
  name: string;
  link: string;
}

/** 纯文本或带 domain 的分类 */
export type RssCategory = string | { name: string; domain?: string };

export interface RssEnclosure {
  url: string;
  /** 字节数 */
  length: number;
  type: string;
}

export interface RssSourceRef {
  title: string;
  url: string;
}

export interface RssChannel {
  title: string;
  link: string;
  description: string;
  language?: string;
  copyright?: string;
  managingEditor?: string;
  webMaster?: string;
  /** ISO 字符串或 Date，输出为 RFC 822 */
  pubDate?: string | Date;
  lastBuildDate?: string | Date;
  category?: string;
  generator?: string;
  docs?: string;
  cloud?: RssCloud;
  ttl?: number;
  image?: RssImage;
  textInput?: RssTextInput;
  skipHours?: string;
  skipDays?: string;
}

export interface RssEntry {
  title?: string;
  link?: string;
  description?: string;
  author?: string;
  categories?: RssCategory[];
  comments?: string;
  enclosure?: RssEnclosure;
  /** 缺省时回退为 link */
  guid?: string;
  /** 默认 true */
  isPermaLink?: boolean;
  source?: RssSourceRef;
  /** ISO 字符串或 Date，输出为 RFC 822 */
  published?: string | Date;
}
