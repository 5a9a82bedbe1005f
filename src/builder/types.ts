// RSS 元素句柄与 builder 输入结构

import type { RssLogger } from "../logger/index.js";
import type { TreeBackend } from "../tree/index.js";


/** 句柄种类即 RSS 标签名 */
export type RssElementKind =
  | "category"
  | "enclosure"
  | "guid"
  | "source"
  | "cloud"
  | "textInput"
  | "image"
  | "item"
  | "rss";


/** 构建完成的元素句柄：创建后不可变，被父元素挂载即转移所有权，不能再挂到第二个父元素下 */
export interface RssElement<K extends RssElementKind, E> {
  readonly kind: K;
  readonly node: E;
}

export type CategoryElement<E> = RssElement<"category", E>;
export type EnclosureElement<E> = RssElement<"enclosure", E>;
export type GuidElement<E> = RssElement<"guid", E>;
export type SourceElement<E> = RssElement<"source", E>;
export type CloudElement<E> = RssElement<"cloud", E>;
export type TextInputElement<E> = RssElement<"textInput", E>;
export type ImageElement<E> = RssElement<"image", E>;
export type ItemElement<E> = RssElement<"item", E>;
export type RssDocument<E> = RssElement<"rss", E>;

export type AnyRssElement<E> = RssElement<RssElementKind, E>;


/** 日期字段：字符串原样输出，Date 转为 RFC 822 */
export type RssDate = string | Date;


export interface TextCategory {
  kind: "text";
  text: string;
}

export interface ListCategory<E> {
  kind: "list";
  categories: readonly CategoryElement<E>[];
}

/** item 的 category：单个文本，或预先构建好的 category 元素列表 */
export type ItemCategory<E> = TextCategory | ListCategory<E>;


export interface ItemFields<E> {
  title?: string | null;
  link?: string | null;
  description?: string | null;
  author?: string | null;
  category?: ItemCategory<E> | null;
  comments?: string | null;
  enclosure?: EnclosureElement<E> | null;
  guid?: GuidElement<E> | null;
  pubDate?: RssDate | null;
  source?: SourceElement<E> | null;
}


export interface ChannelFields<E> {
  title: string;
  link: string;
  description: string;
  language?: string | null;
  copyright?: string | null;
  managingEditor?: string | null;
  webMaster?: string | null;
  pubDate?: RssDate | null;
  lastBuildDate?: RssDate | null;
  category?: string | null;
  generator?: string | null;
  docs?: string | null;
  cloud?: CloudElement<E> | null;
  /** 缓存分钟数 */
  ttl?: number | null;
  image?: ImageElement<E> | null;
  textInput?: TextInputElement<E> | null;
  skipHours?: string | null;
  skipDays?: string | null;
  items?: readonly ItemElement<E>[] | null;
}


export interface RssBuilderOptions<E extends object> {
  backend: TreeBackend<E>;
  /** 默认使用全局 logger */
  logger?: RssLogger;
}


/** 绑定了某个后端的全部 builder */
export interface RssBuilder<E extends object> {
  readonly backend: TreeBackend<E>;
  genCategory(category: string, domain?: string | null): CategoryElement<E>;
  genEnclosure(url: string, length: number, type: string): EnclosureElement<E>;
  genGuid(guid: string, isPermaLink?: boolean): GuidElement<E>;
  genSource(text: string, url: string): SourceElement<E>;
  genCloud(domain: string, port: number, path: string, registerProcedure: string, protocol: string): CloudElement<E>;
  genTextInput(title: string, description: string, name: string, link: string): TextInputElement<E>;
  genImage(url: string, title: string, link: string, width?: number | null, height?: number | null): ImageElement<E>;
  genItem(fields: ItemFields<E>): ItemElement<E>;
  genRss(fields: ChannelFields<E>): RssDocument<E>;
  serialize(element: AnyRssElement<E>): string;
}
