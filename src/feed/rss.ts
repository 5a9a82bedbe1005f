// 将频道 + 条目构建为 RSS 2.0 文档

import { categoryList, createRssBuilder, ValidationError } from "../builder/index.js";
import type { CategoryElement, ItemElement, RssBuilder, RssDocument } from "../builder/index.js";
import { logger as defaultLogger, type RssLogger } from "../logger/index.js";
import type { RssChannel, RssEntry } from "./types.js";


const XML_DECLARATION = `<?xml version="1.0" encoding="UTF-8"?>`;


export interface BuildRssOptions {
  logger?: RssLogger;
  /** 是否输出 XML 声明，默认 true */
  xmlDeclaration?: boolean;
}


/** ISO 字符串或 Date 转 RFC 822；无法解析时抛 ValidationError */
export function toRfc822(value: string | Date): string {
  const d = typeof value === "string" ? new Date(value) : value;
  if (Number.isNaN(d.getTime())) {
    throw new ValidationError(`Invalid date: ${String(value)}`);
  }
  return d.toUTCString();
}


function buildItem<E extends object>(builder: RssBuilder<E>, entry: RssEntry): ItemElement<E> {
  const categories: CategoryElement<E>[] = (entry.categories ?? []).map((c) =>
    typeof c === "string" ? builder.genCategory(c) : builder.genCategory(c.name, c.domain),
  );
  // 无 guid 时用 link 兜底，此时 link 即永久链接
  const guidValue = entry.guid ?? entry.link;
  const enclosure = entry.enclosure;
  return builder.genItem({
    title: entry.title,
    link: entry.link,
    description: entry.description,
    author: entry.author,
    category: categories.length > 0 ? categoryList(categories) : undefined,
    comments: entry.comments,
    enclosure: enclosure ? builder.genEnclosure(enclosure.url, enclosure.length, enclosure.type) : undefined,
    guid: guidValue ? builder.genGuid(guidValue, entry.guid ? (entry.isPermaLink ?? true) : true) : undefined,
    pubDate: entry.published != null ? toRfc822(entry.published) : undefined,
    source: entry.source ? builder.genSource(entry.source.title, entry.source.url) : undefined,
  });
}


/** 用给定 builder 组装 rss 根元素，后端由 builder 决定 */
export function buildRssDocument<E extends object>(builder: RssBuilder<E>, channel: RssChannel, entries: RssEntry[]): RssDocument<E> {
  const { cloud, image, textInput } = channel;
  return builder.genRss({
    title: channel.title,
    link: channel.link,
    description: channel.description,
    language: channel.language,
    copyright: channel.copyright,
    managingEditor: channel.managingEditor,
    webMaster: channel.webMaster,
    pubDate: channel.pubDate != null ? toRfc822(channel.pubDate) : undefined,
    lastBuildDate: channel.lastBuildDate != null ? toRfc822(channel.lastBuildDate) : undefined,
    category: channel.category,
    generator: channel.generator,
    docs: channel.docs,
    cloud: cloud
      ? builder.genCloud(cloud.domain, cloud.port, cloud.path, cloud.registerProcedure, cloud.protocol)
      : undefined,
    ttl: channel.ttl,
    image: image ? builder.genImage(image.url, image.title, image.link, image.width, image.height) : undefined,
    textInput: textInput
      ? builder.genTextInput(textInput.title, textInput.description, textInput.name, textInput.link)
      : undefined,
    skipHours: channel.skipHours,
    skipDays: channel.skipDays,
    items: entries.map((entry) => buildItem(builder, entry)),
  });
}


/** 经 jsdom 后端输出 RSS 2.0 XML 字符串 */
export function buildRssXml(channel: RssChannel, entries: RssEntry[], options: BuildRssOptions = {}): string {
  const builder = createRssBuilder({ logger: options.logger });
  const xml = builder.serialize(buildRssDocument(builder, channel, entries));
  (options.logger ?? defaultLogger).debug("feed", "rss xml serialized", { items: entries.length, length: xml.length });
  return options.xmlDeclaration === false ? xml : `${XML_DECLARATION}\n${xml}`;
}
