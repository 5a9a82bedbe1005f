// 数据驱动的 RSS 输出：校验输入 → builder 组装 → 序列化

export { buildRssDocument, buildRssXml, toRfc822 } from "./rss.js";
export type { BuildRssOptions } from "./rss.js";
export {
  parseRssChannel,
  parseRssEntry,
  rssCategorySchema,
  rssChannelSchema,
  rssCloudSchema,
  rssEnclosureSchema,
  rssEntrySchema,
  rssImageSchema,
  rssSourceSchema,
  rssTextInputSchema,
} from "./schema.js";
export type {
  RssCategory,
  RssChannel,
  RssCloud,
  RssEnclosure,
  RssEntry,
  RssImage,
  RssSourceRef,
  RssTextInput,
} from "./types.js";
