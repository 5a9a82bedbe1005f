// rss-forge：校验并组装 RSS 2.0 元素树，序列化交给可替换的树后端

export {
  createRssBuilder,
  categoryList,
  categoryText,
  isPresent,
  requireAny,
  requireFields,
  requireInteger,
  requireXmlChars,
  ValidationError,
  DEFAULT_IMAGE_HEIGHT,
  DEFAULT_IMAGE_WIDTH,
  MAX_IMAGE_HEIGHT,
  MAX_IMAGE_WIDTH,
} from "./builder/index.js";
export type {
  AnyRssElement,
  CategoryElement,
  ChannelFields,
  CloudElement,
  EnclosureElement,
  GuidElement,
  ImageElement,
  ItemCategory,
  ItemElement,
  ItemFields,
  ListCategory,
  RssBuilder,
  RssBuilderOptions,
  RssDate,
  RssDocument,
  RssElement,
  RssElementKind,
  SourceElement,
  TextCategory,
  TextInputElement,
} from "./builder/index.js";
export * from "./feed/index.js";
export { createDomBackend, createMemoryBackend } from "./tree/index.js";
export type { MemoryNode, TreeBackend } from "./tree/index.js";
export { logger, silentLogger } from "./logger/index.js";
export type { LogCategory, LogEntry, LogLevel, RssLogger } from "./logger/index.js";
