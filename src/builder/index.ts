// RSS 2.0 元素 builder：叶子元素 → item → rss，自底向上组装

import { logger as defaultLogger, type RssLogger } from "../logger/index.js";
import { createDomBackend, type TreeBackend } from "../tree/index.js";
import { genRss } from "./channel.js";
import { createContext } from "./context.js";
import { genCategory, genCloud, genEnclosure, genGuid, genImage, genSource, genTextInput } from "./elements.js";
import { genItem } from "./item.js";
import type { RssBuilder, RssBuilderOptions } from "./types.js";

export { ValidationError } from "./errors.js";
export { categoryList, categoryText } from "./item.js";
export {
  DEFAULT_IMAGE_HEIGHT,
  DEFAULT_IMAGE_WIDTH,
  MAX_IMAGE_HEIGHT,
  MAX_IMAGE_WIDTH,
} from "./elements.js";
export { isPresent, requireAny, requireFields, requireInteger, requireXmlChars } from "./validate.js";
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
} from "./types.js";


function bindBackend<E extends object>(backend: TreeBackend<E>, logger: RssLogger): RssBuilder<E> {
  const ctx = createContext(backend, logger);
  return {
    backend,
    genCategory: (category, domain) => genCategory(ctx, category, domain),
    genEnclosure: (url, length, type) => genEnclosure(ctx, url, length, type),
    genGuid: (guid, isPermaLink) => genGuid(ctx, guid, isPermaLink),
    genSource: (text, url) => genSource(ctx, text, url),
    genCloud: (domain, port, path, registerProcedure, protocol) =>
      genCloud(ctx, domain, port, path, registerProcedure, protocol),
    genTextInput: (title, description, name, link) => genTextInput(ctx, title, description, name, link),
    genImage: (url, title, link, width, height) => genImage(ctx, url, title, link, width, height),
    genItem: (fields) => genItem(ctx, fields),
    genRss: (fields) => genRss(ctx, fields),
    serialize: (element) => backend.serialize(element.node),
  };
}


/** 未指定 backend 时使用 jsdom XML 后端 */
export function createRssBuilder<E extends object>(options: RssBuilderOptions<E>): RssBuilder<E>;
export function createRssBuilder(options?: { logger?: RssLogger }): RssBuilder<Element>;
export function createRssBuilder<E extends object>(
  options: { backend?: TreeBackend<E>; logger?: RssLogger } = {},
): RssBuilder<E> | RssBuilder<Element> {
  const logger = options.logger ?? defaultLogger;
  return options.backend ? bindBackend(options.backend, logger) : bindBackend(createDomBackend(), logger);
}
