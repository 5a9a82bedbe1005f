// 叶子元素：category / enclosure / guid / source / cloud / textInput / image

import type { BuildContext } from "./context.js";
import type {
  CategoryElement,
  CloudElement,
  EnclosureElement,
  GuidElement,
  ImageElement,
  SourceElement,
  TextInputElement,
} from "./types.js";
import { requireFields, requireInteger } from "./validate.js";


export const MAX_IMAGE_WIDTH = 144;
export const MAX_IMAGE_HEIGHT = 400;
/** 阅读器在 image 缺省 width/height 时采用的值；builder 不会主动输出 */
export const DEFAULT_IMAGE_WIDTH = 88;
export const DEFAULT_IMAGE_HEIGHT = 31;


/** domain 作为属性，category 文本作为元素内容 */
export function genCategory<E extends object>(ctx: BuildContext<E>, category: string, domain?: string | null): CategoryElement<E> {
  requireFields({ category });
  const node = ctx.backend.createElement("category", domain != null ? { domain } : {});
  ctx.backend.setText(node, category);
  return ctx.handle("category", node);
}


/** 只有属性没有文本；length 为字节数 */
export function genEnclosure<E extends object>(ctx: BuildContext<E>, url: string, length: number, type: string): EnclosureElement<E> {
  requireFields({ url, length, type });
  requireInteger("length", length, { min: 0 });
  const node = ctx.backend.createElement("enclosure", { url, length: String(length), type });
  return ctx.handle("enclosure", node);
}


export function genGuid<E extends object>(ctx: BuildContext<E>, guid: string, isPermaLink = true): GuidElement<E> {
  requireFields({ guid });
  const node = ctx.backend.createElement("guid", { isPermaLink: isPermaLink ? "true" : "false" });
  ctx.backend.setText(node, guid);
  return ctx.handle("guid", node);
}


export function genSource<E extends object>(ctx: BuildContext<E>, text: string, url: string): SourceElement<E> {
  requireFields({ text, url });
  const node = ctx.backend.createElement("source", { url });
  ctx.backend.setText(node, text);
  return ctx.handle("source", node);
}


export function genCloud<E extends object>(
  ctx: BuildContext<E>,
  domain: string,
  port: number,
  path: string,
  registerProcedure: string,
  protocol: string,
): CloudElement<E> {
  requireFields({ domain, port, path, registerProcedure, protocol });
  requireInteger("port", port, { min: 0, max: 65535 });
  const node = ctx.backend.createElement("cloud", {
    domain,
    port: String(port),
    path,
    registerProcedure,
    protocol,
  });
  return ctx.handle("cloud", node);
}


/** 四个子元素顺序固定：title、description、name、link */
export function genTextInput<E extends object>(
  ctx: BuildContext<E>,
  title: string,
  description: string,
  name: string,
  link: string,
): TextInputElement<E> {
  requireFields({ title, description, name, link });
  const node = ctx.backend.createElement("textInput");
  ctx.appendScalars(node, [
    ["title", title],
    ["description", description],
    ["name", name],
    ["link", link],
  ]);
  return ctx.handle("textInput", node);
}


function clampDimension<E extends object>(ctx: BuildContext<E>, name: string, value: number, max: number): number {
  requireInteger(name, value, { min: 1 });
  if (value <= max) return value;
  ctx.logger.debug("builder", "image dimension clamped", { field: name, requested: value, max });
  return max;
}


/**
 * 频道图片。width/height 超过上限（144 / 400）时静默截到上限而不是报错，
 * 调用方拿到的尺寸可能与传入值不同；未传入的尺寸不输出，由阅读器按 88 × 31 处理。
 */
export function genImage<E extends object>(
  ctx: BuildContext<E>,
  url: string,
  title: string,
  link: string,
  width?: number | null,
  height?: number | null,
): ImageElement<E> {
  requireFields({ url, title, link });
  const clampedWidth = width != null ? clampDimension(ctx, "width", width, MAX_IMAGE_WIDTH) : undefined;
  const clampedHeight = height != null ? clampDimension(ctx, "height", height, MAX_IMAGE_HEIGHT) : undefined;
  const node = ctx.backend.createElement("image");
  ctx.appendScalars(node, [
    ["url", url],
    ["title", title],
    ["link", link],
    ["width", clampedWidth?.toString()],
    ["height", clampedHeight?.toString()],
  ]);
  return ctx.handle("image", node);
}
