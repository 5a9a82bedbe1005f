// item：标量字段 + 预先构建好的 enclosure / guid / source / category

import { formatRssDate, type BuildContext, type ScalarField } from "./context.js";
import type { CategoryElement, ItemElement, ItemFields, ListCategory, TextCategory } from "./types.js";
import { requireAny, requireFields } from "./validate.js";


export function categoryText(text: string): TextCategory {
  return { kind: "text", text };
}


export function categoryList<E>(categories: readonly CategoryElement<E>[]): ListCategory<E> {
  return { kind: "list", categories };
}


/**
 * 子元素顺序：category 列表（按调用方顺序）、enclosure、guid、source，
 * 之后是标量 title、link、description、author、category（文本形式）、comments、pubDate。
 */
export function genItem<E extends object>(ctx: BuildContext<E>, fields: ItemFields<E>): ItemElement<E> {
  requireAny({ title: fields.title, description: fields.description }, "Either title or description must be set.");
  const { category } = fields;
  if (category?.kind === "text") requireFields({ category: category.text });
  const pubDate = fields.pubDate != null ? formatRssDate("pubDate", fields.pubDate) : undefined;

  const scalars: ScalarField[] = [
    ["title", fields.title],
    ["link", fields.link],
    ["description", fields.description],
    ["author", fields.author],
    ["category", category?.kind === "text" ? category.text : undefined],
    ["comments", fields.comments],
    ["pubDate", pubDate],
  ];
  ctx.checkScalars(scalars);

  const listed = category?.kind === "list" ? category.categories : [];
  const adopted = ctx.claim([...listed, fields.enclosure, fields.guid, fields.source]);

  const item = ctx.backend.createElement("item");
  for (const child of adopted) ctx.backend.appendChild(item, child.node);
  ctx.appendScalars(item, scalars);
  return ctx.handle("item", item);
}
