// rss 根元素与唯一的 channel

import { formatRssDate, type BuildContext, type ScalarField } from "./context.js";
import type { ChannelFields, RssDocument } from "./types.js";
import { requireFields, requireInteger } from "./validate.js";


/**
 * channel 子元素顺序：cloud、textInput、image，必填 title、link、description，
 * 可选标量按 language … skipDays 的声明顺序，最后是 items。
 */
export function genRss<E extends object>(ctx: BuildContext<E>, fields: ChannelFields<E>): RssDocument<E> {
  const { title, link, description } = fields;
  requireFields({ title, link, description });
  if (fields.ttl != null) requireInteger("ttl", fields.ttl, { min: 0 });
  const pubDate = fields.pubDate != null ? formatRssDate("pubDate", fields.pubDate) : undefined;
  const lastBuildDate = fields.lastBuildDate != null ? formatRssDate("lastBuildDate", fields.lastBuildDate) : undefined;

  const scalars: ScalarField[] = [
    ["title", title],
    ["link", link],
    ["description", description],
    ["language", fields.language],
    ["copyright", fields.copyright],
    ["managingEditor", fields.managingEditor],
    ["webMaster", fields.webMaster],
    ["pubDate", pubDate],
    ["lastBuildDate", lastBuildDate],
    ["category", fields.category],
    ["generator", fields.generator],
    ["docs", fields.docs],
    ["ttl", fields.ttl?.toString()],
    ["skipHours", fields.skipHours],
    ["skipDays", fields.skipDays],
  ];
  ctx.checkScalars(scalars);

  const claimed = ctx.claim([fields.cloud, fields.textInput, fields.image, ...(fields.items ?? [])]);
  const complex = claimed.filter((child) => child.kind !== "item");
  const items = claimed.filter((child) => child.kind === "item");

  const { backend } = ctx;
  const rss = backend.createElement("rss", { version: "2.0" });
  const channel = backend.createElement("channel");
  backend.appendChild(rss, channel);

  for (const child of complex) backend.appendChild(channel, child.node);
  ctx.appendScalars(channel, scalars);
  for (const item of items) backend.appendChild(channel, item.node);

  ctx.logger.debug("builder", "rss document assembled", { title, items: items.length });
  return ctx.handle("rss", rss);
}
