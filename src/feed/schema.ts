// 输入校验：zod schema 校验未知来源的数据，错误统一转为 ValidationError

import { z } from "zod";
import { ValidationError } from "../builder/index.js";
import type {
  RssCategory,
  RssChannel,
  RssCloud,
  RssEnclosure,
  RssEntry,
  RssImage,
  RssSourceRef,
  RssTextInput,
} from "./types.js";


const text = z.string().min(1);
const dateish = z.union([z.string().min(1), z.date()]);


export const rssImageSchema: z.ZodType<RssImage> = z.object({
  url: text,
  title: text,
  link: text,
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
});

export const rssCloudSchema: z.ZodType<RssCloud> = z.object({
  domain: text,
  port: z.number().int().min(0).max(65535),
  path: text,
  registerProcedure: text,
  protocol: text,
});

export const rssTextInputSchema: z.ZodType<RssTextInput> = z.object({
  title: text,
  description: text,
  name: text,
  link: text,
});

export const rssCategorySchema: z.ZodType<RssCategory> = z.union([
  text,
  z.object({ name: text, domain: z.string().optional() }),
]);

export const rssEnclosureSchema: z.ZodType<RssEnclosure> = z.object({
  url: text,
  length: z.number().int().nonnegative(),
  type: text,
});

export const rssSourceSchema: z.ZodType<RssSourceRef> = z.object({
  title: text,
  url: text,
});

export const rssChannelSchema: z.ZodType<RssChannel> = z.object({
  title: text,
  link: text,
  description: text,
  language: z.string().optional(),
  copyright: z.string().optional(),
  managingEditor: z.string().optional(),
  webMaster: z.string().optional(),
  pubDate: dateish.optional(),
  lastBuildDate: dateish.optional(),
  category: z.string().optional(),
  generator: z.string().optional(),
  docs: z.string().optional(),
  cloud: rssCloudSchema.optional(),
  ttl: z.number().int().nonnegative().optional(),
  image: rssImageSchema.optional(),
  textInput: rssTextInputSchema.optional(),
  skipHours: z.string().optional(),
  skipDays: z.string().optional(),
});

export const rssEntrySchema: z.ZodType<RssEntry> = z
  .object({
    title: z.string().optional(),
    link: z.string().optional(),
    description: z.string().optional(),
    author: z.string().optional(),
    categories: z.array(rssCategorySchema).optional(),
    comments: z.string().optional(),
    enclosure: rssEnclosureSchema.optional(),
    guid: text.optional(),
    isPermaLink: z.boolean().optional(),
    source: rssSourceSchema.optional(),
    published: dateish.optional(),
  })
  .refine((entry) => entry.title != null || entry.description != null, {
    message: "Either title or description must be set.",
  });


function parseWith<T>(schema: z.ZodType<T>, input: unknown, what: string): T {
  const result = schema.safeParse(input);
  if (result.success) return result.data;
  const issue = result.error.issues[0];
  const path = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new ValidationError(`Invalid ${what}${path}: ${issue?.message ?? "unknown error"}`, { cause: result.error });
}


export function parseRssChannel(input: unknown): RssChannel {
  return parseWith(rssChannelSchema, input, "channel");
}


export function parseRssEntry(input: unknown): RssEntry {
  return parseWith(rssEntrySchema, input, "entry");
}
