import { describe, it, expect } from "vitest";
import { ValidationError } from "../src/builder/index.js";
import { buildRssDocument, buildRssXml, parseRssChannel, parseRssEntry, toRfc822 } from "../src/feed/index.js";
import { silentLogger } from "../src/logger/index.js";
import { memoryBuilder, tagsOf } from "./helpers.js";


const channel = { title: "T", link: "L", description: "D" };


describe("feed", () => {
  it("buildRssXml 默认带 XML 声明", () => {
    expect(buildRssXml(channel, [], { logger: silentLogger })).toBe(
      `<?xml version="1.0" encoding="UTF-8"?>\n<rss version="2.0"><channel><title>T</title><link>L</link><description>D</description></channel></rss>`,
    );
  });

  it("xmlDeclaration=false 时不输出声明", () => {
    expect(buildRssXml(channel, [], { logger: silentLogger, xmlDeclaration: false })).toBe(
      `<rss version="2.0"><channel><title>T</title><link>L</link><description>D</description></channel></rss>`,
    );
  });

  it("无 guid 时用 link 作为永久链接", () => {
    const root = buildRssDocument(memoryBuilder(), channel, [{ title: "A", link: "https://example.com/a" }]).node;
    const item = root.children[0].children[3];
    expect(tagsOf(item)).toEqual(["guid", "title", "link"]);
    expect(item.children[0]).toEqual({
      tag: "guid",
      attributes: { isPermaLink: "true" },
      children: [],
      text: "https://example.com/a",
    });
  });

  it("显式 guid 使用 isPermaLink 配置", () => {
    const root = buildRssDocument(memoryBuilder(), channel, [
      { title: "A", link: "https://example.com/a", guid: "urn:a", isPermaLink: false },
    ]).node;
    const guid = root.children[0].children[3].children[0];
    expect(guid.attributes).toEqual({ isPermaLink: "false" });
    expect(guid.text).toBe("urn:a");
  });

  it("categories 转为 category 元素列表，保留 domain", () => {
    const root = buildRssDocument(memoryBuilder(), channel, [
      { title: "A", categories: ["a", { name: "b", domain: "https://example.com/tax" }] },
    ]).node;
    const item = root.children[0].children[3];
    expect(tagsOf(item)).toEqual(["category", "category", "title"]);
    expect(item.children[0].attributes).toEqual({});
    expect(item.children[1]).toEqual({
      tag: "category",
      attributes: { domain: "https://example.com/tax" },
      children: [],
      text: "b",
    });
  });

  it("ISO 日期转为 RFC 822", () => {
    const root = buildRssDocument(memoryBuilder(), { ...channel, pubDate: "2024-01-02T03:04:05Z" }, [
      { title: "A", published: "2024-01-02T03:04:05Z" },
    ]).node;
    const channelNode = root.children[0];
    expect(tagsOf(channelNode)).toEqual(["title", "link", "description", "pubDate", "item"]);
    expect(channelNode.children[3].text).toBe("Tue, 02 Jan 2024 03:04:05 GMT");
    expect(channelNode.children[4].children[1].text).toBe("Tue, 02 Jan 2024 03:04:05 GMT");
  });

  it("toRfc822 无法解析时报错", () => {
    expect(() => toRfc822("not a date")).toThrowError(ValidationError);
    expect(() => toRfc822("not a date")).toThrow("Invalid date: not a date");
  });
});


describe("feed input schemas", () => {
  it("合法输入原样通过", () => {
    const input = { title: "T", link: "L", description: "D", ttl: 15, image: { url: "u", title: "t", link: "l", width: 300 } };
    expect(parseRssChannel(input)).toEqual(input);
  });

  it("缺少 description 的频道报 ValidationError 并指明路径", () => {
    const parse = () => parseRssChannel({ title: "T", link: "L" });
    expect(parse).toThrowError(ValidationError);
    expect(parse).toThrow("Invalid channel at description: Required");
  });

  it("title 与 description 都缺失的条目报错", () => {
    expect(() => parseRssEntry({ link: "https://example.com/a" })).toThrow(
      "Invalid entry: Either title or description must be set.",
    );
  });

  it("空字符串 title 的条目可以通过", () => {
    expect(parseRssEntry({ title: "" })).toEqual({ title: "" });
  });

  it("enclosure length 为负数时报错", () => {
    const parse = () => parseRssEntry({ title: "A", enclosure: { url: "u", length: -1, type: "audio/mpeg" } });
    expect(parse).toThrow(/^Invalid entry at enclosure\.length: /);
  });

  it("ValidationError 保留 zod 原始错误", () => {
    try {
      parseRssChannel({});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err instanceof ValidationError && err.cause).toBeTruthy();
    }
  });
});
