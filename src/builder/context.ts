// 构建上下文：后端、logger 与所有权登记，每个 builder 实例独享一份

import type { RssLogger } from "../logger/index.js";
import type { TreeBackend } from "../tree/index.js";
import { ValidationError } from "./errors.js";
import type { AnyRssElement, RssDate, RssElement, RssElementKind } from "./types.js";
import { requireXmlChars } from "./validate.js";


/** [标签, 值]；值为 null/undefined 时跳过 */
export type ScalarField = readonly [tag: string, value: string | null | undefined];


export interface BuildContext<E extends object> {
  readonly backend: TreeBackend<E>;
  readonly logger: RssLogger;
  handle<K extends RssElementKind>(kind: K, node: E): RssElement<K, E>;
  /** 登记一批即将挂载的句柄；任一已被挂载过（或本批重复）则整批拒绝，不做任何修改 */
  claim(children: readonly (AnyRssElement<E> | null | undefined)[]): AnyRssElement<E>[];
  appendText(parent: E, tag: string, text: string): E;
  /** 挂载前预检标量文本，避免登记句柄后才失败 */
  checkScalars(fields: readonly ScalarField[]): void;
  appendScalars(parent: E, fields: readonly ScalarField[]): void;
}


/** 已被挂载的节点；跨 builder 实例共享，同一后端上的多个 builder 也不能重复挂载 */
const owned = new WeakSet<object>();


/** 在写入后端前校验属性值与文本中的字符 */
function checkedBackend<E extends object>(backend: TreeBackend<E>): TreeBackend<E> {
  const tags = new WeakMap<E, string>();
  return {
    createElement(tag, attributes = {}) {
      for (const [name, value] of Object.entries(attributes)) requireXmlChars(name, value);
      const element = backend.createElement(tag, attributes);
      tags.set(element, tag);
      return element;
    },
    appendChild(parent, child) {
      backend.appendChild(parent, child);
    },
    setText(element, text) {
      requireXmlChars(tags.get(element) ?? "text", text);
      backend.setText(element, text);
    },
    serialize(root) {
      return backend.serialize(root);
    },
  };
}


export function createContext<E extends object>(raw: TreeBackend<E>, logger: RssLogger): BuildContext<E> {
  const backend = checkedBackend(raw);
  const checkScalars = (fields: readonly ScalarField[]): void => {
    for (const [tag, value] of fields) {
      if (value != null) requireXmlChars(tag, value);
    }
  };
  const appendText = (parent: E, tag: string, text: string): E => {
    const child = backend.createElement(tag);
    backend.setText(child, text);
    backend.appendChild(parent, child);
    return child;
  };
  return {
    backend,
    logger,
    handle<K extends RssElementKind>(kind: K, node: E): RssElement<K, E> {
      return Object.freeze({ kind, node });
    },
    claim(children) {
      const batch = new Set<E>();
      const present: AnyRssElement<E>[] = [];
      for (const child of children) {
        if (child == null) continue;
        if (owned.has(child.node) || batch.has(child.node)) {
          throw new ValidationError(`${child.kind} element already belongs to another parent.`);
        }
        batch.add(child.node);
        present.push(child);
      }
      for (const node of batch) owned.add(node);
      return present;
    },
    appendText,
    checkScalars,
    appendScalars(parent, fields) {
      for (const [tag, value] of fields) {
        if (value != null) appendText(parent, tag, value);
      }
    },
  };
}


/** Date 输出 RFC 822（toUTCString），字符串原样保留 */
export function formatRssDate(name: string, value: RssDate): string {
  if (typeof value === "string") return value;
  if (Number.isNaN(value.getTime())) {
    throw new ValidationError(`${name} is not a valid date`);
  }
  return value.toUTCString();
}
