// jsdom 后端：在独立的 XML Document 中建树，用 XMLSerializer 输出

import { JSDOM } from "jsdom";
import type { TreeBackend } from "./types.js";


/**
 * 每次调用创建一个新的 XML Document。
 * 非 HTML 文档下 createElement / setAttribute 保留大小写，且元素不带命名空间，输出无 xmlns。
 */
export function createDomBackend(): TreeBackend<Element> {
  const { window } = new JSDOM("");
  const doc = window.document.implementation.createDocument(null, null, null);
  const serializer: XMLSerializer = new window.XMLSerializer();
  return {
    createElement(tag, attributes = {}) {
      const element = doc.createElement(tag);
      for (const [name, value] of Object.entries(attributes)) {
        element.setAttribute(name, value);
      }
      return element;
    },
    appendChild(parent, child) {
      parent.appendChild(child);
    },
    setText(element, text) {
      element.textContent = text;
    },
    serialize(root) {
      return serializer.serializeToString(root);
    },
  };
}
