// 内存后端：纯对象节点，序列化为 JSON，用于结构断言或交给非 XML 的下游

import type { TreeBackend } from "./types.js";


export interface MemoryNode {
  tag: string;
  attributes: Record<string, string>;
  children: MemoryNode[];
  text?: string;
}


export function createMemoryBackend(): TreeBackend<MemoryNode> {
  return {
    createElement(tag, attributes = {}) {
      return { tag, attributes: { ...attributes }, children: [] };
    },
    appendChild(parent, child) {
      parent.children.push(child);
    },
    setText(element, text) {
      element.text = text;
    },
    serialize(root) {
      return JSON.stringify(root);
    },
  };
}
