import { createRssBuilder } from "../src/builder/index.js";
import { silentLogger } from "../src/logger/index.js";
import { createMemoryBackend, type MemoryNode } from "../src/tree/index.js";


export function memoryBuilder() {
  return createRssBuilder({ backend: createMemoryBackend(), logger: silentLogger });
}


export function tagsOf(node: MemoryNode): string[] {
  return node.children.map((child) => child.tag);
}


export function textsOf(node: MemoryNode): Array<string | undefined> {
  return node.children.map((child) => child.text);
}


/** 把 DOM 元素转成与内存后端同形的节点，便于结构比较 */
export function toMemoryNode(element: Element): MemoryNode {
  const attributes: Record<string, string> = {};
  for (const attr of Array.from(element.attributes)) {
    attributes[attr.name] = attr.value;
  }
  const children = Array.from(element.children).map(toMemoryNode);
  const node: MemoryNode = { tag: element.tagName, attributes, children };
  if (children.length === 0 && element.textContent) node.text = element.textContent;
  return node;
}
