// 树后端：jsdom（默认，输出 XML）与内存对象（输出 JSON）

export { createDomBackend } from "./dom.js";
export { createMemoryBackend } from "./memory.js";
export type { MemoryNode } from "./memory.js";
export type { TreeBackend } from "./types.js";
