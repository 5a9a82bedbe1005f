// 树构建后端：builder 只依赖这组能力，不关心具体的树实现

/** 元素树的最小能力集：建元素、挂子节点、写文本、整树序列化 */
export interface TreeBackend<E extends object> {
  /** 创建元素；属性名按原样写入（RSS 的 registerProcedure、isPermaLink 等大小写不可改） */
  createElement(tag: string, attributes?: Record<string, string>): E;
  /** 将 child 挂到 parent 下，原地修改 parent */
  appendChild(parent: E, child: E): void;
  setText(element: E, text: string): void;
  /** 整棵树转为文本 */
  serialize(root: E): string;
}
