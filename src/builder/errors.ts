// 校验错误：必填字段缺失、数值越界、句柄重复挂载时同步抛出，不返回半成品

export class ValidationError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}
