// 各 builder 共用的校验谓词

import { ValidationError } from "./errors.js";


/** undefined、null 与空字符串都视为缺失 */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== "";
}


/** 按声明顺序检查，报出第一个缺失的字段名 */
export function requireFields(fields: Record<string, unknown>): void {
  for (const [name, value] of Object.entries(fields)) {
    if (!isPresent(value)) {
      throw new ValidationError(`Missing required field: ${name}`);
    }
  }
}


/** 至少一个字段不为 null/undefined；空字符串算作已设置 */
export function requireAny(fields: Record<string, unknown>, message: string): void {
  if (!Object.values(fields).some((value) => value != null)) {
    throw new ValidationError(message);
  }
}


export interface IntegerRange {
  min?: number;
  max?: number;
}


export function requireInteger(name: string, value: number, range: IntegerRange = {}): void {
  if (!Number.isSafeInteger(value)) {
    throw new ValidationError(`${name} must be an integer, got ${String(value)}`);
  }
  if (range.min !== undefined && value < range.min) {
    throw new ValidationError(`${name} must be at least ${range.min}, got ${value}`);
  }
  if (range.max !== undefined && value > range.max) {
    throw new ValidationError(`${name} must be at most ${range.max}, got ${value}`);
  }
}


// XML 1.0 Char 之外的字符（控制字符、孤立代理项、U+FFFE/U+FFFF）
const NON_XML_CHAR = /[^\t\n\r\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/u;


/** 文本与属性值必须能写成合法 XML，否则序列化结果无法被阅读器解析 */
export function requireXmlChars(name: string, value: string): void {
  const match = NON_XML_CHAR.exec(value);
  if (match == null) return;
  const code = (match[0].codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, "0");
  throw new ValidationError(`${name} contains a character not allowed in XML (U+${code})`);
}
