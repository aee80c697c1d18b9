import type { GenericValue } from '../value/GenericValue';
import { ObjectValue } from '../value/ObjectValue';
import { ArrayValue } from '../value/ArrayValue';
import { BoolValue, NumberValue, StringValue } from '../value/ScalarValues';

/**
 * Render a generic value tree with one value per line
 * 以每行一个值的形式渲染通用值树
 *
 * @example
 * ```typescript
 * formatValue(serialize(point));
 * // {
 * //   "x": 3
 * //   "y": 4
 * // }
 * ```
 */
export function formatValue(value: GenericValue, indent = '  '): string {
  return formatLines(value, indent).join('\n');
}

function formatLines(value: GenericValue, indent: string): string[] {
  if (value instanceof ObjectValue) {
    if (value.size === 0) return ['{}'];
    const lines = ['{'];
    for (const [key, item] of value.entries()) {
      appendNested(lines, `${formatKey(key)}: `, formatLines(item, indent), indent);
    }
    lines.push('}');
    return lines;
  }
  if (value instanceof ArrayValue) {
    if (value.length === 0) return ['[]'];
    const lines = ['['];
    for (const item of value.values()) {
      appendNested(lines, '', formatLines(item, indent), indent);
    }
    lines.push(']');
    return lines;
  }
  return [formatScalar(value)];
}

function appendNested(lines: string[], prefix: string, nested: string[], indent: string): void {
  lines.push(`${indent}${prefix}${nested[0]}`);
  for (let i = 1; i < nested.length; i++) {
    lines.push(`${indent}${nested[i]}`);
  }
}

function formatKey(key: GenericValue): string {
  if (key instanceof ObjectValue) return '<object>';
  if (key instanceof ArrayValue) return '<array>';
  return formatScalar(key);
}

/**
 * Single-line rendering of a scalar value
 * 标量值的单行表示
 */
export function formatScalar(value: GenericValue): string {
  if (value instanceof StringValue) return JSON.stringify(value.value);
  if (value instanceof NumberValue) {
    return typeof value.value === 'bigint' ? `${value.value}n` : String(value.value);
  }
  if (value instanceof BoolValue) return String(value.value);
  if (value.isContainer()) return `<${value.kind}>`;
  return 'none';
}
