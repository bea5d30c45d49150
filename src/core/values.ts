/**
 * Skeletal Dynamic Values
 *
 * Expressions produce plain JavaScript values. These helpers define how a
 * value turns into text, a condition, a sequence of (key, item) pairs, or a
 * JSON literal for a script body.
 */

import { isMarkupNode } from '../dom/tree.js';
import { serialize } from '../dom/serialize.js';
import type { AnyNode } from '../dom/types.js';
import { EvaluationError } from './errors.js';

/** Brand for objects that wrap a markup node (see NodeHandle) */
export const NODE_WRAPPER = Symbol.for('skeletal.NodeWrapper');

export interface NodeWrapper {
  readonly [NODE_WRAPPER]: true;
  unwrap(): AnyNode;
}

export function isNodeWrapper(value: unknown): value is NodeWrapper {
  return value !== null &&
    typeof value === 'object' &&
    Reflect.get(value, NODE_WRAPPER) === true;
}

/** The markup node behind a value, if it is one or wraps one */
export function asMarkupNode(value: unknown): AnyNode | null {
  if (isNodeWrapper(value)) return value.unwrap();
  if (isMarkupNode(value)) return value;
  return null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object') return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Values that flatten into key/value pairs */
export function isObjectShaped(value: unknown): boolean {
  if (asMarkupNode(value)) return false;
  return Array.isArray(value) || value instanceof Map || isPlainObject(value);
}

export function toText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) return value.toISOString();

  const node = asMarkupNode(value);
  if (node) return serialize(node);

  if (typeof value === 'object') {
    return JSON.stringify(value, jsonReplacer) ?? '';
  }
  return String(value);
}

export function toBoolean(value: unknown): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (value instanceof Map || value instanceof Set) return value.size > 0;
  return Boolean(value);
}

/**
 * Ordered (key, item) pairs for for-each and form flattening.
 * Array and Set keys are indices.
 */
export function entriesOf(value: unknown, expression = ''): Array<[unknown, unknown]> {
  if (value === null || value === undefined) return [];
  if (Array.isArray(value)) return value.map((item, index) => [index, item]);
  if (value instanceof Map) return Array.from(value.entries());
  if (value instanceof Set) return Array.from(value, (item, index) => [index, item]);
  if (typeof value === 'object' && !asMarkupNode(value)) {
    return Object.keys(value).map(key => [key, Reflect.get(value, key)]);
  }
  throw new EvaluationError(expression || toText(value), `a ${typeof value} is not iterable`);
}

function jsonReplacer(this: unknown, _key: string, value: unknown): unknown {
  const node = asMarkupNode(value);
  if (node) return serialize(node);
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return Array.from(value);
  if (typeof value === 'bigint') return value.toString();
  return value;
}

const SCRIPT_UNSAFE: Record<string, string> = {
  '<': '\\u003c',
  '>': '\\u003e',
  '&': '\\u0026',
  '\u2028': '\\u2028',
  '\u2029': '\\u2029'
};

/**
 * JSON literal that can be placed inside a <script> body.
 * `undefined` and functions become `null`.
 */
export function toJson(value: unknown): string {
  const json = JSON.stringify(value, jsonReplacer) ?? 'null';
  return json.replace(/[<>&\u2028\u2029]/g, ch => SCRIPT_UNSAFE[ch]);
}
