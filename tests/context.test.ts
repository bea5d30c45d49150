/**
 * Context and dynamic value tests
 */

import { describe, it, expect } from 'vitest';
import { Context } from '../src/core/context.js';
import { EvaluationError } from '../src/core/errors.js';
import { NodeHandle } from '../src/core/handle.js';
import { entriesOf, isObjectShaped, toBoolean, toJson, toText } from '../src/core/values.js';
import { createElement, createTextNode, appendChild } from '../src/dom/tree.js';

describe('Context', () => {
  it('should resolve names through the parent chain', () => {
    const parent = Context.from({ a: 1, b: 2 });
    const child = parent.child({ b: 3 });

    expect(child.get('a')).toBe(1);
    expect(child.get('b')).toBe(3);
    expect(child.has('a')).toBe(true);
    expect(child.hasOwn('a')).toBe(false);
    expect(child.get('missing')).toBeUndefined();
  });

  it('should write only to the local scope', () => {
    const parent = Context.from({ x: 1 });
    const child = parent.child();

    child.set('x', 2);

    expect(child.get('x')).toBe(2);
    expect(parent.get('x')).toBe(1);
    expect(child.toObject()).toEqual({ x: 2 });
  });

  it('should distinguish undefined bindings from missing ones', () => {
    const context = new Context().set('u', undefined);
    expect(context.has('u')).toBe(true);
    expect(context.delete('u')).toBe(true);
    expect(context.has('u')).toBe(false);
  });

  it('should refuse prototype-polluting names', () => {
    const context = new Context();
    expect(() => context.set('__proto__', {})).toThrow(TypeError);
    expect(() => context.set('constructor', 1)).toThrow(/blocked/);
    expect([...context.keys()]).toEqual([]);
  });
});

describe('toText', () => {
  it('should render scalars', () => {
    expect(toText('s')).toBe('s');
    expect(toText(null)).toBe('');
    expect(toText(undefined)).toBe('');
    expect(toText(3.5)).toBe('3.5');
    expect(toText(false)).toBe('false');
    expect(toText(10n)).toBe('10');
  });

  it('should render dates as ISO strings and objects as JSON', () => {
    expect(toText(new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00.000Z');
    expect(toText({ a: 1, b: [true] })).toBe('{"a":1,"b":[true]}');
  });

  it('should serialize markup nodes and node handles', () => {
    const b = createElement('b');
    appendChild(b, createTextNode('x'));
    expect(toText(b)).toBe('<b>x</b>');
    expect(toText(new NodeHandle(b))).toBe('<b>x</b>');
  });
});

describe('toBoolean', () => {
  it('should follow truthiness with empty collections false', () => {
    expect(toBoolean('')).toBe(false);
    expect(toBoolean('0')).toBe(true);
    expect(toBoolean(0)).toBe(false);
    expect(toBoolean([])).toBe(false);
    expect(toBoolean([0])).toBe(true);
    expect(toBoolean(new Map())).toBe(false);
    expect(toBoolean(new Set([1]))).toBe(true);
    expect(toBoolean({})).toBe(true);
  });
});

describe('entriesOf', () => {
  it('should pair arrays and sets with indices', () => {
    expect(entriesOf(['a', 'b'])).toEqual([[0, 'a'], [1, 'b']]);
    expect(entriesOf(new Set(['x']))).toEqual([[0, 'x']]);
  });

  it('should keep map and object key order', () => {
    expect(entriesOf(new Map<unknown, number>([[2, 1], ['k', 2]]))).toEqual([[2, 1], ['k', 2]]);
    expect(entriesOf({ z: 1, a: 2 })).toEqual([['z', 1], ['a', 2]]);
  });

  it('should yield nothing for null and undefined', () => {
    expect(entriesOf(null)).toEqual([]);
    expect(entriesOf(undefined)).toEqual([]);
  });

  it('should reject scalars', () => {
    expect(() => entriesOf(5, 'count')).toThrow(EvaluationError);
    expect(() => entriesOf('abc', 'name')).toThrow(/"name": a string is not iterable/);
  });
});

describe('isObjectShaped', () => {
  it('should accept plain objects, maps and arrays only', () => {
    expect(isObjectShaped({})).toBe(true);
    expect(isObjectShaped([])).toBe(true);
    expect(isObjectShaped(new Map())).toBe(true);
    expect(isObjectShaped('x')).toBe(false);
    expect(isObjectShaped(new Date())).toBe(false);
    expect(isObjectShaped(createElement('p'))).toBe(false);
  });
});

describe('toJson', () => {
  it('should escape characters that could end a script', () => {
    expect(toJson('a<b')).toBe('"a\\u003cb"');
    expect(toJson({ html: '</script>&' })).toBe('{"html":"\\u003c/script\\u003e\\u0026"}');
    expect(toJson('\u2028')).toBe('"\\u2028"');
  });

  it('should map undefined to null and collections to JSON shapes', () => {
    expect(toJson(undefined)).toBe('null');
    expect(toJson(new Map([['a', 1]]))).toBe('{"a":1}');
    expect(toJson(new Set([1, 2]))).toBe('[1,2]');
  });
});
