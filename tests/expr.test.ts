/**
 * Expression evaluator tests
 *
 * Covers the operator set, scoping of assignments and the blocked
 * property / method lists.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { Context } from '../src/core/context.js';
import { EvaluationError } from '../src/core/errors.js';
import { ExprParser } from '../src/expr/ExprParser.js';

describe('ExprParser', () => {
  let parser: ExprParser;
  let context: Context;

  beforeEach(() => {
    parser = new ExprParser();
    context = Context.from({
      user: { name: 'Ada', tags: ['a', 'b'] },
      n: 3,
      items: []
    });
  });

  function run(source: string): unknown {
    return parser.evaluate(source, context);
  }

  describe('Operators', () => {
    it('should respect precedence', () => {
      expect(run('1 + 2 * 3')).toBe(7);
      expect(run('(1 + 2) * 3')).toBe(9);
      expect(run('10 % 4 - -1')).toBe(3);
    });

    it('should concatenate when either side is a string', () => {
      expect(run('"a" + n')).toBe('a3');
      expect(run("'x' + 1 + 2")).toBe('x12');
    });

    it('should compare and test membership', () => {
      expect(run('n >= 3 && n < 4')).toBe(true);
      expect(run('"b" > "a"')).toBe(true);
      expect(run("'name' in user")).toBe(true);
      expect(run('n === 3 ? "three" : "other"')).toBe('three');
      expect(run('n != 3')).toBe(false);
    });

    it('should treat empty arrays as false', () => {
      expect(run('!items')).toBe(true);
      expect(run('items || "none"')).toBe('none');
    });

    it('should support ?? and typeof', () => {
      expect(run('missing ?? "d"')).toBe('d');
      expect(run('typeof n')).toBe('number');
    });
  });

  describe('Values', () => {
    it('should read members with dot and bracket notation', () => {
      expect(run('user.name')).toBe('Ada');
      expect(run("user['name']")).toBe('Ada');
      expect(run('user.tags[1]')).toBe('b');
      expect(run('user.tags.length')).toBe(2);
    });

    it('should yield undefined for unknown names and members of nothing', () => {
      expect(run('missing')).toBeUndefined();
      expect(run('missing.deep.er')).toBeUndefined();
    });

    it('should build array and object literals', () => {
      expect(run('[n, "x", true]')).toEqual([3, 'x', true]);
      expect(run('{ a: 1, "b": n, n }')).toEqual({ a: 1, b: 3, n: 3 });
    });

    it('should parse string escapes and numbers', () => {
      expect(run('"a\\"b\\n"')).toBe('a"b\n');
      expect(run('1.5e2')).toBe(150);
      expect(run('-2')).toBe(-2);
    });
  });

  describe('Calls', () => {
    it('should call methods with their receiver', () => {
      expect(run('user.name.toUpperCase()')).toBe('ADA');
      expect(run('user.tags.join("-")')).toBe('a-b');
    });

    it('should expose safe globals', () => {
      expect(run('Math.max(1, n)')).toBe(3);
      expect(run('JSON.stringify(user.tags)')).toBe('["a","b"]');
      expect(run('Object.keys(user)')).toEqual(['name', 'tags']);
    });

    it('should prefer context bindings over globals', () => {
      context.set('Math', { max: () => 'shadowed' });
      expect(run('Math.max(1, 2)')).toBe('shadowed');
    });

    it('should reject calling a non-function', () => {
      expect(() => run('n()')).toThrow(EvaluationError);
      expect(() => run('missing.fn()')).toThrow(/cannot call "fn" on undefined/);
    });

    it('should let host errors propagate unchanged', () => {
      context.set('boom', () => {
        throw new RangeError('host failure');
      });
      expect(() => run('boom()')).toThrow(RangeError);
    });
  });

  describe('Statements and assignment', () => {
    it('should return the last statement of a list', () => {
      expect(run('x = 5; x * 2')).toBe(10);
      expect(context.get('x')).toBe(5);
    });

    it('should bind in the evaluation context only', () => {
      const parent = Context.from({ x: 1 });
      const child = parent.child();

      parser.evaluate('x = 2', child);

      expect(child.get('x')).toBe(2);
      expect(parent.get('x')).toBe(1);
    });

    it('should assign to object members and maps', () => {
      const settings = new Map<string, unknown>();
      context.set('settings', settings);

      run('user.name = "Bob"; settings.theme = "dark"');

      expect(run('user.name')).toBe('Bob');
      expect(settings.get('theme')).toBe('dark');
    });

    it('should evaluate an empty program to undefined', () => {
      expect(run('  ')).toBeUndefined();
    });
  });

  describe('Syntax errors', () => {
    it('should wrap parse failures in EvaluationError', () => {
      expect(() => run('1 +')).toThrow(EvaluationError);
      expect(() => run('user.')).toThrow(EvaluationError);
      expect(() => run('"open')).toThrow(/Unterminated string/);
      expect(() => run('a b')).toThrow(/Unexpected token "b"/);
    });

    it('should carry the failing expression', () => {
      try {
        run('(1');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(EvaluationError);
        expect(err instanceof EvaluationError && err.expression).toBe('(1');
      }
    });

    it('should limit nesting depth', () => {
      const deep = '('.repeat(60) + '1' + ')'.repeat(60);
      expect(() => run(deep)).toThrow(/maximum nesting depth/);
    });
  });

  describe('Blocked names', () => {
    let warnSpy: MockInstance;

    beforeEach(() => {
      warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      warnSpy.mockRestore();
    });

    it('should read unsafe properties as undefined with a warning', () => {
      expect(run('user.constructor')).toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Skeletal: Blocked access to unsafe property:', 'constructor');
      expect(run('user["__proto__"]')).toBeUndefined();
    });

    it('should read caller bindings that share a blocked global name', () => {
      context.set('process', 'mine');
      expect(run('process')).toBe('mine');
      expect(warnSpy).not.toHaveBeenCalled();

      expect(run('Reflect')).toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Skeletal: Blocked access to unsafe property:', 'Reflect');
    });

    it('should refuse unsafe method calls', () => {
      context.set('fn', () => 'called');
      expect(run('fn.call(null)')).toBeUndefined();
      expect(warnSpy).toHaveBeenCalledWith('Skeletal: Blocked call to unsafe method:', 'call');
    });

    it('should throw when assigning to unsafe names', () => {
      expect(() => run('user.__proto__ = 1')).toThrow(EvaluationError);
      expect(() => run('constructor = 1')).toThrow(/cannot assign to "constructor"/);
    });

    it('should drop unsafe keys from object literals', () => {
      expect(run('{ __proto__: 1, ok: 2 }')).toEqual({ ok: 2 });
      expect(warnSpy).toHaveBeenCalledWith('Skeletal: Blocked unsafe object key in literal:', '__proto__');
    });
  });
});
