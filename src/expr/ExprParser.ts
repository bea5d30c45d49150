/**
 * Skeletal Expression Parser
 *
 * A recursive descent parser and tree-walking evaluator for the expressions
 * embedded in templates. It never uses `new Function()` or `eval()`.
 *
 * Supported:
 * - Literals: strings, numbers, booleans, null, undefined, NaN, Infinity
 * - Identifiers resolved through the Context chain, then safe globals
 * - Property access: dot notation and bracket notation
 * - Function and method calls
 * - Binary operators: + - * / % == === != !== < > <= >= && || ?? in
 * - Unary operators: ! - + typeof
 * - Ternary operator, array literals, object literals
 * - Assignment (`name = value`, `obj.key = value`)
 * - Statement lists separated by `;`
 *
 * @example
 * const parser = new ExprParser();
 * parser.evaluate('items.length > 0 ? "some" : "none"', context);
 */

import { isDangerousName, type Context } from '../core/context.js';
import { EvaluationError } from '../core/errors.js';
import { toBoolean } from '../core/values.js';
import type {
  BinaryOperator,
  ExprNode,
  IdentifierNode,
  MemberNode,
  ObjectProperty
} from './ast.js';

/**
 * Evaluator capability used by the expansion engine.
 */
export interface ExpressionEvaluator {
  evaluate(source: string, context: Context): unknown;
}

// Maximum nesting depth, keeps ((((...)))) from exhausting the stack
const MAX_RECURSION_DEPTH = 50;

// Property names that read as undefined and can never be written
const UNSAFE_PROPS: { [key: string]: number } = Object.assign(Object.create(null), {
  constructor: 1,
  prototype: 1,
  __defineGetter__: 1,
  __defineSetter__: 1,
  __lookupGetter__: 1,
  __lookupSetter__: 1,
  parentNode: 1,
  eval: 1,
  Function: 1,
  globalThis: 1,
  process: 1,
  require: 1,
  Reflect: 1,
  Proxy: 1
});
UNSAFE_PROPS['__proto__'] = 1;

// Methods that could rebind `this` or run code later
const UNSAFE_METHODS: { [key: string]: number } = Object.assign(Object.create(null), {
  call: 1,
  apply: 1,
  bind: 1,
  defineProperty: 1,
  defineProperties: 1,
  setPrototypeOf: 1,
  setTimeout: 1,
  setInterval: 1,
  setImmediate: 1
});

function isUnsafeProp(name: string): boolean {
  return UNSAFE_PROPS[name] === 1 || name.startsWith('__');
}

const SAFE_OBJECT = {
  keys: Object.keys,
  values: Object.values,
  entries: Object.entries,
  fromEntries: Object.fromEntries,
  hasOwn: Object.hasOwn,
  is: Object.is
};

// Safe globals accessible in expressions
const SAFE_GLOBALS = new Map<string, unknown>([
  ['Math', Math],
  ['Date', Date],
  ['Array', Array],
  ['Number', Number],
  ['String', String],
  ['Boolean', Boolean],
  ['JSON', JSON],
  ['Object', SAFE_OBJECT],
  ['parseInt', parseInt],
  ['parseFloat', parseFloat],
  ['isNaN', isNaN],
  ['isFinite', isFinite]
]);

const KEYWORD_LITERALS = new Map<string, unknown>([
  ['true', true],
  ['false', false],
  ['null', null],
  ['undefined', undefined],
  ['NaN', NaN],
  ['Infinity', Infinity]
]);

export class ExprParser implements ExpressionEvaluator {
  private pos = 0;
  private expr = '';
  private depth = 0;

  /**
   * Parse and evaluate `source` against `context`.
   * Syntax errors surface as EvaluationError; errors thrown by functions
   * the expression calls propagate unchanged.
   */
  evaluate(source: string, context: Context): unknown {
    let program: ExprNode;
    try {
      program = this.parse(source);
    } catch (err) {
      throw new EvaluationError(source, err instanceof Error ? err.message : String(err), { cause: err });
    }
    return new Evaluation(source, context).run(program);
  }

  /**
   * Parse a statement list into an AST.
   */
  parse(source: string): ExprNode {
    this.expr = source.trim();
    this.pos = 0;
    this.depth = 0;

    const body: ExprNode[] = [];
    while (true) {
      this.skipWhitespace();
      while (this.peek() === ';') {
        this.pos++;
        this.skipWhitespace();
      }
      if (this.pos >= this.expr.length) break;

      body.push(this.parseExpression());
      this.skipWhitespace();
      if (this.pos < this.expr.length && this.peek() !== ';') {
        throw new SyntaxError(`Unexpected token "${this.peek()}" at ${this.pos}`);
      }
    }

    if (body.length === 0) return { type: 'literal', value: undefined };
    return body.length === 1 ? body[0] : { type: 'sequence', body };
  }

  private parseExpression(): ExprNode {
    if (++this.depth > MAX_RECURSION_DEPTH) {
      throw new SyntaxError(`Expression exceeds maximum nesting depth (${MAX_RECURSION_DEPTH})`);
    }
    try {
      return this.parseAssignment();
    } finally {
      this.depth--;
    }
  }

  private parseAssignment(): ExprNode {
    const target = this.parseTernary();
    this.skipWhitespace();
    if (this.peek() === '=' && this.expr[this.pos + 1] !== '=') {
      if (target.type !== 'identifier' && target.type !== 'member') {
        throw new SyntaxError('Invalid assignment target');
      }
      this.pos++;
      return { type: 'assign', target, value: this.parseExpression() };
    }
    return target;
  }

  private parseTernary(): ExprNode {
    const condition = this.parseOr();
    this.skipWhitespace();
    if (this.peek() === '?' && this.expr[this.pos + 1] !== '?') {
      this.pos++;
      const consequent = this.parseExpression();
      this.skipWhitespace();
      if (this.peek() !== ':') throw new SyntaxError("Expected ':' in ternary");
      this.pos++;
      const alternate = this.parseExpression();
      return { type: 'ternary', condition, consequent, alternate };
    }
    return condition;
  }

  private parseOr(): ExprNode {
    let left = this.parseAnd();
    while (this.matchStr('||')) {
      left = { type: 'binary', op: '||', left, right: this.parseAnd() };
    }
    return left;
  }

  private parseAnd(): ExprNode {
    let left = this.parseNullishCoalescing();
    while (this.matchStr('&&')) {
      left = { type: 'binary', op: '&&', left, right: this.parseNullishCoalescing() };
    }
    return left;
  }

  private parseNullishCoalescing(): ExprNode {
    let left = this.parseEquality();
    while (this.matchStr('??')) {
      left = { type: 'binary', op: '??', left, right: this.parseEquality() };
    }
    return left;
  }

  private parseEquality(): ExprNode {
    let left = this.parseRelational();
    while (true) {
      const op = this.matchOperator(['===', '!==', '==', '!=']);
      if (!op) break;
      left = { type: 'binary', op, left, right: this.parseRelational() };
    }
    return left;
  }

  private parseRelational(): ExprNode {
    let left = this.parseAdditive();
    while (true) {
      if (this.matchKeyword('in')) {
        left = { type: 'binary', op: 'in', left, right: this.parseAdditive() };
        continue;
      }
      const op = this.matchOperator(['<=', '>=', '<', '>']);
      if (!op) break;
      left = { type: 'binary', op, left, right: this.parseAdditive() };
    }
    return left;
  }

  private parseAdditive(): ExprNode {
    let left = this.parseMultiplicative();
    while (true) {
      this.skipWhitespace();
      const c = this.peek();
      if ((c === '+' || c === '-') && this.expr[this.pos + 1] !== '=') {
        this.pos++;
        left = { type: 'binary', op: c, left, right: this.parseMultiplicative() };
      } else break;
    }
    return left;
  }

  private parseMultiplicative(): ExprNode {
    let left = this.parseUnary();
    while (true) {
      this.skipWhitespace();
      const c = this.peek();
      if (c === '*' || c === '/' || c === '%') {
        this.pos++;
        left = { type: 'binary', op: c, left, right: this.parseUnary() };
      } else break;
    }
    return left;
  }

  private parseUnary(): ExprNode {
    this.skipWhitespace();
    const c = this.peek();
    if (c === '!' && this.expr[this.pos + 1] !== '=') {
      this.pos++;
      return { type: 'unary', op: '!', arg: this.parseUnary() };
    }
    if ((c === '-' || c === '+') && !this.isDigit(this.expr[this.pos + 1])) {
      this.pos++;
      return { type: 'unary', op: c, arg: this.parseUnary() };
    }
    if (this.matchKeyword('typeof')) {
      return { type: 'unary', op: 'typeof', arg: this.parseUnary() };
    }
    return this.parsePostfix();
  }

  private parsePostfix(): ExprNode {
    let obj = this.parsePrimary();
    while (true) {
      this.skipWhitespace();
      const c = this.peek();
      if (c === '.') {
        this.pos++;
        this.skipWhitespace();
        const prop = this.parseIdentifier();
        if (!prop) throw new SyntaxError("Expected property name after '.'");
        obj = { type: 'member', object: obj, property: { type: 'literal', value: prop } };
      } else if (c === '[') {
        this.pos++;
        const property = this.parseExpression();
        this.expect(']');
        obj = { type: 'member', object: obj, property };
      } else if (c === '(') {
        this.pos++;
        obj = { type: 'call', callee: obj, arguments: this.parseList(')') };
      } else {
        break;
      }
    }
    return obj;
  }

  /** Comma separated expressions up to `close`, trailing comma allowed */
  private parseList(close: string): ExprNode[] {
    const items: ExprNode[] = [];
    this.skipWhitespace();
    while (this.peek() !== close) {
      items.push(this.parseExpression());
      this.skipWhitespace();
      if (this.peek() === ',') {
        this.pos++;
        this.skipWhitespace();
      } else break;
    }
    this.expect(close);
    return items;
  }

  private parsePrimary(): ExprNode {
    this.skipWhitespace();
    const c = this.peek();

    if (c === '(') {
      this.pos++;
      const expr = this.parseExpression();
      this.expect(')');
      return expr;
    }

    if (c === '[') {
      this.pos++;
      return { type: 'array', elements: this.parseList(']') };
    }

    if (c === '{') {
      this.pos++;
      const properties: ObjectProperty[] = [];
      this.skipWhitespace();
      while (this.peek() !== '}') {
        properties.push(this.parseObjectProperty());
        this.skipWhitespace();
        if (this.peek() === ',') {
          this.pos++;
          this.skipWhitespace();
        } else break;
      }
      this.expect('}');
      return { type: 'object', properties };
    }

    if (c === '"' || c === "'" || c === '`') {
      return { type: 'literal', value: this.parseString() };
    }

    if (this.isDigit(c) || (c === '-' && this.isDigit(this.expr[this.pos + 1]))) {
      return { type: 'literal', value: this.parseNumber() };
    }

    const id = this.parseIdentifier();
    if (id) {
      if (KEYWORD_LITERALS.has(id)) return { type: 'literal', value: KEYWORD_LITERALS.get(id) };
      return { type: 'identifier', name: id };
    }

    if (c === undefined) throw new SyntaxError('Unexpected end of expression');
    throw new SyntaxError(`Unexpected token "${c}" at ${this.pos}`);
  }

  private parseObjectProperty(): ObjectProperty {
    this.skipWhitespace();
    const c = this.peek();

    if (c === '[') {
      this.pos++;
      const key = this.parseExpression();
      this.expect(']');
      this.expect(':');
      return { key, value: this.parseExpression() };
    }

    let name: string | null;
    if (c === '"' || c === "'") {
      name = this.parseString();
    } else if (this.isDigit(c)) {
      name = String(this.parseNumber());
    } else {
      name = this.parseIdentifier();
    }
    if (name === null) throw new SyntaxError(`Unexpected token "${c}" in object literal`);

    this.skipWhitespace();
    if (this.peek() === ':') {
      this.pos++;
      return { key: { type: 'literal', value: name }, value: this.parseExpression() };
    }
    // Shorthand property
    return { key: { type: 'literal', value: name }, value: { type: 'identifier', name } };
  }

  private parseString(): string {
    const quote = this.peek();
    this.pos++;
    let value = '';
    while (this.pos < this.expr.length && this.peek() !== quote) {
      if (this.peek() === '\\') {
        this.pos++;
        const esc = this.peek();
        if (esc === 'n') value += '\n';
        else if (esc === 't') value += '\t';
        else if (esc === 'r') value += '\r';
        else value += esc ?? '';
        this.pos++;
      } else {
        value += this.peek();
        this.pos++;
      }
    }
    if (this.peek() !== quote) throw new SyntaxError('Unterminated string');
    this.pos++;
    return value;
  }

  private parseNumber(): number {
    const match = /^-?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(this.expr.slice(this.pos));
    if (!match) throw new SyntaxError(`Invalid number at ${this.pos}`);
    this.pos += match[0].length;
    return parseFloat(match[0]);
  }

  private parseIdentifier(): string | null {
    const start = this.pos;
    if (!this.isIdentStart(this.peek())) return null;
    while (this.isIdentPart(this.peek())) this.pos++;
    return this.expr.slice(start, this.pos);
  }

  private expect(ch: string): void {
    this.skipWhitespace();
    if (this.peek() !== ch) throw new SyntaxError(`Expected '${ch}' at ${this.pos}`);
    this.pos++;
  }

  private skipWhitespace(): void {
    while (this.pos < this.expr.length && /\s/.test(this.expr[this.pos])) this.pos++;
  }

  private peek(): string | undefined {
    return this.expr[this.pos];
  }

  private matchStr(s: string): boolean {
    this.skipWhitespace();
    if (this.expr.startsWith(s, this.pos)) {
      this.pos += s.length;
      return true;
    }
    return false;
  }

  /** Match the first operator in `ops` that is not the prefix of an assignment */
  private matchOperator<T extends BinaryOperator>(ops: T[]): T | null {
    this.skipWhitespace();
    for (const op of ops) {
      if (!this.expr.startsWith(op, this.pos)) continue;
      // `<` must not swallow `<=`
      if ((op === '<' || op === '>') && this.expr[this.pos + 1] === '=') continue;
      this.pos += op.length;
      return op;
    }
    return null;
  }

  /** Match a word operator only when it is not the start of a longer identifier */
  private matchKeyword(word: string): boolean {
    this.skipWhitespace();
    if (!this.expr.startsWith(word, this.pos)) return false;
    if (this.isIdentPart(this.expr[this.pos + word.length])) return false;
    this.pos += word.length;
    return true;
  }

  private isDigit(c: string | undefined): boolean {
    return c !== undefined && c >= '0' && c <= '9';
  }

  private isIdentStart(c: string | undefined): boolean {
    if (!c) return false;
    if ((c >= 'a' && c <= 'z') || (c >= 'A' && c <= 'Z') || c === '_' || c === '$') return true;
    return /[\p{ID_Start}]/u.test(c);
  }

  private isIdentPart(c: string | undefined): boolean {
    if (!c) return false;
    if (this.isIdentStart(c) || this.isDigit(c)) return true;
    return /[\p{ID_Continue}\u200c\u200d]/u.test(c);
  }
}

/**
 * One evaluation of a parsed program against a context.
 */
class Evaluation {
  constructor(
    private readonly source: string,
    private readonly context: Context
  ) {}

  run(node: ExprNode): unknown {
    return this.evaluate(node);
  }

  private fail(reason: string): never {
    throw new EvaluationError(this.source, reason);
  }

  private propertyKey(node: ExprNode): string {
    const key = this.evaluate(node);
    if (typeof key === 'symbol') return this.fail('symbol keys are not supported');
    return String(key);
  }

  private evaluate(node: ExprNode): unknown {
    switch (node.type) {
      case 'literal':
        return node.value;

      case 'identifier':
        return this.lookup(node.name);

      case 'member': {
        const obj = this.evaluate(node.object);
        if (obj === null || obj === undefined) return undefined;
        const key = this.propertyKey(node.property);
        if (isUnsafeProp(key)) {
          console.warn('Skeletal: Blocked access to unsafe property:', key);
          return undefined;
        }
        return Reflect.get(Object(obj), key);
      }

      case 'call':
        return this.call(node.callee, node.arguments);

      case 'assign':
        return this.assign(node.target, this.evaluate(node.value));

      case 'sequence': {
        let result: unknown;
        for (const statement of node.body) result = this.evaluate(statement);
        return result;
      }

      case 'binary':
        return this.binary(node.op, node.left, node.right);

      case 'unary': {
        const arg = this.evaluate(node.arg);
        switch (node.op) {
          case '!': return !toBoolean(arg);
          case '-': return -Number(arg);
          case '+': return Number(arg);
          case 'typeof': return typeof arg;
        }
        return undefined;
      }

      case 'ternary':
        return toBoolean(this.evaluate(node.condition))
          ? this.evaluate(node.consequent)
          : this.evaluate(node.alternate);

      case 'array':
        return node.elements.map(element => this.evaluate(element));

      case 'object': {
        const obj: Record<string, unknown> = {};
        for (const prop of node.properties) {
          const key = this.propertyKey(prop.key);
          if (isUnsafeProp(key)) {
            console.warn('Skeletal: Blocked unsafe object key in literal:', key);
            continue;
          }
          obj[key] = this.evaluate(prop.value);
        }
        return obj;
      }
    }
  }

  private lookup(name: string): unknown {
    // Caller bindings win; the blocked list guards the globals fallback
    if (this.context.has(name)) return this.context.get(name);
    if (isUnsafeProp(name)) {
      console.warn('Skeletal: Blocked access to unsafe property:', name);
      return undefined;
    }
    return SAFE_GLOBALS.get(name);
  }

  private call(calleeNode: ExprNode, argNodes: ExprNode[]): unknown {
    let callee: unknown;
    let thisArg: unknown;
    let label: string;

    if (calleeNode.type === 'member') {
      thisArg = this.evaluate(calleeNode.object);
      const key = this.propertyKey(calleeNode.property);
      label = key;
      if (thisArg === null || thisArg === undefined) {
        return this.fail(`cannot call "${key}" on ${String(thisArg)}`);
      }
      if (UNSAFE_METHODS[key] === 1 || isUnsafeProp(key)) {
        console.warn('Skeletal: Blocked call to unsafe method:', key);
        return undefined;
      }
      callee = Reflect.get(Object(thisArg), key);
    } else {
      label = calleeNode.type === 'identifier' ? calleeNode.name : 'expression';
      callee = this.evaluate(calleeNode);
      thisArg = undefined;
    }

    if (typeof callee !== 'function') {
      return this.fail(`"${label}" is not a function`);
    }
    const args = argNodes.map(arg => this.evaluate(arg));
    return Reflect.apply(callee, thisArg, args);
  }

  private assign(target: IdentifierNode | MemberNode, value: unknown): unknown {
    if (target.type === 'identifier') {
      if (isUnsafeProp(target.name) || isDangerousName(target.name)) {
        return this.fail(`cannot assign to "${target.name}"`);
      }
      // Always binds locally, never in a parent context
      this.context.set(target.name, value);
      return value;
    }

    const obj = this.evaluate(target.object);
    const key = this.propertyKey(target.property);
    if (obj === null || typeof obj !== 'object') {
      return this.fail(`cannot set "${key}" on ${obj === null ? 'null' : typeof obj}`);
    }
    if (isUnsafeProp(key)) {
      return this.fail(`cannot assign to "${key}"`);
    }
    if (obj instanceof Map) {
      obj.set(key, value);
    } else if (!Reflect.set(obj, key, value)) {
      return this.fail(`cannot set "${key}"`);
    }
    return value;
  }

  private binary(op: BinaryOperator, leftNode: ExprNode, rightNode: ExprNode): unknown {
    // Short-circuit operators evaluate the right side lazily
    if (op === '&&') {
      const l = this.evaluate(leftNode);
      return toBoolean(l) ? this.evaluate(rightNode) : l;
    }
    if (op === '||') {
      const l = this.evaluate(leftNode);
      return toBoolean(l) ? l : this.evaluate(rightNode);
    }
    if (op === '??') {
      const l = this.evaluate(leftNode);
      return l !== null && l !== undefined ? l : this.evaluate(rightNode);
    }

    const l = this.evaluate(leftNode);
    const r = this.evaluate(rightNode);
    switch (op) {
      case '+':
        if (typeof l === 'number' && typeof r === 'number') return l + r;
        if (isConcatOperand(l) || isConcatOperand(r)) return String(l) + String(r);
        return Number(l) + Number(r);
      case '-': return Number(l) - Number(r);
      case '*': return Number(l) * Number(r);
      case '/': return Number(l) / Number(r);
      case '%': return Number(l) % Number(r);
      case '===': return l === r;
      case '!==': return l !== r;
      case '==': return l == r; // eslint-disable-line eqeqeq
      case '!=': return l != r; // eslint-disable-line eqeqeq
      case '<': return compare(l, r) < 0;
      case '>': return compare(l, r) > 0;
      case '<=': return compare(l, r) <= 0;
      case '>=': return compare(l, r) >= 0;
      case 'in': {
        if (r === null || typeof r !== 'object') {
          return this.fail(`cannot use "in" on ${r === null ? 'null' : typeof r}`);
        }
        const key = String(l);
        if (isUnsafeProp(key)) {
          return this.fail(`cannot check unsafe property "${key}"`);
        }
        return r instanceof Map ? r.has(key) : key in r;
      }
    }
  }
}

function isConcatOperand(value: unknown): boolean {
  return typeof value === 'string' || (value !== null && typeof value === 'object');
}

/** Ordering used by < > <= >=: strings compare as strings, everything else as numbers */
function compare(l: unknown, r: unknown): number {
  if (typeof l === 'string' && typeof r === 'string') {
    return l < r ? -1 : l > r ? 1 : 0;
  }
  const a = Number(l);
  const b = Number(r);
  if (Number.isNaN(a) || Number.isNaN(b)) return NaN;
  return a - b;
}
