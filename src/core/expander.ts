/**
 * Skeletal Template Expander
 *
 * Rewrites one element tree in place against one Context:
 *
 * 1. Attribute pass - `<%= expr %>` markers in attribute values
 * 2. Child pass - control elements, inline code, script bodies, embedded
 *    tag translators, and recursion into every other element
 * 3. `onrender` - evaluated last, with `this` bound to the element
 *
 * Control elements are replaced by the nodes they produce, so once a tree
 * is expanded it contains no markers or control elements and expanding it
 * again changes nothing.
 */

import { parseDocument, parseMarkup } from '../dom/parser.js';
import { innerHTML } from '../dom/serialize.js';
import {
  appendChild,
  cloneNode,
  createComment,
  createDocument,
  createElement,
  createFragment,
  createTextNode,
  documentElement,
  isElement,
  isText,
  removeChildren,
  removeNode,
  replaceWith,
  stealChildren,
  stripOut
} from '../dom/tree.js';
import {
  CODE_NODE,
  DOCUMENT_NODE,
  ELEMENT_NODE,
  FRAGMENT_NODE,
  type AnyNode,
  type CodeNode,
  type DocumentNode,
  type ElementNode,
  type InsertableNode,
  type MarkupNode
} from '../dom/types.js';
import { ExprParser, type ExpressionEvaluator } from '../expr/ExprParser.js';
import type { Context } from './context.js';
import { EvaluationError, MalformedTemplateError } from './errors.js';
import { populate } from './forms.js';
import { NodeHandle } from './handle.js';
import type { TemplateLoader } from './loader.js';
import { asMarkupNode, entriesOf, toBoolean, toJson, toText } from './values.js';

/**
 * What a translator hands back for a custom raw tag.
 * `node: null` removes the tag. When `scanForTemplateContent` is not false,
 * a text result has its `<%= %>` markers replaced and any other result is
 * expanded like template markup.
 */
export interface EmbeddedTagResult {
  node: InsertableNode | null;
  scanForTemplateContent?: boolean;
}

/**
 * Called with the verbatim inner source of a custom tag and its attributes.
 */
export type EmbeddedTagTranslator = (
  content: string,
  attributes: ReadonlyMap<string, string>
) => EmbeddedTagResult | null;

export type EmbeddedTagTranslators =
  | Record<string, EmbeddedTagTranslator>
  | Map<string, EmbeddedTagTranslator>;

/** DOMPurify-compatible sanitizer */
export interface HtmlSanitizer {
  sanitize(html: string): string;
}

export interface ExpanderOptions {
  /** Resolves `render-template` files */
  loader: TemplateLoader;
  evaluator?: ExpressionEvaluator;
  /** Custom raw tags, keyed by tag name */
  translators?: EmbeddedTagTranslators;
  /** Applied to string results of `<%=HTML %>` before they are parsed */
  sanitizer?: HtmlSanitizer;
  /** Log expansion steps and mark partial boundaries with comments */
  debug?: boolean;
}

const MARKER_OPEN = '<%=';
const MARKER_CLOSE = '%>';
const ROOT_TAG = 'root';

export class TemplateExpander {
  readonly loader: TemplateLoader;
  readonly evaluator: ExpressionEvaluator;
  readonly translators: ReadonlyMap<string, EmbeddedTagTranslator>;
  readonly sanitizer: HtmlSanitizer | null;
  readonly debug: boolean;

  constructor(options: ExpanderOptions) {
    this.loader = options.loader;
    this.evaluator = options.evaluator ?? new ExprParser();
    this.sanitizer = options.sanitizer ?? null;
    this.debug = options.debug ?? false;

    const translators = new Map<string, EmbeddedTagTranslator>();
    const source: EmbeddedTagTranslators = options.translators ?? {};
    const entries = source instanceof Map ? source.entries() : Object.entries(source);
    for (const [name, translator] of entries) translators.set(name.toLowerCase(), translator);
    this.translators = translators;
  }

  /** Tag names the parser must read verbatim for this expander */
  get rawTagNames(): string[] {
    return Array.from(this.translators.keys());
  }

  /**
   * Parse template markup. With `wrap`, the markup is placed inside a
   * synthetic `<root>` element so a template may have several top-level
   * siblings.
   */
  parseTemplate(markup: string, wrap: boolean): DocumentNode {
    const options = { rawTagNames: this.rawTagNames };
    if (!wrap) return parseDocument(markup, options);

    const root = createElement(ROOT_TAG);
    for (const node of parseMarkup(markup, options)) appendChild(root, node);
    return createDocument([root]);
  }

  /**
   * Expand `root` in place against `context`.
   */
  expand(root: ElementNode, context: Context): void {
    for (const [name, value] of root.attributes) {
      if (name === 'onrender') continue;
      root.attributes.set(name, this.substituteMarkers(value, context, `attribute "${name}"`));
    }

    this.expandChildren(root, context);

    const onrender = root.attributes.get('onrender');
    if (onrender !== undefined) {
      const scope = context.child();
      scope.set('this', new NodeHandle(root));
      this.evaluator.evaluate(onrender, scope);
      root.attributes.delete('onrender');
    }
  }

  /**
   * Replace every `<%= expr %>` in `text`, left to right. `encode` turns
   * each result into text (plain text by default, JSON inside scripts).
   */
  substituteMarkers(
    text: string,
    context: Context,
    where: string,
    encode: (value: unknown) => string = toText
  ): string {
    let out = '';
    let pos = 0;
    while (true) {
      const start = text.indexOf(MARKER_OPEN, pos);
      if (start === -1) break;

      const end = text.indexOf(MARKER_CLOSE, start + MARKER_OPEN.length);
      if (end === -1) {
        throw new MalformedTemplateError(
          `unterminated "${MARKER_OPEN}" in ${where}`,
          `Every ${MARKER_OPEN} must be closed with ${MARKER_CLOSE}.`
        );
      }

      const code = text.slice(start + MARKER_OPEN.length, end);
      out += text.slice(pos, start) + encode(this.evaluator.evaluate(code, context));
      pos = end + MARKER_CLOSE.length;
    }
    return pos === 0 ? text : out + text.slice(pos);
  }

  private expandChildren(parent: ElementNode, context: Context): void {
    this.expandSiblings([...parent.childNodes], context);
  }

  /**
   * Child pass over a snapshot of siblings. The fold's accumulator is the
   * outcome of the latest if-true / for-each among these siblings, which
   * decides whether an or-else renders. It starts false for every sibling
   * list and is never shared with nested lists.
   */
  private expandSiblings(nodes: readonly MarkupNode[], context: Context): void {
    nodes.reduce<boolean>((priorOutcome, node) => this.expandNode(node, context, priorOutcome), false);
  }

  /** Expand one sibling and return the updated prior outcome */
  private expandNode(node: MarkupNode, context: Context, priorOutcome: boolean): boolean {
    if (node.nodeType === CODE_NODE) {
      this.expandCode(node, context);
      return priorOutcome;
    }
    if (node.nodeType !== ELEMENT_NODE) return priorOutcome;

    switch (node.tagName) {
      case 'if-true':
        return this.expandIfTrue(node, context);

      case 'or-else':
        if (priorOutcome) {
          removeNode(node);
        } else {
          this.expandChildren(node, context);
          stripOut(node);
        }
        return priorOutcome;

      case 'for-each':
        return this.expandForEach(node, context);

      case 'render-template':
        this.expandRenderTemplate(node, context);
        return priorOutcome;

      case 'hidden-form-data':
        this.expandHiddenFormData(node, context);
        return priorOutcome;

      case 'script':
        this.expandScript(node, context);
        return priorOutcome;
    }

    const translator = this.translators.get(node.tagName);
    if (translator) {
      this.expandTranslated(node, translator, context);
      return priorOutcome;
    }

    this.expand(node, context);
    return priorOutcome;
  }

  private expandIfTrue(element: ElementNode, context: Context): boolean {
    const cond = this.requireAttribute(element, 'cond');
    const outcome = toBoolean(this.evaluator.evaluate(cond, context));

    if (outcome) {
      this.expandChildren(element, context);
      stripOut(element);
    } else {
      removeNode(element);
    }
    return outcome;
  }

  private expandForEach(element: ElementNode, context: Context): boolean {
    const over = this.requireAttribute(element, 'over');
    const as = this.requireAttribute(element, 'as');
    const index = element.attributes.get('index');

    const entries = entriesOf(this.evaluator.evaluate(over, context), over);
    if (entries.length === 0) {
      removeNode(element);
      return false;
    }

    const fragment = createFragment();
    for (const [key, item] of entries) {
      const scope = context.child();
      scope.set(as, item);
      if (index) scope.set(index, key);

      const clone = cloneNode(element);
      this.expandChildren(clone, scope);
      stealChildren(fragment, clone);
    }

    if (this.debug) {
      console.log('[TemplateExpander] for-each:', over, '->', entries.length, 'items');
    }
    replaceWith(element, fragment);
    return true;
  }

  private expandRenderTemplate(element: ElementNode, context: Context): void {
    const file = this.requireAttribute(element, 'file');
    const doc = this.parseTemplate(this.loader.loadMarkup(file), true);
    const root = documentElement(doc) ?? createElement(ROOT_TAG);

    const scope = context.child();
    const data = element.attributes.get('data');
    if (data !== undefined) {
      scope.set('data', parseJsonAttribute(data, file));
    }

    this.expand(root, scope);

    const fragment = createFragment();
    if (this.debug) {
      console.log('[TemplateExpander] render-template:', file);
      fragment.childNodes.push(createComment(` ${file} `));
    }
    stealChildren(fragment, root);
    if (this.debug) fragment.childNodes.push(createComment(` end ${file} `));

    replaceWith(element, fragment);
  }

  private expandHiddenFormData(element: ElementNode, context: Context): void {
    const from = this.requireAttribute(element, 'from');
    const name = this.requireAttribute(element, 'name');

    const form = createElement('form');
    populate(form, this.evaluator.evaluate(from, context), name);

    const fragment = createFragment();
    stealChildren(fragment, form);
    replaceWith(element, fragment);
  }

  private expandCode(node: CodeNode, context: Context): void {
    const source = node.source;

    if (!source.startsWith('=')) {
      // Statement: side effects only
      this.evaluator.evaluate(source, context);
      removeNode(node);
      return;
    }

    if (/^=HTML\s/.test(source)) {
      const expression = source.slice('=HTML'.length);
      const value = this.evaluator.evaluate(expression, context);
      replaceWith(node, this.toInsertable(value, node, expression));
      return;
    }

    const value = this.evaluator.evaluate(source.slice(1), context);
    replaceWith(node, createTextNode(toText(value)));
  }

  /**
   * Nodes for an `<%=HTML %>` result: a node moves in, anything else is parsed
   * as markup. `<%` in inserted markup stays text, so data never becomes code.
   */
  private toInsertable(value: unknown, at: CodeNode, expression: string): InsertableNode {
    const node = asMarkupNode(value);
    if (!node) {
      let html = toText(value);
      if (this.sanitizer) html = this.sanitizer.sanitize(html);
      return createFragment(parseMarkup(html, { rawTagNames: this.rawTagNames, inlineCode: false }));
    }

    if (contains(node, at)) {
      throw new EvaluationError(expression, 'cannot insert a node into itself');
    }
    switch (node.nodeType) {
      case DOCUMENT_NODE: {
        const fragment = createFragment();
        stealChildren(fragment, node);
        return fragment;
      }
      case FRAGMENT_NODE:
        return node;
      default:
        return removeNode(node);
    }
  }

  /**
   * Markers inside a script body become JSON literals, so values land as
   * valid JavaScript. Scripts without markers are not touched.
   */
  private expandScript(element: ElementNode, context: Context): void {
    const source = innerHTML(element);
    if (!source.includes(MARKER_OPEN)) return;

    const code = this.substituteMarkers(source, context, '<script>', toJson);
    removeChildren(element);
    appendChild(element, createTextNode(code, true));
  }

  private expandTranslated(
    element: ElementNode,
    translator: EmbeddedTagTranslator,
    context: Context
  ): void {
    const result = translator(innerHTML(element), new Map(element.attributes));
    if (!result || !result.node) {
      removeNode(element);
      return;
    }

    const replacement = result.node;
    const inserted = replacement.nodeType === FRAGMENT_NODE ? [...replacement.childNodes] : [replacement];
    replaceWith(element, replacement);

    if (this.debug) {
      console.log('[TemplateExpander] translated:', element.tagName, '->', inserted.length, 'nodes');
    }
    if (result.scanForTemplateContent === false) return;

    for (const node of inserted) {
      if (isText(node)) {
        node.nodeValue = this.substituteMarkers(node.nodeValue, context, `<${element.tagName}>`);
      }
    }
    if (inserted.length === 1 && isElement(inserted[0])) {
      this.expand(inserted[0], context);
    } else {
      this.expandSiblings(inserted, context);
    }
  }

  private requireAttribute(element: ElementNode, name: string): string {
    const value = element.attributes.get(name);
    if (value === undefined) {
      throw new MalformedTemplateError(
        `<${element.tagName}> requires a "${name}" attribute`
      );
    }
    return value;
  }
}

function parseJsonAttribute(data: string, file: string): unknown {
  try {
    return JSON.parse(data);
  } catch (err) {
    throw new MalformedTemplateError(
      `render-template "${file}" has invalid JSON in its "data" attribute`,
      err instanceof Error ? err.message : undefined
    );
  }
}

function contains(ancestor: AnyNode, node: AnyNode): boolean {
  let current: AnyNode | null = node;
  while (current) {
    if (current === ancestor) return true;
    current = current.parentNode;
  }
  return false;
}
