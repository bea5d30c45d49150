/**
 * Skeletal Selector Matching
 *
 * Supports: tag, *, #id, .class, [attr], [attr="value"] (and ~= |= ^= $= *=),
 * :root, :first-child, :last-child, :not(simple), descendant (space) and
 * child (>) combinators, and comma-separated lists.
 */

import { classList, elementChildren, isElement } from './tree.js';
import { DOCUMENT_NODE, type ElementNode, type ParentNode } from './types.js';

interface AttributeTest {
  name: string;
  op?: string;
  value?: string;
}

interface SimpleSelector {
  tag?: string;
  id?: string;
  classes: string[];
  attrs: AttributeTest[];
  pseudos: { name: string; arg?: string }[];
}

interface SelectorPart {
  selector: SimpleSelector;
  combinator?: ' ' | '>';
}

function parseSimpleSelector(selector: string): SimpleSelector {
  const parts: SimpleSelector = { classes: [], attrs: [], pseudos: [] };
  let pos = 0;

  while (pos < selector.length) {
    const rest = selector.slice(pos);

    if (pos === 0) {
      const tag = /^([a-zA-Z][\w-]*|\*)/.exec(rest);
      if (tag) {
        parts.tag = tag[1].toLowerCase();
        pos += tag[0].length;
        continue;
      }
    }

    const id = /^#([\w-]+)/.exec(rest);
    if (id) {
      parts.id = id[1];
      pos += id[0].length;
      continue;
    }

    const cls = /^\.([\w-]+)/.exec(rest);
    if (cls) {
      parts.classes.push(cls[1]);
      pos += cls[0].length;
      continue;
    }

    const attr = /^\[\s*([\w:-]+)\s*(?:([~|^$*]?=)\s*(?:"([^"]*)"|'([^']*)'|([^\]\s]+)))?\s*\]/.exec(rest);
    if (attr) {
      parts.attrs.push({
        name: attr[1].toLowerCase(),
        op: attr[2],
        value: attr[3] ?? attr[4] ?? attr[5]
      });
      pos += attr[0].length;
      continue;
    }

    const pseudo = /^:([\w-]+)(?:\(([^)]*)\))?/.exec(rest);
    if (pseudo) {
      parts.pseudos.push({ name: pseudo[1], arg: pseudo[2] });
      pos += pseudo[0].length;
      continue;
    }

    throw new SyntaxError(`Skeletal: Unsupported selector "${selector}"`);
  }

  return parts;
}

function parseSelector(selector: string): SelectorPart[] {
  const parts: SelectorPart[] = [];
  let pendingChild = false;

  const tokens = selector.replace(/\s*>\s*/g, ' > ').trim().split(/\s+/);
  for (const token of tokens) {
    if (token === '>') {
      pendingChild = true;
      continue;
    }
    parts.push({
      selector: parseSimpleSelector(token),
      combinator: parts.length === 0 ? undefined : pendingChild ? '>' : ' '
    });
    pendingChild = false;
  }

  return parts;
}

function matchesAttribute(element: ElementNode, test: AttributeTest): boolean {
  const actual = element.attributes.get(test.name);
  if (actual === undefined) return false;
  if (!test.op || test.value === undefined) return true;

  const expected = test.value;
  switch (test.op) {
    case '=': return actual === expected;
    case '~=': return actual.split(/\s+/).includes(expected);
    case '|=': return actual === expected || actual.startsWith(expected + '-');
    case '^=': return actual.startsWith(expected);
    case '$=': return actual.endsWith(expected);
    case '*=': return actual.includes(expected);
    default: return false;
  }
}

function matchesPseudo(element: ElementNode, name: string, arg?: string): boolean {
  const parent = element.parentNode;
  switch (name) {
    case 'root':
      return parent !== null && parent.nodeType === DOCUMENT_NODE;
    case 'first-child':
      return parent !== null && elementChildren(parent)[0] === element;
    case 'last-child': {
      if (!parent) return false;
      const siblings = elementChildren(parent);
      return siblings[siblings.length - 1] === element;
    }
    case 'not':
      return arg === undefined || !matchesSimple(element, parseSimpleSelector(arg.trim()));
    default:
      throw new SyntaxError(`Skeletal: Unsupported pseudo-class ":${name}"`);
  }
}

function matchesSimple(element: ElementNode, parts: SimpleSelector): boolean {
  if (parts.tag && parts.tag !== '*' && element.tagName !== parts.tag) return false;
  if (parts.id !== undefined && element.attributes.get('id') !== parts.id) return false;

  if (parts.classes.length > 0) {
    const classes = classList(element);
    if (!parts.classes.every(cls => classes.includes(cls))) return false;
  }

  return parts.attrs.every(attr => matchesAttribute(element, attr)) &&
    parts.pseudos.every(p => matchesPseudo(element, p.name, p.arg));
}

/** Match right to left */
function matchesParts(element: ElementNode, parts: SelectorPart[], index: number): boolean {
  const part = parts[index];
  if (!matchesSimple(element, part.selector)) return false;
  if (index === 0) return true;

  if (part.combinator === '>') {
    const parent = element.parentNode;
    return isElement(parent) && matchesParts(parent, parts, index - 1);
  }

  let ancestor = element.parentNode;
  while (isElement(ancestor)) {
    if (matchesParts(ancestor, parts, index - 1)) return true;
    ancestor = ancestor.parentNode;
  }
  return false;
}

function compile(selector: string): SelectorPart[][] {
  return selector
    .split(',')
    .map(s => s.trim())
    .filter(Boolean)
    .map(parseSelector);
}

export function matches(element: ElementNode, selector: string): boolean {
  return compile(selector).some(parts => matchesParts(element, parts, parts.length - 1));
}

/**
 * All matching descendants of `root`, in document order.
 */
export function querySelectorAll(root: ParentNode, selector: string): ElementNode[] {
  const compiled = compile(selector);
  const results: ElementNode[] = [];

  function traverse(node: ParentNode): void {
    for (const child of node.childNodes) {
      if (!isElement(child)) continue;
      if (compiled.some(parts => matchesParts(child, parts, parts.length - 1))) {
        results.push(child);
      }
      traverse(child);
    }
  }

  traverse(root);
  return results;
}

export function querySelector(root: ParentNode, selector: string): ElementNode | null {
  return querySelectorAll(root, selector)[0] ?? null;
}

export function getElementById(root: ParentNode, id: string): ElementNode | null {
  for (const child of root.childNodes) {
    if (!isElement(child)) continue;
    if (child.attributes.get('id') === id) return child;
    const found = getElementById(child, id);
    if (found) return found;
  }
  return null;
}
