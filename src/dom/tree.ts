/**
 * Skeletal Markup Tree Operations
 *
 * Every structural mutation goes through these helpers so a node never has
 * two parents: inserting a node always detaches it from where it was.
 */

import {
  CODE_NODE,
  COMMENT_NODE,
  DOCTYPE_NODE,
  DOCUMENT_NODE,
  ELEMENT_NODE,
  FRAGMENT_NODE,
  TEXT_NODE,
  type AnyNode,
  type CodeNode,
  type CommentNode,
  type DoctypeNode,
  type DocumentNode,
  type ElementNode,
  type FragmentNode,
  type InsertableNode,
  type MarkupNode,
  type ParentNode,
  type TextNode
} from './types.js';

export function createElement(
  tagName: string,
  attributes?: Iterable<readonly [string, string]>
): ElementNode {
  return {
    nodeType: ELEMENT_NODE,
    tagName: tagName.toLowerCase(),
    attributes: new Map(attributes ?? []),
    childNodes: [],
    parentNode: null
  };
}

export function createTextNode(text: string, raw = false): TextNode {
  return { nodeType: TEXT_NODE, nodeValue: text, raw, parentNode: null };
}

export function createCodeNode(source: string): CodeNode {
  return { nodeType: CODE_NODE, source, parentNode: null };
}

export function createComment(text: string): CommentNode {
  return { nodeType: COMMENT_NODE, nodeValue: text, parentNode: null };
}

export function createDoctype(text: string): DoctypeNode {
  return { nodeType: DOCTYPE_NODE, nodeValue: text, parentNode: null };
}

export function createFragment(children: Iterable<MarkupNode> = []): FragmentNode {
  const fragment: FragmentNode = { nodeType: FRAGMENT_NODE, childNodes: [], parentNode: null };
  for (const child of children) appendChild(fragment, child);
  return fragment;
}

export function createDocument(children: Iterable<MarkupNode> = []): DocumentNode {
  const doc: DocumentNode = { nodeType: DOCUMENT_NODE, childNodes: [], parentNode: null };
  for (const child of children) appendChild(doc, child);
  return doc;
}

export function isElement(node: AnyNode | null | undefined): node is ElementNode {
  return node != null && node.nodeType === ELEMENT_NODE;
}

export function isText(node: AnyNode | null | undefined): node is TextNode {
  return node != null && node.nodeType === TEXT_NODE;
}

export function isCode(node: AnyNode | null | undefined): node is CodeNode {
  return node != null && node.nodeType === CODE_NODE;
}

export function isFragment(node: AnyNode | null | undefined): node is FragmentNode {
  return node != null && node.nodeType === FRAGMENT_NODE;
}

const NODE_TYPES = new Set<unknown>([
  ELEMENT_NODE, TEXT_NODE, CODE_NODE, COMMENT_NODE, DOCTYPE_NODE, FRAGMENT_NODE, DOCUMENT_NODE
]);

/** Structural check for values coming back from expressions */
export function isMarkupNode(value: unknown): value is AnyNode {
  if (value === null || typeof value !== 'object') return false;
  const nodeType: unknown = Reflect.get(value, 'nodeType');
  return NODE_TYPES.has(nodeType) && 'parentNode' in value;
}

/** First element child of a document, what `:root` matches */
export function documentElement(doc: DocumentNode): ElementNode | null {
  return doc.childNodes.find(isElement) ?? null;
}

export function elementChildren(parent: ParentNode): ElementNode[] {
  return parent.childNodes.filter(isElement);
}

/**
 * Detach a node from its parent. Returns the node for chaining.
 */
export function removeNode<T extends MarkupNode>(node: T): T {
  const parent = node.parentNode;
  if (parent) {
    const index = parent.childNodes.indexOf(node);
    if (index !== -1) parent.childNodes.splice(index, 1);
    node.parentNode = null;
  }
  return node;
}

function adopt(parent: ParentNode, node: InsertableNode): MarkupNode[] {
  if (node.nodeType === FRAGMENT_NODE) {
    const moved = node.childNodes.splice(0);
    for (const child of moved) child.parentNode = parent;
    return moved;
  }
  removeNode(node);
  node.parentNode = parent;
  return [node];
}

export function appendChild(parent: ParentNode, node: InsertableNode): void {
  if (node === parent) {
    throw new Error('Skeletal: Cannot append a node to itself');
  }
  parent.childNodes.push(...adopt(parent, node));
}

export function prependChild(parent: ParentNode, node: InsertableNode): void {
  parent.childNodes.unshift(...adopt(parent, node));
}

/**
 * Replace `oldNode` with `replacement` in its parent. A fragment splices
 * all of its children into the old node's position.
 */
export function replaceWith(oldNode: MarkupNode, replacement: InsertableNode): void {
  const parent = oldNode.parentNode;
  if (!parent) {
    throw new Error(`Skeletal: Cannot replace a detached ${describeNode(oldNode)}`);
  }
  if (replacement === oldNode) return;

  const nodes = adopt(parent, replacement);
  // adopt() may have shifted indices when the replacement shared the parent
  const index = parent.childNodes.indexOf(oldNode);
  parent.childNodes.splice(index, 1, ...nodes);
  oldNode.parentNode = null;
}

/** Move every child of `source` to the end of `target` */
export function stealChildren(target: ParentNode, source: ParentNode): void {
  const moved = source.childNodes.splice(0);
  for (const child of moved) child.parentNode = target;
  target.childNodes.push(...moved);
}

/** Replace an element by its own children */
export function stripOut(element: ElementNode): void {
  const fragment = createFragment();
  stealChildren(fragment, element);
  replaceWith(element, fragment);
}

export function removeChildren(parent: ParentNode): void {
  for (const child of parent.childNodes.splice(0)) child.parentNode = null;
}

/**
 * Deep clone. The clone is detached.
 */
export function cloneNode<T extends MarkupNode>(node: T): T;
export function cloneNode(node: MarkupNode): MarkupNode {
  switch (node.nodeType) {
    case ELEMENT_NODE: {
      const clone = createElement(node.tagName, node.attributes);
      for (const child of node.childNodes) appendChild(clone, cloneNode(child));
      return clone;
    }
    case TEXT_NODE:
      return createTextNode(node.nodeValue, node.raw);
    case CODE_NODE:
      return createCodeNode(node.source);
    case COMMENT_NODE:
      return createComment(node.nodeValue);
    case DOCTYPE_NODE:
      return createDoctype(node.nodeValue);
  }
}

export function getAttribute(element: ElementNode, name: string): string | null {
  return element.attributes.get(name) ?? null;
}

export function classList(element: ElementNode): string[] {
  return (element.attributes.get('class') ?? '').split(/\s+/).filter(Boolean);
}

/** Append classes from a space separated list, skipping ones already present */
export function addClass(element: ElementNode, classes: string): void {
  const current = classList(element);
  for (const cls of classes.split(/\s+/).filter(Boolean)) {
    if (!current.includes(cls)) current.push(cls);
  }
  element.attributes.set('class', current.join(' '));
}

/** Concatenated text of all descendant text nodes */
export function textContent(node: AnyNode): string {
  switch (node.nodeType) {
    case TEXT_NODE:
      return node.nodeValue;
    case ELEMENT_NODE:
    case FRAGMENT_NODE:
    case DOCUMENT_NODE:
      return node.childNodes.map(textContent).join('');
    default:
      return '';
  }
}

export function setTextContent(element: ElementNode, text: string): void {
  removeChildren(element);
  appendChild(element, createTextNode(text));
}

export function describeNode(node: AnyNode): string {
  switch (node.nodeType) {
    case ELEMENT_NODE: return `<${node.tagName}>`;
    case TEXT_NODE: return 'text node';
    case CODE_NODE: return 'code node';
    case COMMENT_NODE: return 'comment';
    case DOCTYPE_NODE: return 'doctype';
    case FRAGMENT_NODE: return 'fragment';
    case DOCUMENT_NODE: return 'document';
  }
}
