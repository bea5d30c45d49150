/**
 * Skeletal Node Handle
 *
 * What `this` refers to inside an `onrender` attribute. Expressions get a
 * small method surface instead of the raw node, so they cannot walk to
 * `parentNode` and rewrite parts of the tree the render has not reached.
 */

import { addClass, setTextContent, textContent } from '../dom/tree.js';
import type { ElementNode } from '../dom/types.js';
import { entriesOf, NODE_WRAPPER, toText, type NodeWrapper } from './values.js';
import { populate } from './forms.js';

export class NodeHandle implements NodeWrapper {
  readonly [NODE_WRAPPER] = true as const;
  private readonly node: ElementNode;

  constructor(node: ElementNode) {
    this.node = node;
  }

  unwrap(): ElementNode {
    return this.node;
  }

  get tagName(): string {
    return this.node.tagName;
  }

  get textContent(): string {
    return textContent(this.node);
  }

  set textContent(text: string) {
    setTextContent(this.node, text);
  }

  getAttribute(name: string): string | null {
    return this.node.attributes.get(name) ?? null;
  }

  setAttribute(name: string, value: unknown): this {
    this.node.attributes.set(String(name).toLowerCase(), toText(value));
    return this;
  }

  removeAttribute(name: string): this {
    this.node.attributes.delete(name);
    return this;
  }

  hasAttribute(name: string): boolean {
    return this.node.attributes.has(name);
  }

  addClass(classes: unknown): this {
    addClass(this.node, toText(classes));
    return this;
  }

  /**
   * Fill the controls of a form from `data`: every top-level key is a field
   * name, nested values flatten with bracket notation. Does nothing on
   * elements other than <form>.
   */
  populateFrom(data: unknown): this {
    if (this.node.tagName !== 'form') return this;
    for (const [key, value] of entriesOf(data)) {
      populate(this.node, value, toText(key));
    }
    return this;
  }
}
