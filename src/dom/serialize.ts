/**
 * Skeletal Serializer
 *
 * Turns a markup tree back into HTML. No formatting is added so whitespace
 * survives a parse/serialize round trip.
 */

import { VOID_ELEMENTS } from './parser.js';
import {
  CODE_NODE,
  COMMENT_NODE,
  DOCTYPE_NODE,
  DOCUMENT_NODE,
  ELEMENT_NODE,
  FRAGMENT_NODE,
  TEXT_NODE,
  type AnyNode,
  type ParentNode
} from './types.js';

/**
 * Escape HTML special characters in text and attribute values.
 */
export function escapeHTML(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function serialize(node: AnyNode): string {
  switch (node.nodeType) {
    case TEXT_NODE:
      return node.raw ? node.nodeValue : escapeHTML(node.nodeValue);

    case CODE_NODE:
      return `<%${node.source}%>`;

    case COMMENT_NODE:
      return `<!--${node.nodeValue}-->`;

    case DOCTYPE_NODE:
      return `<!${node.nodeValue}>`;

    case FRAGMENT_NODE:
    case DOCUMENT_NODE:
      return innerHTML(node);

    case ELEMENT_NODE: {
      const tag = node.tagName;
      let attrs = '';
      for (const [key, value] of node.attributes) {
        attrs += ` ${key}="${escapeHTML(value)}"`;
      }

      if (VOID_ELEMENTS.has(tag)) {
        return `<${tag}${attrs} />`;
      }
      return `<${tag}${attrs}>${innerHTML(node)}</${tag}>`;
    }
  }
}

/** Serialized children of a node */
export function innerHTML(node: ParentNode): string {
  return node.childNodes.map(serialize).join('');
}
