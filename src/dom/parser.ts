/**
 * Skeletal Markup Parser
 *
 * A forgiving HTML parser tuned for templates:
 * - `<% ... %>` in text content becomes a CodeNode, unless `inlineCode` is off
 * - raw elements (script, style, registered translator tags) keep their
 *   content verbatim as a single raw TextNode
 * - any tag may self-close (`<render-template file="a.html" />`)
 * - stray closing tags are ignored, unclosed tags close at end of input
 */

import { MalformedTemplateError } from '../core/errors.js';
import {
  appendChild,
  createCodeNode,
  createComment,
  createDoctype,
  createDocument,
  createElement,
  createTextNode
} from './tree.js';
import type { DocumentNode, ElementNode, MarkupNode, ParseOptions } from './types.js';

/** Self-closing HTML tags */
export const VOID_ELEMENTS = new Set([
  'area', 'base', 'br', 'col', 'embed', 'hr', 'img', 'input',
  'link', 'meta', 'param', 'source', 'track', 'wbr'
]);

/** Elements whose content is never parsed as markup */
export const RAW_TEXT_ELEMENTS = new Set(['script', 'style']);

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: '\u00A0'
};

/**
 * Decode the entities the serializer produces plus numeric references.
 * Unknown named entities are left as written.
 */
export function decodeEntities(text: string): string {
  if (!text.includes('&')) return text;
  return text.replace(/&(#[0-9]+|#[xX][0-9a-fA-F]+|[a-zA-Z]+);/g, (match, ref: string) => {
    if (ref[0] === '#') {
      const code = ref[1] === 'x' || ref[1] === 'X'
        ? parseInt(ref.slice(2), 16)
        : parseInt(ref.slice(1), 10);
      return Number.isFinite(code) && code <= 0x10FFFF ? String.fromCodePoint(code) : match;
    }
    return NAMED_ENTITIES[ref.toLowerCase()] ?? match;
  });
}

const TAG_OPEN_RE = /^<([a-zA-Z][\w:-]*)/;
// Quoted values run verbatim to the matching quote
const ATTR_RE = /^([^\s=/>]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s/>]+)))?/;

/**
 * Parse markup into a list of top-level nodes.
 */
export function parseMarkup(html: string, options: ParseOptions = {}): MarkupNode[] {
  const inlineCode = options.inlineCode ?? true;
  const rawTags = new Set(RAW_TEXT_ELEMENTS);
  for (const name of options.rawTagNames ?? []) rawTags.add(name.toLowerCase());

  const nodes: MarkupNode[] = [];
  const stack: ElementNode[] = [];
  const len = html.length;
  let pos = 0;

  function addNode(node: MarkupNode): void {
    const parent = stack[stack.length - 1];
    if (parent) {
      appendChild(parent, node);
    } else {
      nodes.push(node);
    }
  }

  function addText(text: string): void {
    if (text.trim() || (text && stack.length > 0)) {
      addNode(createTextNode(decodeEntities(text)));
    }
  }

  while (pos < len) {
    if (html[pos] !== '<') {
      const nextTag = html.indexOf('<', pos);
      const textEnd = nextTag === -1 ? len : nextTag;
      addText(html.slice(pos, textEnd));
      pos = textEnd;
      continue;
    }

    // Inline code
    if (inlineCode && html[pos + 1] === '%') {
      const end = html.indexOf('%>', pos + 2);
      if (end === -1) {
        throw new MalformedTemplateError(
          `unterminated "<%" at offset ${pos}`,
          'Every <% must be closed with %>.'
        );
      }
      addNode(createCodeNode(html.slice(pos + 2, end)));
      pos = end + 2;
      continue;
    }

    // Comment
    if (html.startsWith('<!--', pos)) {
      const end = html.indexOf('-->', pos + 4);
      const stop = end === -1 ? len : end;
      addNode(createComment(html.slice(pos + 4, stop)));
      pos = end === -1 ? len : end + 3;
      continue;
    }

    // Doctype and other declarations
    if (html[pos + 1] === '!') {
      const end = html.indexOf('>', pos);
      const stop = end === -1 ? len : end;
      addNode(createDoctype(html.slice(pos + 2, stop).trim()));
      pos = end === -1 ? len : end + 1;
      continue;
    }

    // Closing tag
    if (html[pos + 1] === '/') {
      const end = html.indexOf('>', pos);
      if (end !== -1) {
        const tagName = html.slice(pos + 2, end).trim().toLowerCase();
        // Ignore closing tags with no open element of that name
        if (stack.some(el => el.tagName === tagName)) {
          let top = stack.pop();
          while (top && top.tagName !== tagName) top = stack.pop();
        }
        pos = end + 1;
        continue;
      }
    }

    const tagMatch = TAG_OPEN_RE.exec(html.slice(pos));
    if (!tagMatch) {
      // A '<' that does not start a tag is text
      const nextPotentialTag = html.slice(pos + 1).search(/<(?:[a-zA-Z/!%]|$)/);
      const textEnd = nextPotentialTag === -1 ? len : pos + 1 + nextPotentialTag;
      addText(html.slice(pos, textEnd));
      pos = textEnd;
      continue;
    }

    const tagName = tagMatch[1].toLowerCase();
    pos += tagMatch[0].length;

    const element = createElement(tagName);
    let selfClosing = false;

    while (pos < len) {
      while (pos < len && /\s/.test(html[pos])) pos++;

      if (html[pos] === '>') {
        pos++;
        break;
      }
      if (html.startsWith('/>', pos)) {
        selfClosing = true;
        pos += 2;
        break;
      }

      const attrMatch = ATTR_RE.exec(html.slice(pos));
      if (attrMatch) {
        const value = attrMatch[2] ?? attrMatch[3] ?? attrMatch[4] ?? '';
        element.attributes.set(attrMatch[1].toLowerCase(), decodeEntities(value));
        pos += attrMatch[0].length;
      } else {
        pos++;
      }
    }

    addNode(element);

    if (selfClosing || VOID_ELEMENTS.has(tagName)) continue;

    if (rawTags.has(tagName)) {
      const closing = new RegExp(`</${escapeRegExp(tagName)}\\s*>`, 'i');
      const match = closing.exec(html.slice(pos));
      const contentEnd = match ? pos + match.index : len;
      const content = html.slice(pos, contentEnd);
      if (content) appendChild(element, createTextNode(content, true));
      pos = match ? contentEnd + match[0].length : len;
      continue;
    }

    stack.push(element);
  }

  return nodes;
}

/**
 * Parse markup into a document. `documentElement()` of the result is the
 * first top-level element.
 */
export function parseDocument(html: string, options: ParseOptions = {}): DocumentNode {
  return createDocument(parseMarkup(html, options));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
