/**
 * Skeletal DOM - markup tree, parser, serializer and selectors
 *
 * @example
 * import { parseDocument, querySelector, serialize } from 'skeletal/dom';
 * const doc = parseDocument('<html><body><main></main></body></html>');
 * querySelector(doc, 'main');
 *
 * @module skeletal/dom
 */

export type {
  AnyNode,
  CodeNode,
  CommentNode,
  DoctypeNode,
  DocumentNode,
  ElementNode,
  FragmentNode,
  InsertableNode,
  MarkupNode,
  ParentNode,
  ParseOptions,
  TextNode
} from './types.js';

export {
  ELEMENT_NODE,
  TEXT_NODE,
  CODE_NODE,
  COMMENT_NODE,
  DOCUMENT_NODE,
  DOCTYPE_NODE,
  FRAGMENT_NODE
} from './types.js';

export {
  addClass,
  appendChild,
  classList,
  cloneNode,
  createCodeNode,
  createComment,
  createDoctype,
  createDocument,
  createElement,
  createFragment,
  createTextNode,
  documentElement,
  elementChildren,
  getAttribute,
  isCode,
  isElement,
  isFragment,
  isMarkupNode,
  isText,
  prependChild,
  removeChildren,
  removeNode,
  replaceWith,
  setTextContent,
  stealChildren,
  stripOut,
  textContent
} from './tree.js';

export { parseMarkup, parseDocument, decodeEntities, VOID_ELEMENTS, RAW_TEXT_ELEMENTS } from './parser.js';
export { serialize, innerHTML, escapeHTML } from './serialize.js';
export { matches, querySelector, querySelectorAll, getElementById } from './selector.js';
