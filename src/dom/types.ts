/**
 * Skeletal Markup Tree Types
 *
 * A minimal, strictly typed node tree for server-side template expansion.
 * Node type numbers follow the DOM where a DOM equivalent exists; inline
 * `<% %>` code nodes borrow the processing-instruction number since they
 * play the same role in a template.
 */

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const CODE_NODE = 7;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;
export const DOCTYPE_NODE = 10;
export const FRAGMENT_NODE = 11;

/** Element with a lowercase tag name and ordered attributes */
export interface ElementNode {
  nodeType: typeof ELEMENT_NODE;
  tagName: string;
  attributes: Map<string, string>;
  childNodes: MarkupNode[];
  parentNode: ParentNode | null;
}

/** Text content; raw text is serialized verbatim (script bodies, trusted markup) */
export interface TextNode {
  nodeType: typeof TEXT_NODE;
  nodeValue: string;
  raw: boolean;
  parentNode: ParentNode | null;
}

/**
 * Inline code written as `<% ... %>`.
 * `source` is everything between the delimiters, so `<%= user %>` has
 * source `= user `.
 */
export interface CodeNode {
  nodeType: typeof CODE_NODE;
  source: string;
  parentNode: ParentNode | null;
}

export interface CommentNode {
  nodeType: typeof COMMENT_NODE;
  nodeValue: string;
  parentNode: ParentNode | null;
}

/** `<!DOCTYPE html>` is stored with nodeValue `DOCTYPE html` */
export interface DoctypeNode {
  nodeType: typeof DOCTYPE_NODE;
  nodeValue: string;
  parentNode: ParentNode | null;
}

/**
 * Transient sibling list. Inserting a fragment moves its children to the
 * insertion point and leaves the fragment empty.
 */
export interface FragmentNode {
  nodeType: typeof FRAGMENT_NODE;
  childNodes: MarkupNode[];
  parentNode: null;
}

export interface DocumentNode {
  nodeType: typeof DOCUMENT_NODE;
  childNodes: MarkupNode[];
  parentNode: null;
}

/** Nodes that can appear in a child list */
export type MarkupNode = ElementNode | TextNode | CodeNode | CommentNode | DoctypeNode;

/** Nodes that own a child list */
export type ParentNode = ElementNode | FragmentNode | DocumentNode;

/** Anything that can be inserted where a single node stood */
export type InsertableNode = MarkupNode | FragmentNode;

export type AnyNode = MarkupNode | FragmentNode | DocumentNode;

export interface ParseOptions {
  /**
   * Tag names whose content is read verbatim up to the matching closing tag.
   * `script` and `style` are always raw.
   */
  rawTagNames?: Iterable<string>;
  /** Read `<% ... %>` as code nodes (default true); when false `<%` is plain text */
  inlineCode?: boolean;
}
