/**
 * Skeletal Skeleton Composer
 *
 * A page is two templates: a skeleton (the shell shared by every page) and
 * the content template. Both are expanded against their own Context, then
 * the content is merged into the skeleton:
 *
 * - `:root > main[body-class]` adds classes to the skeleton's <body>
 * - the content <main> replaces the skeleton <main>
 * - a top-level <title> replaces the inner markup of the skeleton title
 * - every top-level `[id]` element replaces the skeleton element with that id
 * - <document-fragment> wrappers are unwrapped
 */

import { querySelector, querySelectorAll, getElementById } from '../dom/selector.js';
import { serialize } from '../dom/serialize.js';
import {
  addClass,
  createComment,
  documentElement,
  prependChild,
  removeChildren,
  replaceWith,
  stealChildren,
  stripOut
} from '../dom/tree.js';
import type { DocumentNode, ElementNode } from '../dom/types.js';
import { Context } from './context.js';
import { addDefaultFunctions } from './defaults.js';
import { StructuralMergeError, TemplateRenderError } from './errors.js';
import { TemplateExpander, type ExpanderOptions } from './expander.js';
import { DirectoryLoader, type TemplateLoader } from './loader.js';

export const DEFAULT_SKELETON = 'skeleton.html';
export const DEFAULT_TEMPLATE_DIRECTORY = 'templates/';

export interface ComposerOptions extends Partial<ExpanderOptions> {
  /** Skeleton used when render() is not given one */
  skeletonName?: string;
}

export class SkeletonComposer {
  readonly expander: TemplateExpander;
  readonly skeletonName: string;
  readonly debug: boolean;

  constructor(options: ComposerOptions = {}) {
    const { skeletonName, loader, ...expanderOptions } = options;
    this.expander = new TemplateExpander({
      ...expanderOptions,
      loader: loader ?? new DirectoryLoader(DEFAULT_TEMPLATE_DIRECTORY)
    });
    this.skeletonName = skeletonName ?? DEFAULT_SKELETON;
    this.debug = options.debug ?? false;
  }

  get loader(): TemplateLoader {
    return this.expander.loader;
  }

  /**
   * Render `templateName` inside the skeleton and return the finished
   * document. Any failure is thrown as a single TemplateRenderError.
   */
  render(
    templateName: string,
    contentContext: Context = new Context(),
    skeletonContext: Context = new Context(),
    skeletonName: string = this.skeletonName
  ): DocumentNode {
    try {
      return this.compose(templateName, contentContext, skeletonContext, skeletonName);
    } catch (err) {
      if (err instanceof TemplateRenderError) throw err;
      throw new TemplateRenderError(templateName, contentContext, err);
    }
  }

  /** render() serialized to HTML */
  renderToString(
    templateName: string,
    contentContext?: Context,
    skeletonContext?: Context,
    skeletonName?: string
  ): string {
    return serialize(this.render(templateName, contentContext, skeletonContext, skeletonName));
  }

  /**
   * Bind the helpers every template can use. Subclasses override this to
   * add their own, usually calling super first.
   */
  protected addDefaultFunctions(context: Context): void {
    addDefaultFunctions(context);
  }

  /**
   * Last chance to edit the finished document before it is returned.
   */
  protected postProcess(_document: DocumentNode): void {
    // no-op
  }

  private compose(
    templateName: string,
    contentContext: Context,
    skeletonContext: Context,
    skeletonName: string
  ): DocumentNode {
    this.addDefaultFunctions(contentContext);
    this.addDefaultFunctions(skeletonContext);

    const { expander, loader } = this;
    if (this.debug) {
      console.log('[SkeletonComposer] render:', templateName, 'inside', skeletonName);
    }

    const skeleton = expander.parseTemplate(loader.loadMarkup(skeletonName), false);
    const content = expander.parseTemplate(loader.loadMarkup(templateName), true);

    const skeletonRoot = documentElement(skeleton);
    if (!skeletonRoot) throw new StructuralMergeError(':root', 'skeleton');
    expander.expand(skeletonRoot, skeletonContext);
    rewriteRelativeLinks(skeleton);

    const contentRoot = documentElement(content);
    if (!contentRoot) throw new StructuralMergeError(':root', 'template');
    expander.expand(contentRoot, contentContext);

    merge(skeleton, content);

    if (this.debug) {
      prependChild(skeleton, createComment(` ${templateName} inside ${skeletonName} `));
    }
    this.postProcess(skeleton);
    return skeleton;
  }
}

function requireElement(
  root: DocumentNode,
  selector: string,
  where: 'skeleton' | 'template'
): ElementNode {
  const element = querySelector(root, selector);
  if (!element) throw new StructuralMergeError(selector, where);
  return element;
}

function merge(skeleton: DocumentNode, content: DocumentNode): void {
  const main = requireElement(content, ':root > main', 'template');

  const bodyClass = main.attributes.get('body-class');
  if (bodyClass !== undefined) {
    addClass(requireElement(skeleton, 'body', 'skeleton'), bodyClass);
    main.attributes.delete('body-class');
  }

  replaceWith(requireElement(skeleton, 'main', 'skeleton'), main);

  const title = querySelector(content, ':root > title');
  if (title) {
    const target = requireElement(skeleton, ':root > head > title', 'skeleton');
    removeChildren(target);
    stealChildren(target, title);
  }

  for (const element of querySelectorAll(content, ':root > [id]')) {
    const id = element.attributes.get('id') ?? '';
    const target = getElementById(skeleton, id);
    if (!target) throw new StructuralMergeError(`#${id}`, 'skeleton');
    replaceWith(target, element);
  }

  for (const fragment of querySelectorAll(skeleton, 'document-fragment')) {
    stripOut(fragment);
  }
}

// Resolves relative bases without leaking into the output
const PLACEHOLDER_ORIGIN = 'http://relative.invalid';

/**
 * Resolve `href` against `base`. When `base` is itself relative the result
 * is origin-relative (`/docs/page.html`).
 */
export function resolveLink(href: string, base: string): string {
  if (URL.canParse(base)) return new URL(href, base).href;

  const resolved = new URL(href, new URL(base, `${PLACEHOLDER_ORIGIN}/`));
  if (resolved.origin !== PLACEHOLDER_ORIGIN) return resolved.href;
  return resolved.pathname + resolved.search + resolved.hash;
}

function rewriteRelativeLinks(skeleton: DocumentNode): void {
  for (const container of querySelectorAll(skeleton, '[data-relative-to]')) {
    const base = container.attributes.get('data-relative-to') ?? '';
    for (const anchor of querySelectorAll(container, 'a[href]')) {
      const href = anchor.attributes.get('href') ?? '';
      anchor.attributes.set('href', resolveLink(href, base));
    }
  }
}

/**
 * Render a template with a composer built from defaults.
 *
 * @example
 * const doc = renderTemplate('home.html', Context.from({ user }));
 */
export function renderTemplate(
  templateName: string,
  context: Context = new Context(),
  skeletonContext: Context = new Context(),
  skeletonName: string = DEFAULT_SKELETON,
  loader: TemplateLoader = new DirectoryLoader(DEFAULT_TEMPLATE_DIRECTORY)
): DocumentNode {
  return new SkeletonComposer({ loader }).render(templateName, context, skeletonContext, skeletonName);
}
