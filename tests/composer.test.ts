/**
 * Skeleton composition tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { SkeletonComposer, renderTemplate, resolveLink } from '../src/core/composer.js';
import { Context } from '../src/core/context.js';
import {
  MissingTemplateError,
  StructuralMergeError,
  TemplateRenderError
} from '../src/core/errors.js';
import { MemoryLoader } from '../src/core/loader.js';
import { querySelector } from '../src/dom/selector.js';
import { innerHTML, serialize } from '../src/dom/serialize.js';
import { documentElement } from '../src/dom/tree.js';
import type { DocumentNode } from '../src/dom/types.js';

const SKELETON =
  '<!DOCTYPE html><html><head><title>Site</title><document-fragment id="head-extra"></document-fragment></head>' +
  '<body class="base"><nav data-relative-to="https://example.test/docs/"><a href="intro.html">Intro</a><a name="top">Top</a></nav>' +
  '<main>placeholder</main><footer><%= year %></footer></body></html>';

const templates = new MemoryLoader({
  'skeleton.html': SKELETON,
  'minimal.html': '<html><head><title/></head><body><main/></body></html>',
  'home.html': '<main body-class="home base">Hi <%= name %></main><title>T</title>',
  'simple.html': '<main body-class="foo">Hi</main><title>T</title>',
  'styles.html': '<main>m</main><document-fragment id="head-extra"><link rel="stylesheet" href="/a.css"></document-fragment>',
  'orphan.html': '<main>m</main><aside id="sidebar">s</aside>',
  'no-main.html': '<p>no main here</p>',
  'broken.html': '<main><%= 1 + %></main>'
});

function renderError(fn: () => unknown): TemplateRenderError {
  try {
    fn();
  } catch (err) {
    if (err instanceof TemplateRenderError) return err;
    throw err;
  }
  throw new Error('expected the render to fail');
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('SkeletonComposer', () => {
  const composer = new SkeletonComposer({ loader: templates });

  it('should merge content into the skeleton', () => {
    const doc = composer.render('simple.html', new Context(), new Context(), 'minimal.html');

    expect(serialize(doc)).toBe(
      '<html><head><title>T</title></head><body class="foo"><main>Hi</main></body></html>'
    );
  });

  it('should expand both templates against their own contexts', () => {
    const html = composer.renderToString(
      'home.html',
      Context.from({ name: 'Ada' }),
      Context.from({ year: 2024 })
    );

    expect(html).toBe(
      '<!DOCTYPE html><html><head><title>T</title></head>' +
      '<body class="base home"><nav data-relative-to="https://example.test/docs/">' +
      '<a href="https://example.test/docs/intro.html">Intro</a><a name="top">Top</a></nav>' +
      '<main>Hi Ada</main><footer>2024</footer></body></html>'
    );
  });

  it('should replace skeleton elements by id and unwrap document fragments', () => {
    const doc = composer.render('styles.html');

    expect(querySelector(doc, 'document-fragment')).toBeNull();
    expect(innerHTML(querySelector(doc, 'head') ?? doc))
      .toBe('<title>Site</title><link rel="stylesheet" href="/a.css" />');
  });

  it('should default both contexts', () => {
    expect(composer.renderToString('simple.html', undefined, undefined, 'minimal.html'))
      .toContain('<main>Hi</main>');
  });

  it('should prefix a comment and log in debug mode', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const debugComposer = new SkeletonComposer({ loader: templates, debug: true });

    const html = debugComposer.renderToString('simple.html', undefined, undefined, 'minimal.html');

    expect(html.startsWith('<!-- simple.html inside minimal.html --><html>')).toBe(true);
    expect(log).toHaveBeenCalledWith('[SkeletonComposer] render:', 'simple.html', 'inside', 'minimal.html');
  });

  it('should use the configured skeleton name', () => {
    const custom = new SkeletonComposer({ loader: templates, skeletonName: 'minimal.html' });
    expect(custom.skeletonName).toBe('minimal.html');
    expect(custom.renderToString('simple.html')).toBe(
      '<html><head><title>T</title></head><body class="foo"><main>Hi</main></body></html>'
    );
  });

  describe('Hooks', () => {
    class LocalizedComposer extends SkeletonComposer {
      protected addDefaultFunctions(context: Context): void {
        super.addDefaultFunctions(context);
        context.set('shout', (value: unknown) => String(value).toUpperCase());
      }

      protected postProcess(document: DocumentNode): void {
        documentElement(document)?.attributes.set('lang', 'en');
      }
    }

    it('should let subclasses add helpers and post-process', () => {
      const loader = new MemoryLoader({
        'skeleton.html': '<html><head><title></title></head><body><main></main></body></html>',
        'page.html': '<main><%= shout("hi") %> <%= formatDate("2024-03-09") %></main>'
      });

      const html = new LocalizedComposer({ loader }).renderToString('page.html');

      expect(html).toBe(
        '<html lang="en"><head><title></title></head><body><main>HI 03/09/2024</main></body></html>'
      );
    });
  });

  describe('Failures', () => {
    it('should wrap a missing template once', () => {
      const context = Context.from({ name: 'Ada' });
      const error = renderError(() => composer.render('nope.html', context));

      expect(error.message).toBe('Failed to render template "nope.html": Skeletal: Template "nope.html" was not found');
      expect(error.templateName).toBe('nope.html');
      expect(error.context).toBe(context);
      expect(error.cause).toBeInstanceOf(MissingTemplateError);
    });

    it('should report missing structural targets', () => {
      const noMain = renderError(() => composer.render('no-main.html'));
      expect(noMain.cause).toBeInstanceOf(StructuralMergeError);
      expect(noMain.cause instanceof StructuralMergeError && noMain.cause.selector).toBe(':root > main');

      const orphan = renderError(() => composer.render('orphan.html'));
      expect(orphan.cause instanceof StructuralMergeError && orphan.cause.selector).toBe('#sidebar');
    });

    it('should wrap evaluation errors', () => {
      const error = renderError(() => composer.render('broken.html'));
      expect(error.message).toMatch(/^Failed to render template "broken\.html": Skeletal: Cannot evaluate "1 \+"/);
    });

    it('should not wrap a render error twice', () => {
      const inner = new TemplateRenderError('inner.html', new Context(), new Error('inner failure'));
      const composerWithTranslator = new SkeletonComposer({
        loader: new MemoryLoader({
          'skeleton.html': '<html><body><main></main></body></html>',
          'outer.html': '<main><widget></widget></main>'
        }),
        translators: {
          widget: () => {
            throw inner;
          }
        }
      });

      expect(renderError(() => composerWithTranslator.render('outer.html'))).toBe(inner);
    });
  });
});

describe('renderTemplate', () => {
  it('should render with a given loader and skeleton', () => {
    const doc = renderTemplate('simple.html', undefined, undefined, 'minimal.html', templates);
    expect(serialize(doc)).toBe('<html><head><title>T</title></head><body class="foo"><main>Hi</main></body></html>');
  });
});

describe('resolveLink', () => {
  it('should resolve against absolute bases', () => {
    expect(resolveLink('intro.html', 'https://example.test/docs/')).toBe('https://example.test/docs/intro.html');
    expect(resolveLink('../up.html', 'https://example.test/docs/a/')).toBe('https://example.test/docs/up.html');
  });

  it('should keep results origin-relative for relative bases', () => {
    expect(resolveLink('../up.html', '/docs/guide/')).toBe('/docs/up.html');
    expect(resolveLink('#top', '/docs/page.html')).toBe('/docs/page.html#top');
    expect(resolveLink('?q=1', 'docs/')).toBe('/docs/?q=1');
  });

  it('should leave absolute links alone', () => {
    expect(resolveLink('https://other.test/x', '/docs/')).toBe('https://other.test/x');
  });
});
