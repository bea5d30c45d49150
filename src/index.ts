/**
 * Skeletal - HTML page templates with a shared skeleton
 *
 * Templates are plain HTML with inline `<%= %>` expressions, control
 * elements (if-true, or-else, for-each, render-template, hidden-form-data)
 * and an `onrender` hook. Rendering never runs `eval` or `new Function`.
 *
 * @example
 * import { Context, MemoryLoader, SkeletonComposer } from 'skeletal';
 *
 * const composer = new SkeletonComposer({
 *   loader: new MemoryLoader({
 *     'skeleton.html': '<html><head><title></title></head><body><main></main></body></html>',
 *     'home.html': '<main>Hello, <%= name %></main>'
 *   })
 * });
 * composer.renderToString('home.html', Context.from({ name: 'Ada' }));
 *
 * @module skeletal
 */

export { SkeletonComposer, renderTemplate, resolveLink, DEFAULT_SKELETON, DEFAULT_TEMPLATE_DIRECTORY } from './core/composer.js';
export type { ComposerOptions } from './core/composer.js';

export { TemplateExpander } from './core/expander.js';
export type {
  EmbeddedTagResult,
  EmbeddedTagTranslator,
  EmbeddedTagTranslators,
  ExpanderOptions,
  HtmlSanitizer
} from './core/expander.js';

export { Context, isDangerousName } from './core/context.js';
export { DirectoryLoader, MemoryLoader } from './core/loader.js';
export type { TemplateLoader } from './core/loader.js';
export { NodeHandle } from './core/handle.js';
export { populate, setFieldValue, childFieldName } from './core/forms.js';
export {
  addDefaultFunctions,
  dayOfWeek,
  filterKeys,
  formatDate,
  formatTime,
  multiReplace
} from './core/defaults.js';
export { entriesOf, isObjectShaped, toBoolean, toJson, toText } from './core/values.js';

export {
  SkeletalError,
  MalformedTemplateError,
  EvaluationError,
  MissingTemplateError,
  StructuralMergeError,
  TemplateRenderError
} from './core/errors.js';

export { ExprParser } from './expr/index.js';
export type { ExpressionEvaluator } from './expr/index.js';

export { parseDocument, parseMarkup, serialize } from './dom/index.js';
export type { DocumentNode, ElementNode, FragmentNode, MarkupNode } from './dom/index.js';
