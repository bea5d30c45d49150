/**
 * Skeletal Errors
 *
 * Nothing in expansion or composition recovers locally. Every failure
 * propagates to SkeletonComposer.render(), which wraps it exactly once in
 * a TemplateRenderError.
 */

import type { Context } from './context.js';

export class SkeletalError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Marker syntax is broken or a control element lacks a required attribute.
 */
export class MalformedTemplateError extends SkeletalError {
  readonly detail: string;

  constructor(detail: string, hint?: string) {
    super(`Skeletal: Malformed template: ${detail}` + (hint ? `\n${hint}` : ''));
    this.detail = detail;
  }
}

/**
 * The expression evaluator rejected an expression.
 */
export class EvaluationError extends SkeletalError {
  readonly expression: string;

  constructor(expression: string, reason: string, options?: { cause?: unknown }) {
    super(`Skeletal: Cannot evaluate "${expression.trim()}": ${reason}`, options);
    this.expression = expression;
  }
}

/**
 * A TemplateLoader could not resolve a name.
 */
export class MissingTemplateError extends SkeletalError {
  readonly templateName: string;

  constructor(templateName: string, options?: { cause?: unknown }) {
    super(`Skeletal: Template "${templateName}" was not found`, options);
    this.templateName = templateName;
  }
}

/**
 * The skeleton (or the content) lacks an element the merge step needs.
 */
export class StructuralMergeError extends SkeletalError {
  readonly selector: string;

  constructor(selector: string, where: 'skeleton' | 'template') {
    super(
      `Skeletal: No element matches "${selector}" in the ${where}.\n` +
      (where === 'skeleton'
        ? 'The skeleton must provide every element the template replaces.'
        : 'A template must have a top-level <main> element.')
    );
    this.selector = selector;
  }
}

/**
 * The single error a failed render surfaces. `cause` is the original failure.
 */
export class TemplateRenderError extends SkeletalError {
  readonly templateName: string;
  readonly context: Context;

  constructor(templateName: string, context: Context, cause: unknown) {
    super(`Failed to render template "${templateName}": ${describeCause(cause)}`, { cause });
    this.templateName = templateName;
    this.context = context;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}
