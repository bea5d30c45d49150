/**
 * Skeletal Expressions - CSP-safe evaluator for template expressions
 *
 * @module skeletal/expr
 */

export { ExprParser } from './ExprParser.js';
export type { ExpressionEvaluator } from './ExprParser.js';
export type * from './ast.js';
