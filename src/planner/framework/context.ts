/**
 * Context passed to lean-projection rules
 */

import type { ExprNode } from '../nodes/expr-node.js';
import type { LeanTuning } from '../optimizer-tuning.js';
import type { TraceHook } from './trace.js';
import type { LeanResult } from './registry.js';

/**
 * Runs before rule dispatch on every node of a subtree being leaned.
 * Returning a result short-circuits the rule for that node.
 */
export type LeanInterceptor = (node: ExprNode, fields: ReadonlySet<string>) => LeanResult | undefined;

/**
 * Everything a rule needs: tuning, tracing, and recursion into children
 */
export interface LeanContext {
	/** Optimizer tuning parameters */
	readonly tuning: LeanTuning;

	/** Current rule nesting depth */
	readonly depth: number;

	/** Active trace hook, if any */
	readonly trace: TraceHook | undefined;

	/** Lean a child (or an independent subexpression) with the given request */
	lean(node: ExprNode, fields: Iterable<string>): LeanResult;

	/** As lean, with `intercept` consulted throughout the subtree before any interceptor already in effect */
	leanIntercepted(node: ExprNode, fields: Iterable<string>, intercept: LeanInterceptor): LeanResult;
}
