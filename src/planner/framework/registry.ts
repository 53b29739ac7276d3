/**
 * Lean-projection rule framework.
 * One rule per expression kind, held in a table the compiler checks for completeness.
 */

import { createLogger } from '../../common/logger.js';
import type { ExprNode } from '../nodes/expr-node.js';
import type { ExprKind } from '../nodes/expr-kind.js';
import type { ExprNodeByKind } from '../nodes/node-kinds.js';
import type { LeanContext } from './context.js';
import { OptimizerError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

const log = createLogger('optimizer:framework:registry');

/**
 * Outcome of leaning one node: the rewritten node, and the fields of its
 * input that it (and everything above it in the request) depends on.
 */
export interface LeanResult {
	readonly node: ExprNode;
	readonly fields: ReadonlySet<string>;
}

/**
 * Rule function signature: rewrite `node` so it carries no more than `fields` need
 */
export type LeanRuleFn<T extends ExprNode> = (node: T, fields: ReadonlySet<string>, context: LeanContext) => LeanResult;

/** Constructor of a node class, used to narrow the node a rule receives */
export type NodeClass<T extends ExprNode> = abstract new (...args: never[]) => T;

/**
 * Handle for a registered lean rule
 */
export interface LeanRuleHandle<K extends ExprKind = ExprKind> {
	/** Unique identifier for this rule */
	readonly id: string;
	/** Node kind this rule applies to */
	readonly nodeType: K;
	/** Run the rule; the node must be of this rule's kind */
	run(node: ExprNode, fields: ReadonlySet<string>, context: LeanContext): LeanResult;
}

/**
 * Exactly one rule per kind. Adding a kind to ExprKind without a rule fails to compile.
 */
export type LeanRuleTable = { readonly [K in ExprKind]: LeanRuleHandle<K> };

/**
 * Create a rule handle for one node kind
 */
export function createLeanRule<K extends ExprKind>(
	id: string,
	nodeType: K,
	nodeClass: NodeClass<ExprNodeByKind[K]>,
	fn: LeanRuleFn<ExprNodeByKind[K]>,
): LeanRuleHandle<K> {
	log('Created rule %s for %s', id, nodeType);
	return {
		id,
		nodeType,
		run(node, fields, context) {
			if (!(node instanceof nodeClass)) {
				throw new OptimizerError(`Rule ${id} applies to ${nodeType}, got ${node.nodeType}`, StatusCode.INTERNAL);
			}
			return fn(node, fields, context);
		},
	};
}

/** Build a result with the field set copied, so rules may keep mutating their working set */
export function leanResult(node: ExprNode, fields: Iterable<string>): LeanResult {
	return { node, fields: new Set(fields) };
}

/** Sorted field names */
export function sortedFields(fields: Iterable<string>): string[] {
	return [...fields].sort();
}

/** a ∪ b */
export function unionFields(a: Iterable<string>, b: Iterable<string>): Set<string> {
	const result = new Set(a);
	for (const name of b) {
		result.add(name);
	}
	return result;
}

/** Members of `fields` among `columns`, as a new set */
export function intersectFields(fields: Iterable<string>, columns: readonly string[]): Set<string> {
	const allowed = new Set(columns);
	return new Set([...fields].filter(name => allowed.has(name)));
}
