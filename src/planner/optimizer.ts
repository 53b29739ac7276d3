import { createLogger } from '../common/logger.js';
import { OptimizerError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { ExprNode } from './nodes/expr-node.js';
import { ExprKind } from './nodes/expr-kind.js';
import { ProjectionNode } from './nodes/projection-node.js';
import { ExprArena } from './analysis/arena.js';
import { DEFAULT_LEAN_TUNING, type LeanTuning } from './optimizer-tuning.js';
import type { LeanContext, LeanInterceptor } from './framework/context.js';
import type { LeanResult, LeanRuleHandle, LeanRuleTable } from './framework/registry.js';
import { DebugTraceHook, type TraceHook } from './framework/trace.js';
import { ruleLeanColumn, ruleLeanProjection, ruleLeanSymbol } from './rules/lean/rule-lean-projection.js';
import { ruleLeanColumnWise, ruleLeanSelection } from './rules/lean/rule-lean-broadcast.js';
import { ruleLeanBy, ruleLeanReduction, ruleLeanSummary } from './rules/lean/rule-lean-aggregate.js';
import {
	ruleLeanApply,
	ruleLeanDistinct,
	ruleLeanHead,
	ruleLeanLabel,
	ruleLeanMap,
	ruleLeanReLabel,
	ruleLeanSort,
} from './rules/lean/rule-lean-passthrough.js';
import { ruleLeanJoin } from './rules/lean/rule-lean-join.js';

// Re-export for convenience
export { DEFAULT_LEAN_TUNING };

const log = createLogger('optimizer');
const warnLog = log.extend('warn');

const LEAN_RULES: LeanRuleTable = {
	[ExprKind.Symbol]: ruleLeanSymbol,
	[ExprKind.Projection]: ruleLeanProjection,
	[ExprKind.Column]: ruleLeanColumn,
	[ExprKind.Selection]: ruleLeanSelection,
	[ExprKind.ColumnWise]: ruleLeanColumnWise,
	[ExprKind.Reduction]: ruleLeanReduction,
	[ExprKind.Summary]: ruleLeanSummary,
	[ExprKind.By]: ruleLeanBy,
	[ExprKind.Sort]: ruleLeanSort,
	[ExprKind.Distinct]: ruleLeanDistinct,
	[ExprKind.Head]: ruleLeanHead,
	[ExprKind.Label]: ruleLeanLabel,
	[ExprKind.ReLabel]: ruleLeanReLabel,
	[ExprKind.Map]: ruleLeanMap,
	[ExprKind.Apply]: ruleLeanApply,
	[ExprKind.Join]: ruleLeanJoin,
};

/**
 * The lean-projection rule for a node kind
 */
export function resolveLeanRule<K extends ExprKind>(kind: K): LeanRuleHandle<K> {
	return LEAN_RULES[kind];
}

export interface LeanOptions {
	/** Overrides of the default tuning */
	tuning?: Partial<LeanTuning>;
	/** Trace hook; defaults to logging through debug channels */
	trace?: TraceHook;
}

/**
 * Rewrites expression trees so that every table leaf carries only the columns
 * that are ultimately consumed.
 */
export class LeanOptimizer {
	readonly tuning: LeanTuning;
	private readonly trace: TraceHook;

	constructor(options: LeanOptions = {}) {
		this.tuning = { ...DEFAULT_LEAN_TUNING, ...options.tuning };
		this.trace = options.trace ?? new DebugTraceHook();
	}

	/**
	 * Lean `expr` for all of its own columns. The result has the same schema.
	 */
	optimize(expr: ExprNode): ExprNode {
		log('Leaning %s', expr.toString());
		this.trace.onPhaseStart?.('lean-projection');

		const requested = expr.hasKnownSchema ? expr.columns : [];
		let result = this.leanNode(expr, new Set(requested), 0).node;

		// Leaf projections are sorted; restore the caller's column order
		if (expr.hasKnownSchema && !sameOrder(result.columns, requested) && requested.every(name => result.schema.has(name))) {
			result = new ProjectionNode(result, requested);
		}

		if (this.tuning.verifySchema && expr.hasKnownSchema && !result.schema.equals(expr.schema)) {
			throw new OptimizerError(
				`Leaning changed the schema of ${expr.toString()} from ${expr.schema.toString()} to ${result.schema.toString()}`,
				StatusCode.INTERNAL
			);
		}

		if (this.tuning.internSubtrees) {
			result = new ExprArena().intern(result);
		}

		this.trace.onPhaseEnd?.('lean-projection');
		log('Leaned to %s', result.toString());
		return result;
	}

	/**
	 * One rule step: lean `node` so it carries no more than `fields` require
	 */
	leanNode(node: ExprNode, fields: ReadonlySet<string>, depth: number, interceptors: readonly LeanInterceptor[] = []): LeanResult {
		if (depth > this.tuning.maxDepth) {
			throw new OptimizerError(`Maximum lean depth ${this.tuning.maxDepth} exceeded at ${node.nodeType}`, StatusCode.INTERNAL);
		}

		if (fields.size > 0) {
			const schema = node.schema;
			for (const name of fields) {
				if (!schema.has(name)) {
					warnLog('Requested %s from %s', name, node.toString());
					throw new OptimizerError(`Requested field '${name}' is not one of ${node.schema.toString()} of ${node.toString()}`);
				}
			}
		}

		for (const intercept of interceptors) {
			const intercepted = intercept(node, fields);
			if (intercepted) {
				return intercepted;
			}
		}

		const rule = resolveLeanRule(node.nodeType);
		const context: LeanContext = {
			tuning: this.tuning,
			depth,
			trace: this.trace,
			lean: (child, childFields) => this.leanNode(child, new Set(childFields), depth + 1, interceptors),
			leanIntercepted: (child, childFields, intercept) =>
				this.leanNode(child, new Set(childFields), depth + 1, [intercept, ...interceptors]),
		};

		this.trace.onRuleStart?.(rule, node, fields);
		const result = rule.run(node, fields, context);
		this.trace.onRuleEnd?.(rule, node, result);
		return result;
	}
}

/**
 * Insert projections so the dataset stays as thin as possible.
 *
 * >>> t = symbol('t', 'var * {a: int, b: int, c: int, d: int}')
 * >>> leanProjection(column(select(t, greaterThan(column(t, 'a'), 0)), 'b'))
 * t[['a', 'b']][t[['a', 'b']]['a'] > 0]['b']
 */
export function leanProjection(expr: ExprNode, options?: LeanOptions): ExprNode {
	return new LeanOptimizer(options).optimize(expr);
}

function sameOrder(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every((name, i) => name === b[i]);
}
