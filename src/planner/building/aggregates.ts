import type { LiteralValue } from '../../common/types.js';
import type { ExprNode } from '../nodes/expr-node.js';
import { ReductionNode, type ReductionName } from '../nodes/reduction-node.js';
import { SummaryNode, type SummaryEntry } from '../nodes/summary-node.js';
import { ByNode } from '../nodes/by-node.js';
import { BinaryOp, Literal, ReductionValue, UnaryOp, type BinaryOperator, type ScalarExpr, type UnaryOperator } from '../nodes/scalar.js';
import { findCommonSubexpression } from '../analysis/common-subexpression.js';
import { constructionError } from '../../common/errors.js';

export function reduce(reduction: ReductionName, expr: ExprNode): ReductionNode {
	return new ReductionNode(reduction, expr);
}

export const any = (expr: ExprNode): ReductionNode => reduce('any', expr);
export const all = (expr: ExprNode): ReductionNode => reduce('all', expr);
export const sum = (expr: ExprNode): ReductionNode => reduce('sum', expr);
export const max = (expr: ExprNode): ReductionNode => reduce('max', expr);
export const min = (expr: ExprNode): ReductionNode => reduce('min', expr);
export const mean = (expr: ExprNode): ReductionNode => reduce('mean', expr);
export const variance = (expr: ExprNode): ReductionNode => reduce('var', expr);
export const std = (expr: ExprNode): ReductionNode => reduce('std', expr);
export const count = (expr: ExprNode): ReductionNode => reduce('count', expr);
export const nunique = (expr: ExprNode): ReductionNode => reduce('nunique', expr);

/** Operands of a scalar combination of reductions */
export type AggregateInput = ReductionNode | ScalarExpr | LiteralValue;

function toScalar(input: AggregateInput): ScalarExpr {
	if (input instanceof ReductionNode) return new ReductionValue(input);
	if (typeof input === 'object') return input;
	return new Literal(input);
}

/**
 * Combine reductions into one scalar summary value, e.g. `sum(a) / count(a)`.
 */
export function combine(op: BinaryOperator, left: AggregateInput, right: AggregateInput): ScalarExpr {
	return new BinaryOp(op, toScalar(left), toScalar(right));
}

export function combineUnary(op: UnaryOperator, operand: AggregateInput): ScalarExpr {
	return new UnaryOp(op, toScalar(operand));
}

/**
 * Named aggregates, one output field per name in insertion order.
 *
 * @example
 * ```typescript
 * summary({ total: sum(column(t, 'amount')), n: count(column(t, 'id')) });
 * ```
 */
export function summary(values: Readonly<Record<string, ReductionNode | ScalarExpr>>): SummaryNode {
	const entries: SummaryEntry[] = Object.entries(values).map(([name, value]) => ({ name, value: toScalar(value) }));
	return new SummaryNode(entries);
}

/**
 * Split-apply-combine. The grouped table defaults to the common subexpression of grouper and apply.
 *
 * @example
 * ```typescript
 * by(column(t, 'name'), sum(column(t, 'amount')));
 * ```
 */
export function by(grouper: ExprNode, applied: ExprNode, parent?: ExprNode): ByNode {
	const grouped = parent ?? findCommonSubexpression(grouper, applied);
	if (!grouped) {
		constructionError(`Grouper ${grouper.toString()} and apply ${applied.toString()} share no table`);
	}
	return new ByNode(grouped, grouper, applied);
}
