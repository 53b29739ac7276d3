/**
 * Rules: lean projection at table leaves and explicit column selections
 *
 * Symbol gets wrapped in a projection of exactly the requested columns; existing
 * projections and column accesses narrow to what their consumers need and pass
 * the request on to their child.
 */

import { ExprKind } from '../../nodes/expr-kind.js';
import { SymbolNode } from '../../nodes/symbol-node.js';
import { ProjectionNode } from '../../nodes/projection-node.js';
import { ColumnNode } from '../../nodes/column-node.js';
import { createLeanRule, leanResult, sortedFields, unionFields } from '../../framework/registry.js';

export const ruleLeanSymbol = createLeanRule('lean-symbol', ExprKind.Symbol, SymbolNode, (node, fields) => {
	// A projection of zero columns is not a table; an empty request keeps everything
	const names = fields.size > 0 ? sortedFields(fields) : [...node.columns];
	return leanResult(new ProjectionNode(node, names), names);
});

export const ruleLeanProjection = createLeanRule('lean-projection', ExprKind.Projection, ProjectionNode, (node, fields, context) => {
	const keep = fields.size > 0 ? node.projected.filter(name => fields.has(name)) : node.projected;
	const { node: child } = context.lean(node.child, keep);

	// Projecting a projection of the same columns only reorders
	const source = child instanceof ProjectionNode && sameColumnSet(child.projected, keep) ? child.child : child;
	if (source === node.child && keep.length === node.projected.length) {
		return leanResult(node, keep);
	}
	return leanResult(new ProjectionNode(source, keep), keep);
});

export const ruleLeanColumn = createLeanRule('lean-column', ExprKind.Column, ColumnNode, (node, fields, context) => {
	const needed = unionFields(fields, [node.column]);
	const { node: child } = context.lean(node.child, needed);
	return leanResult(node.withChildren([child]), needed);
});

function sameColumnSet(a: readonly string[], b: readonly string[]): boolean {
	if (a.length !== b.length) return false;
	const set = new Set(a);
	return b.every(name => set.has(name));
}
