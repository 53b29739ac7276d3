/**
 * Rules: lean projection through nodes that keep (or rename) their child's columns
 *
 * These report the fields their child reported, so a consumer above always
 * sees names from the source table rather than output labels.
 */

import { ExprKind } from '../../nodes/expr-kind.js';
import type { ExprNode } from '../../nodes/expr-node.js';
import { SortNode } from '../../nodes/sort-node.js';
import { DistinctNode } from '../../nodes/distinct-node.js';
import { HeadNode } from '../../nodes/head-node.js';
import { LabelNode } from '../../nodes/label-node.js';
import { ReLabelNode } from '../../nodes/relabel-node.js';
import { MapNode } from '../../nodes/map-node.js';
import { ApplyNode } from '../../nodes/apply-node.js';
import { substitute } from '../../analysis/substitute.js';
import { createLeanRule, intersectFields, leanResult, unionFields } from '../../framework/registry.js';

export const ruleLeanSort = createLeanRule('lean-sort', ExprKind.Sort, SortNode, (node, fields, context) => {
	const keyExpr = node.keyExpr;
	if (!keyExpr) {
		const result = context.lean(node.child, unionFields(fields, node.keyColumns ?? []));
		return leanResult(node.withChildren([result.node]), result.fields);
	}

	// A computed key is leaned on its own, like a selection predicate
	const key = context.lean(keyExpr, []);
	const result = context.lean(node.child, unionFields(fields, intersectFields(key.fields, node.child.columns)));
	if (result.node === node.child) {
		return leanResult(node, result.fields);
	}
	const rebuilt = new SortNode(result.node, substitute(keyExpr, node.child, result.node), node.ascending);
	return leanResult(rebuilt, result.fields);
});

export const ruleLeanDistinct = createLeanRule('lean-distinct', ExprKind.Distinct, DistinctNode, (node, _fields, context) => {
	// Row identity depends on every column
	const result = context.lean(node.child, allColumns(node.child));
	return leanResult(node.withChildren([result.node]), result.fields);
});

export const ruleLeanHead = createLeanRule('lean-head', ExprKind.Head, HeadNode, (node, fields, context) => {
	const result = context.lean(node.child, fields);
	return leanResult(node.withChildren([result.node]), result.fields);
});

export const ruleLeanLabel = createLeanRule('lean-label', ExprKind.Label, LabelNode, (node, _fields, context) => {
	const result = context.lean(node.child, node.child.columns);
	return leanResult(node.withChildren([result.node]), result.fields);
});

export const ruleLeanReLabel = createLeanRule('lean-relabel', ExprKind.ReLabel, ReLabelNode, (node, fields, context) => {
	const inverse = new Map(node.labels.map(([from, to]) => [to, from]));
	const result = context.lean(node.child, [...fields].map(name => inverse.get(name) ?? name));
	if (result.node === node.child) {
		return leanResult(node, result.fields);
	}

	const kept = new Set(result.node.columns);
	const mapping = new Map(node.labels.filter(([from]) => kept.has(from)));
	return leanResult(new ReLabelNode(result.node, mapping), result.fields);
});

// User functions see whole rows, so nothing below them can be pruned

export const ruleLeanMap = createLeanRule('lean-map', ExprKind.Map, MapNode, (node, _fields, context) => {
	const result = context.lean(node.child, allColumns(node.child));
	return leanResult(node.withChildren([result.node]), result.fields);
});

export const ruleLeanApply = createLeanRule('lean-apply', ExprKind.Apply, ApplyNode, (node, _fields, context) => {
	const result = context.lean(node.child, allColumns(node.child));
	return leanResult(node.withChildren([result.node]), result.fields);
});

function allColumns(node: ExprNode): readonly string[] {
	return node.hasKnownSchema ? node.columns : [];
}
