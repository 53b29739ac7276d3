/**
 * Rules: lean projection through reductions, summaries and group-by
 *
 * A reduction only reads the column it collapses, so whatever was requested
 * above it is irrelevant. Summaries drop entries nobody asked for. Group-by
 * first records what grouper and apply each need from the grouped table, then
 * leans that table once and pins it, so both sides read the same narrowed copy.
 */

import { ExprKind } from '../../nodes/expr-kind.js';
import type { ExprNode } from '../../nodes/expr-node.js';
import { ReductionNode } from '../../nodes/reduction-node.js';
import { SummaryNode, type SummaryEntry } from '../../nodes/summary-node.js';
import { ByNode } from '../../nodes/by-node.js';
import { ColumnNode } from '../../nodes/column-node.js';
import { ColumnWiseNode } from '../../nodes/columnwise-node.js';
import { LabelNode } from '../../nodes/label-node.js';
import { collectReductions, replaceReductions } from '../../nodes/scalar.js';
import { contains, isIdentical } from '../../analysis/structural.js';
import { createLeanRule, intersectFields, leanResult, unionFields } from '../../framework/registry.js';
import type { LeanContext, LeanInterceptor } from '../../framework/context.js';
import { OptimizerError } from '../../../common/errors.js';
import { StatusCode } from '../../../common/types.js';
import { createLogger } from '../../../common/logger.js';

const log = createLogger('optimizer:rule:lean-aggregate');

export const ruleLeanReduction = createLeanRule('lean-reduction', ExprKind.Reduction, ReductionNode, (node, _fields, context) => {
	const child = node.child;
	const request = isColumnValued(child) || !child.hasKnownSchema ? [] : child.columns;
	const result = context.lean(child, request);
	return leanResult(node.withChild(result.node), result.fields);
});

export const ruleLeanSummary = createLeanRule('lean-summary', ExprKind.Summary, SummaryNode, (node, fields, context) => {
	// A summary of no entries is not valid; an empty request keeps them all
	const kept = fields.size > 0 ? node.entries.filter(entry => fields.has(entry.name)) : node.entries;
	const needed = new Set<string>();

	const entries: SummaryEntry[] = kept.map(entry => {
		const reductions = collectReductions(entry.value).map(reduction => {
			const result = leanReduction(reduction, context);
			result.fields.forEach(name => needed.add(name));
			return result.node;
		});
		return { name: entry.name, value: replaceReductions(entry.value, reductions) };
	});

	if (kept.length < node.entries.length) {
		log('Dropped summary entries [%s]', node.names.filter(name => !fields.has(name)).join(', '));
	}
	if (kept.length === node.entries.length && entries.every((entry, i) => entry.value === kept[i].value)) {
		return leanResult(node, needed);
	}
	return leanResult(new SummaryNode(entries), needed);
});

export const ruleLeanBy = createLeanRule('lean-by', ExprKind.By, ByNode, (node, fields, context) => {
	const source = node.parent;
	const grouperRequest = intersectFields(fields, node.grouper.columns);
	let applyRequest = intersectFields(fields, node.apply.columns);

	// First pass: learn what each side asks of the grouped table
	const grouperReads = readsOfSource(node.grouper, grouperRequest, source, context);
	let applyReads = readsOfSource(node.apply, applyRequest, source, context);
	if (applyReads.length === 0) {
		// The requested entries do not touch the grouped table; keep them all
		applyRequest = new Set(node.apply.columns);
		applyReads = readsOfSource(node.apply, applyRequest, source, context);
	}

	const reads = [...grouperReads, ...applyReads];
	const needed = source.hasKnownSchema && reads.some(request => request.size === 0)
		? new Set(source.columns)
		: reads.reduce<Set<string>>((acc, request) => unionFields(acc, request), new Set());

	// Second pass: both sides read one leaned copy of the grouped table
	const pinned = context.lean(source, needed);
	const pin: LeanInterceptor = candidate => isIdentical(candidate, source) ? pinned : undefined;
	const grouper = context.leanIntercepted(node.grouper, grouperRequest, pin);
	const apply = context.leanIntercepted(node.apply, applyRequest, pin);

	if (!contains(grouper.node, pinned.node) || !contains(apply.node, pinned.node)) {
		throw new OptimizerError(
			`Group-by source ${pinned.node.toString()} is not read by both ${grouper.node.toString()} and ${apply.node.toString()}`,
			StatusCode.INTERNAL
		);
	}
	log('Group-by source leaned to %s', pinned.node.toString());

	const union = unionFields(grouper.fields, apply.fields);
	if (pinned.node === node.parent && grouper.node === node.grouper && apply.node === node.apply) {
		return leanResult(node, union);
	}
	return leanResult(new ByNode(pinned.node, grouper.node, apply.node), union);
});

/** Column-valued nodes whose rules add the columns they read themselves */
function isColumnValued(node: ExprNode): boolean {
	return node instanceof ColumnNode || node instanceof ColumnWiseNode || node instanceof LabelNode;
}

function leanReduction(reduction: ReductionNode, context: LeanContext): { node: ReductionNode; fields: ReadonlySet<string> } {
	const result = context.lean(reduction, []);
	if (!(result.node instanceof ReductionNode)) {
		throw new OptimizerError(`Leaning ${reduction.toString()} produced ${result.node.nodeType}`, StatusCode.INTERNAL);
	}
	return { node: result.node, fields: result.fields };
}

/** The requests that leaning `side` makes of `source`, one per place it is reached */
function readsOfSource(side: ExprNode, request: ReadonlySet<string>, source: ExprNode, context: LeanContext): ReadonlySet<string>[] {
	const reads: ReadonlySet<string>[] = [];
	context.leanIntercepted(side, request, (candidate, candidateFields) => {
		if (!isIdentical(candidate, source)) return undefined;
		reads.push(candidateFields);
		// The source itself is leaned once, afterwards
		return leanResult(candidate, candidateFields);
	});
	return reads;
}
