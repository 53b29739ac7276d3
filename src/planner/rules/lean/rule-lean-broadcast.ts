/**
 * Rules: lean projection through row-wise expressions
 *
 * Broadcasts need their active columns; selections need whatever their
 * predicate reads of the selected table in addition to what is requested of them.
 */

import { ExprKind } from '../../nodes/expr-kind.js';
import { ColumnWiseNode } from '../../nodes/columnwise-node.js';
import { SelectionNode } from '../../nodes/selection-node.js';
import { contains } from '../../analysis/structural.js';
import { substitute } from '../../analysis/substitute.js';
import { createLeanRule, intersectFields, leanResult, unionFields } from '../../framework/registry.js';
import { createLogger } from '../../../common/logger.js';

const log = createLogger('optimizer:rule:lean-broadcast');

export const ruleLeanColumnWise = createLeanRule('lean-columnwise', ExprKind.ColumnWise, ColumnWiseNode, (node, fields, context) => {
	const needed = unionFields(node.activeColumns(), intersectFields(fields, node.child.columns));
	const { node: child } = context.lean(node.child, needed);
	return leanResult(node.withChildren([child]), needed);
});

export const ruleLeanSelection = createLeanRule('lean-selection', ExprKind.Selection, SelectionNode, (node, fields, context) => {
	// The predicate is self-contained: lean it on its own to learn what it reads
	const predicate = context.lean(node.predicate, []);
	// A predicate built over some ancestor of the child reads that ancestor, not the child
	const overChild = contains(node.predicate, node.child);
	const needed = overChild
		? unionFields(fields, intersectFields(predicate.fields, node.child.columns))
		: new Set(fields);
	log('Selection on %s needs [%s]', node.child.toString(), [...needed].join(', '));

	const { node: child } = context.lean(node.child, needed);
	const rebuilt = overChild ? substitute(node.predicate, node.child, child) : predicate.node;
	if (child === node.child && rebuilt === node.predicate) {
		return leanResult(node, needed);
	}
	return leanResult(new SelectionNode(child, rebuilt), needed);
});
