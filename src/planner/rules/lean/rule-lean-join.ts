/**
 * Rule: lean projection through joins
 *
 * Each side keeps the requested columns it owns plus its join key.
 */

import { ExprKind } from '../../nodes/expr-kind.js';
import { JoinNode } from '../../nodes/join-node.js';
import { createLeanRule, intersectFields, leanResult, unionFields } from '../../framework/registry.js';

export const ruleLeanJoin = createLeanRule('lean-join', ExprKind.Join, JoinNode, (node, fields, context) => {
	const left = context.lean(node.left, unionFields(intersectFields(fields, node.left.columns), [node.onLeft]));
	const right = context.lean(node.right, unionFields(intersectFields(fields, node.right.columns), [node.onRight]));
	return leanResult(
		node.withChildren([left.node, right.node]),
		unionFields(fields, [node.onLeft, node.onRight])
	);
});
