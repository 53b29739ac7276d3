import type { ExprNode } from '../nodes/expr-node.js';
import { isIdentical } from './structural.js';

/**
 * Replace every subtree structurally identical to `from` with `to`, rebuilding ancestors.
 * The replacement itself is not searched, so `to` may contain `from`.
 * Subtrees that do not contain `from` are returned as-is.
 */
export function substitute(expr: ExprNode, from: ExprNode, to: ExprNode): ExprNode {
	const memo = new Map<string, ExprNode>();

	const visit = (node: ExprNode): ExprNode => {
		if (isIdentical(node, from)) {
			return to;
		}
		const done = memo.get(node.key);
		if (done) {
			return done;
		}
		const children = node.getChildren();
		const replaced = children.map(visit);
		const result = replaced.every((child, i) => child === children[i]) ? node : node.withChildren(replaced);
		memo.set(node.key, result);
		return result;
	};

	return visit(expr);
}
