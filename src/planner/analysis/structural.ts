import type { ExprNode } from '../nodes/expr-node.js';

/** Structural key of an expression; equal keys mean structurally identical trees */
export function structuralKey(node: ExprNode): string {
	return node.key;
}

/**
 * Two nodes are the same expression iff they are structurally identical:
 * same kind, same logical attributes, and identical children, recursively.
 */
export function isIdentical(a: ExprNode, b: ExprNode): boolean {
	return a === b || a.key === b.key;
}

/** True if `sub` occurs structurally anywhere within `expr` (including `expr` itself) */
export function contains(expr: ExprNode, sub: ExprNode): boolean {
	if (isIdentical(expr, sub)) {
		return true;
	}
	return expr.getChildren().some(child => contains(child, sub));
}
