import type { ExprNode } from '../nodes/expr-node.js';
import { OptimizerError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { createLogger } from '../../common/logger.js';

const log = createLogger('analysis:common-subexpression');

/**
 * Find the most-derived subtree shared, structurally, by `a` and `b`.
 *
 * Both expressions are expected to grow from one originating table through
 * independent chains of rewrites. Among the shared subtrees the largest is
 * returned, since it contains every other shared subtree on its chain; ties go
 * to the one found first walking `a` breadth-first.
 *
 * @throws OptimizerError (INTERNAL) when nothing is shared
 */
export function commonSubexpression(a: ExprNode, b: ExprNode): ExprNode {
	const found = findCommonSubexpression(a, b);
	if (!found) {
		throw new OptimizerError(
			`No common subexpression between ${a.toString()} and ${b.toString()}`,
			StatusCode.INTERNAL
		);
	}
	log('Common subexpression of %s and %s is %s', a.nodeType, b.nodeType, found.toString());
	return found;
}

/** As commonSubexpression, but returns undefined when nothing is shared */
export function findCommonSubexpression(a: ExprNode, b: ExprNode): ExprNode | undefined {
	const inB = new Set<string>();
	collectKeys(b, inB);

	const sizes = new Map<string, number>();
	let best: ExprNode | undefined;
	let bestSize = 0;

	const seen = new Set<string>();
	const queue: ExprNode[] = [a];
	while (queue.length > 0) {
		const node = queue.shift();
		if (!node || seen.has(node.key)) continue;
		seen.add(node.key);

		if (inB.has(node.key)) {
			const size = subtreeSize(node, sizes);
			if (size > bestSize) {
				best = node;
				bestSize = size;
			}
			// Everything below is smaller and therefore not a better candidate
			continue;
		}
		queue.push(...node.getChildren());
	}

	return best;
}

function collectKeys(node: ExprNode, into: Set<string>): void {
	if (into.has(node.key)) return;
	into.add(node.key);
	node.getChildren().forEach(child => collectKeys(child, into));
}

function subtreeSize(node: ExprNode, memo: Map<string, number>): number {
	const known = memo.get(node.key);
	if (known !== undefined) return known;
	const size = 1 + node.getChildren().reduce((acc, child) => acc + subtreeSize(child, memo), 0);
	memo.set(node.key, size);
	return size;
}
