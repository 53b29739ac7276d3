import type { ExprNode } from '../nodes/expr-node.js';

/**
 * Interning table for expression nodes, addressed by structural key.
 * Interning a tree returns a tree in which structurally identical subtrees
 * are one instance, so "the same node" becomes object identity.
 */
export class ExprArena {
	private readonly nodes = new Map<string, ExprNode>();

	intern(node: ExprNode): ExprNode {
		const existing = this.nodes.get(node.key);
		if (existing) {
			return existing;
		}
		const children = node.getChildren();
		const canonicalChildren = children.map(child => this.intern(child));
		const canonical = canonicalChildren.every((child, i) => child === children[i])
			? node
			: node.withChildren(canonicalChildren);
		this.nodes.set(node.key, canonical);
		return canonical;
	}

	get(key: string): ExprNode | undefined {
		return this.nodes.get(key);
	}

	has(node: ExprNode): boolean {
		return this.nodes.has(node.key);
	}

	get size(): number {
		return this.nodes.size;
	}
}
