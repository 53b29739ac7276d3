import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';

/**
 * Removes duplicate rows. Row identity depends on every column of the child.
 */
export class DistinctNode extends ExprNode {
	override readonly nodeType = ExprKind.Distinct;

	constructor(public readonly child: ExprNode) {
		super();
	}

	protected computeSchema(): RecordType {
		return this.child.schema;
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new DistinctNode(child);
	}

	getLogicalAttributes(): LogicalAttributes {
		return {};
	}

	override toString(): string {
		return `distinct(${this.child.toString()})`;
	}
}
