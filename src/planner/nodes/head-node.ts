import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import type { Dimension, RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

export const DEFAULT_HEAD_ROWS = 10;

/**
 * LIMIT n
 */
export class HeadNode extends ExprNode {
	override readonly nodeType = ExprKind.Head;

	constructor(public readonly child: ExprNode, public readonly n: number = DEFAULT_HEAD_ROWS) {
		super();
		if (!Number.isInteger(n) || n < 0) {
			constructionError(`Head row count must be a non-negative integer, got ${n}`, StatusCode.RANGE);
		}
		if (child.dimension === null) {
			constructionError(`Cannot take the head of reduced expression ${child.toString()}`, StatusCode.MISMATCH);
		}
	}

	protected computeSchema(): RecordType {
		return this.child.schema;
	}

	override get dimension(): Dimension | null {
		const childDim = this.child.dimension;
		return typeof childDim === 'number' ? Math.min(childDim, this.n) : this.n;
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new HeadNode(child, this.n);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { n: this.n };
	}

	override toString(): string {
		return `${this.child.toString()}.head(${this.n})`;
	}
}
