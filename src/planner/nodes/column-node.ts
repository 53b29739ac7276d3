import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

/**
 * Single-column projection. Columns are the inputs of column-wise scalar operators.
 */
export class ColumnNode extends ExprNode {
	override readonly nodeType = ExprKind.Column;

	constructor(public readonly child: ExprNode, public readonly column: string) {
		super();
		if (!child.schema.has(column)) {
			constructionError(`Mismatched column: '${column}' is not a column of ${child.toString()}`, StatusCode.NOTFOUND);
		}
	}

	protected computeSchema(): RecordType {
		return this.child.schema.restrict([this.column]);
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new ColumnNode(child, this.column);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { column: this.column };
	}

	override toString(): string {
		return `${this.child.toString()}[${quoteName(this.column)}]`;
	}
}
