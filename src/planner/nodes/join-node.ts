import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import { RecordType, type Dimension } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { sameType } from '../../types/element-type.js';

/**
 * Join two tables on a key column of each.
 *
 * >>> join(names, amounts, 'id')
 * >>> join(names, accounts, 'id', 'acctNumber')
 */
export class JoinNode extends ExprNode {
	override readonly nodeType = ExprKind.Join;
	readonly onRight: string;

	constructor(
		public readonly left: ExprNode,
		public readonly right: ExprNode,
		public readonly onLeft: string,
		onRight?: string,
	) {
		super();
		this.onRight = onRight ?? onLeft;
		const leftType = left.schema.typeOf(onLeft);
		const rightType = right.schema.typeOf(this.onRight);
		if (!sameType(leftType, rightType)) {
			constructionError(
				`Schemas of joining columns do not match: ${onLeft}: ${leftType.name} vs ${this.onRight}: ${rightType.name}`,
				StatusCode.MISMATCH
			);
		}
		// Duplicate names are a construction error, not a later schema failure
		this.computeSchema();
	}

	protected computeSchema(): RecordType {
		const right = this.right.schema.fields.filter(f => f.name !== this.onRight);
		return this.left.schema.concat(new RecordType(right));
	}

	override get dimension(): Dimension | null {
		return 'var';
	}

	getChildren(): readonly [ExprNode, ExprNode] {
		return [this.left, this.right];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 2);
		const [left, right] = newChildren;
		if (left === this.left && right === this.right) {
			return this;
		}
		return new JoinNode(left, right, this.onLeft, this.onRight);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { onLeft: this.onLeft, onRight: this.onRight };
	}

	override toString(): string {
		return `join(${this.left.toString()}, ${this.right.toString()}, ${quoteName(this.onLeft)}, ${quoteName(this.onRight)})`;
	}
}
