import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

/**
 * Names the single field of a column-valued (or reduced) expression.
 */
export class LabelNode extends ExprNode {
	override readonly nodeType = ExprKind.Label;

	constructor(public readonly child: ExprNode, public readonly label: string) {
		super();
		if (child.schema.size !== 1) {
			constructionError(`Can only label a single-column expression, got ${child.schema.toString()}`, StatusCode.MISMATCH);
		}
	}

	protected computeSchema(): RecordType {
		return RecordType.of([this.label, this.child.dtype]);
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new LabelNode(child, this.label);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { label: this.label };
	}

	override toString(): string {
		return `${this.child.toString()}.label(${quoteName(this.label)})`;
	}
}
