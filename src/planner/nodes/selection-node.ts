import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import type { Dimension, RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

/**
 * WHERE predicate
 *
 * Keeps the rows of `child` for which the boolean, column-valued predicate holds.
 */
export class SelectionNode extends ExprNode {
	override readonly nodeType = ExprKind.Selection;

	constructor(public readonly child: ExprNode, public readonly predicate: ExprNode) {
		super();
		const fields = predicate.schema.fields;
		if (fields.length !== 1 || !fields[0].type.isBoolean) {
			constructionError(
				`Must select over a boolean predicate. Got: ${child.toString()}[${predicate.toString()}] of type ${predicate.schema.toString()}`,
				StatusCode.MISMATCH
			);
		}
	}

	protected computeSchema(): RecordType {
		// Selection preserves the type of its child
		return this.child.schema;
	}

	override get dimension(): Dimension | null {
		return 'var';
	}

	getChildren(): readonly [ExprNode, ExprNode] {
		return [this.child, this.predicate];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 2);
		const [child, predicate] = newChildren;
		if (child === this.child && predicate === this.predicate) {
			return this;
		}
		return new SelectionNode(child, predicate);
	}

	getLogicalAttributes(): LogicalAttributes {
		return {};
	}

	override toString(): string {
		return `${this.child.toString()}[${this.predicate.toString()}]`;
	}
}
