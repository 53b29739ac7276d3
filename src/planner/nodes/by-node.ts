import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import { RecordType, type Dimension, type RecordField } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { contains } from '../analysis/structural.js';

/**
 * Split-apply-combine: group the rows of `parent` by `grouper` and reduce each group with `apply`.
 *
 * >>> by(t['name'], sum(t['amount']))
 */
export class ByNode extends ExprNode {
	override readonly nodeType = ExprKind.By;

	constructor(
		public readonly parent: ExprNode,
		public readonly grouper: ExprNode,
		public readonly apply: ExprNode,
	) {
		super();
		if (apply.dimension !== null) {
			constructionError(`Expected a reducing apply expression, got ${apply.toString()}`, StatusCode.MISMATCH);
		}
		if (grouper.dimension === null) {
			constructionError(`Grouper must produce rows, got ${grouper.toString()}`, StatusCode.MISMATCH);
		}
		if (!contains(grouper, parent)) {
			constructionError(`Grouper ${grouper.toString()} is not derived from ${parent.toString()}`);
		}
		if (!contains(apply, parent)) {
			constructionError(`Apply ${apply.toString()} is not derived from ${parent.toString()}`);
		}
	}

	protected computeSchema(): RecordType {
		const fields: RecordField[] = [...this.grouper.schema.fields];
		const seen = new Set(fields.map(f => f.name));
		for (const field of this.apply.schema.fields) {
			if (!seen.has(field.name)) {
				seen.add(field.name);
				fields.push(field);
			}
		}
		return new RecordType(fields);
	}

	override get dimension(): Dimension | null {
		return 'var';
	}

	getChildren(): readonly [ExprNode, ExprNode, ExprNode] {
		return [this.parent, this.grouper, this.apply];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 3);
		const [parent, grouper, apply] = newChildren;
		if (parent === this.parent && grouper === this.grouper && apply === this.apply) {
			return this;
		}
		return new ByNode(parent, grouper, apply);
	}

	getLogicalAttributes(): LogicalAttributes {
		return {};
	}

	override toString(): string {
		return `by(${this.grouper.toString()}, ${this.apply.toString()})`;
	}
}
