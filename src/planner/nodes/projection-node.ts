import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

/**
 * SELECT a, b FROM child
 *
 * Restricts and reorders the child's columns to an explicit list.
 */
export class ProjectionNode extends ExprNode {
	override readonly nodeType = ExprKind.Projection;
	readonly projected: readonly string[];

	constructor(public readonly child: ExprNode, columns: readonly string[]) {
		super();
		if (columns.length === 0) {
			constructionError(`Projection of ${child.toString()} must name at least one column`);
		}
		const seen = new Set<string>();
		for (const col of columns) {
			if (seen.has(col)) {
				constructionError(`Duplicate column '${col}' in projection of ${child.toString()}`);
			}
			seen.add(col);
			if (!child.schema.has(col)) {
				constructionError(`Mismatched columns: '${col}' is not a column of ${child.toString()}`, StatusCode.NOTFOUND);
			}
		}
		this.projected = Object.freeze([...columns]);
	}

	protected computeSchema(): RecordType {
		return this.child.schema.restrict(this.projected);
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new ProjectionNode(child, this.projected);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { columns: this.projected };
	}

	override toString(): string {
		return `${this.child.toString()}[[${this.projected.map(quoteName).join(', ')}]]`;
	}
}
