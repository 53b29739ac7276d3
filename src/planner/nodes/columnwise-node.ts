import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { collectReductions, renderScalar, symbolNames, walkScalar, type ScalarExpr } from './scalar.js';

/**
 * A scalar expression broadcast over every row of a single source table.
 * Column placeholders inside `expr` name columns of `child`.
 */
export class ColumnWiseNode extends ExprNode {
	override readonly nodeType = ExprKind.ColumnWise;

	constructor(public readonly child: ExprNode, public readonly expr: ScalarExpr) {
		super();
		if (collectReductions(expr).length > 0) {
			constructionError('Reductions cannot be broadcast column-wise', StatusCode.MISMATCH);
		}
		const schema = child.schema;
		walkScalar(expr, e => {
			if (e.kind !== 'symbol') return;
			if (!schema.has(e.name)) {
				constructionError(`Mismatched column: '${e.name}' is not a column of ${child.toString()}`, StatusCode.NOTFOUND);
			}
		});
	}

	/** Every column placeholder referenced by the scalar expression, sorted, without duplicates */
	activeColumns(): string[] {
		return symbolNames(this.expr);
	}

	/**
	 * Name of the single output field: the one active column when there is exactly one,
	 * otherwise the rendered expression.
	 */
	get fieldName(): string {
		const active = this.activeColumns();
		if (active.length === 1) {
			return active[0];
		}
		return active.length === 0 ? '_0' : renderScalar(this.expr, name => name);
	}

	protected computeSchema(): RecordType {
		return RecordType.of([this.fieldName, this.expr.type]);
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new ColumnWiseNode(child, this.expr);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { expr: this.expr.key };
	}

	override toString(): string {
		const parent = this.child.toString();
		return renderScalar(this.expr, name => `${parent}[${quoteName(name)}]`);
	}
}
