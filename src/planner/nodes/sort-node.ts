import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { contains } from '../analysis/structural.js';

/**
 * Sort key: a single column name, a list of column names, or a column-valued
 * expression derived from the sorted table (e.g. `negate(t['amount'])`).
 */
export type SortKey = string | readonly string[] | ExprNode;

/**
 * ORDER BY key
 */
export class SortNode extends ExprNode {
	override readonly nodeType = ExprKind.Sort;
	/** Key columns when sorting by name */
	readonly keyColumns: readonly string[] | undefined;
	/** Key expression when sorting by a computed column */
	readonly keyExpr: ExprNode | undefined;

	constructor(public readonly child: ExprNode, key?: SortKey, public readonly ascending = true) {
		super();
		if (key instanceof ExprNode) {
			if (key.schema.size !== 1 || key.dimension === null) {
				constructionError(`Sort key must be a single column, got ${key.toString()}`, StatusCode.MISMATCH);
			}
			if (!contains(key, child)) {
				constructionError(`Sort key ${key.toString()} is not derived from ${child.toString()}`);
			}
			this.keyExpr = key;
			this.keyColumns = undefined;
		} else {
			const columns = key === undefined ? [child.columns[0]] : typeof key === 'string' ? [key] : [...key];
			if (columns.length === 0) {
				constructionError(`Sort of ${child.toString()} needs at least one key column`);
			}
			for (const col of columns) {
				if (!child.schema.has(col)) {
					constructionError(`Mismatched column: cannot sort by '${col}', not a column of ${child.toString()}`, StatusCode.NOTFOUND);
				}
			}
			this.keyColumns = Object.freeze(columns);
			this.keyExpr = undefined;
		}
	}

	/** The key as passed to the constructor, for rebuilding */
	get sortKey(): SortKey {
		return this.keyExpr ?? this.keyColumns ?? [];
	}

	protected computeSchema(): RecordType {
		return this.child.schema;
	}

	getChildren(): readonly ExprNode[] {
		return this.keyExpr ? [this.child, this.keyExpr] : [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, this.keyExpr ? 2 : 1);
		const child = newChildren[0];
		const keyExpr: ExprNode | undefined = newChildren[1];
		if (child === this.child && keyExpr === this.keyExpr) {
			return this;
		}
		return new SortNode(child, keyExpr ?? this.keyColumns, this.ascending);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { key: this.keyColumns ?? 'expr', ascending: this.ascending };
	}

	override toString(): string {
		let key: string;
		if (this.keyExpr) {
			key = this.keyExpr.toString();
		} else if (this.keyColumns && this.keyColumns.length === 1) {
			key = quoteName(this.keyColumns[0]);
		} else {
			key = `[${(this.keyColumns ?? []).map(quoteName).join(', ')}]`;
		}
		return `${this.child.toString()}.sort(${key}, ascending=${this.ascending})`;
	}
}
