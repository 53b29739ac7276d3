import type { RecordType, TableShape } from '../../common/datatype.js';
import type { ExprNode } from '../nodes/expr-node.js';
import { SymbolNode } from '../nodes/symbol-node.js';
import { ProjectionNode } from '../nodes/projection-node.js';
import { ColumnNode } from '../nodes/column-node.js';
import { SelectionNode } from '../nodes/selection-node.js';
import { SortNode, type SortKey } from '../nodes/sort-node.js';
import { DistinctNode } from '../nodes/distinct-node.js';
import { HeadNode, DEFAULT_HEAD_ROWS } from '../nodes/head-node.js';
import { LabelNode } from '../nodes/label-node.js';
import { ReLabelNode, type Relabeling } from '../nodes/relabel-node.js';
import { MapNode, type UserFunction } from '../nodes/map-node.js';
import { ApplyNode, type ApplyShape } from '../nodes/apply-node.js';
import { JoinNode } from '../nodes/join-node.js';

/**
 * A table leaf.
 *
 * @example
 * ```typescript
 * const accounts = symbol('accounts', 'var * {name: string, amount: int32, id: int32}');
 * ```
 */
export function symbol(name: string, shape: TableShape | RecordType | string): SymbolNode {
	return new SymbolNode(name, shape);
}

/** `t['a']` */
export function column(table: ExprNode, name: string): ColumnNode {
	return new ColumnNode(table, name);
}

/** `t[['a', 'b']]` */
export function project(table: ExprNode, columns: readonly string[]): ProjectionNode {
	return new ProjectionNode(table, columns);
}

/** `t[predicate]` */
export function select(table: ExprNode, predicate: ExprNode): SelectionNode {
	return new SelectionNode(table, predicate);
}

/** Sort by a column, a list of columns or a column-valued expression; defaults to the first column */
export function sort(table: ExprNode, key?: SortKey, ascending = true): SortNode {
	return new SortNode(table, key, ascending);
}

export function distinct(table: ExprNode): DistinctNode {
	return new DistinctNode(table);
}

export function head(table: ExprNode, n: number = DEFAULT_HEAD_ROWS): HeadNode {
	return new HeadNode(table, n);
}

export function label(expr: ExprNode, name: string): LabelNode {
	return new LabelNode(expr, name);
}

export function relabel(table: ExprNode, labels: Relabeling): ReLabelNode {
	return new ReLabelNode(table, labels);
}

/** Map a row function; pass `schema` to make the result's row type known */
export function map(table: ExprNode, func: UserFunction, schema?: RecordType | string): MapNode {
	return new MapNode(table, func, schema);
}

/** Apply a function to a whole table; pass `shape` to make the result's shape known */
export function apply(func: UserFunction, table: ExprNode, shape?: ApplyShape | string): ApplyNode {
	return new ApplyNode(func, table, shape);
}

/** Join on `onLeft` of `left` and `onRight` (default: the same name) of `right` */
export function join(left: ExprNode, right: ExprNode, onLeft: string, onRight?: string): JoinNode {
	return new JoinNode(left, right, onLeft, onRight);
}
