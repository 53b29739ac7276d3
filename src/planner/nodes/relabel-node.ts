import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, quoteName, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';

export type Relabeling = Readonly<Record<string, string>> | ReadonlyMap<string, string>;

/**
 * Renames columns, preserving their order.
 */
export class ReLabelNode extends ExprNode {
	override readonly nodeType = ExprKind.ReLabel;
	/** Old name -> new name, sorted by old name */
	readonly labels: readonly (readonly [string, string])[];

	constructor(public readonly child: ExprNode, labels: Relabeling) {
		super();
		const pairs = isMapping(labels) ? [...labels.entries()] : Object.entries(labels);
		this.labels = Object.freeze(pairs.sort(([a], [b]) => a < b ? -1 : a > b ? 1 : 0));
		for (const [from] of this.labels) {
			if (!child.schema.has(from)) {
				constructionError(`Cannot relabel '${from}': not a column of ${child.toString()}`, StatusCode.NOTFOUND);
			}
		}
		// Surfaces duplicate result names now rather than at first schema query
		child.schema.rename(this.mapping);
	}

	get mapping(): ReadonlyMap<string, string> {
		return new Map(this.labels);
	}

	protected computeSchema(): RecordType {
		return this.child.schema.rename(this.mapping);
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new ReLabelNode(child, this.mapping);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { labels: this.labels };
	}

	override toString(): string {
		const body = this.labels.map(([from, to]) => `${from}: ${quoteName(to)}`).join(', ');
		return `${this.child.toString()}.relabel({${body}})`;
	}
}

function isMapping(labels: Relabeling): labels is ReadonlyMap<string, string> {
	return labels instanceof Map;
}
