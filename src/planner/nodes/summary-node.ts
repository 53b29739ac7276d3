import { ExprKind } from './expr-kind.js';
import { ExprNode, type LogicalAttributes } from './expr-node.js';
import { RecordType, type Dimension } from '../../common/datatype.js';
import { constructionError, leanframeError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { collectReductions, replaceReductions, type ScalarExpr } from './scalar.js';
import { ReductionNode } from './reduction-node.js';

export type SummaryEntry = {
	readonly name: string;
	/** A reduction (wrapped as ReductionValue) or a scalar expression over reductions */
	readonly value: ScalarExpr;
};

/**
 * A single row of named aggregates, each computed over its own (possibly different) child.
 *
 * >>> summary(total=sum(t['amount']), n=count(t['id']))
 */
export class SummaryNode extends ExprNode {
	override readonly nodeType = ExprKind.Summary;
	readonly entries: readonly SummaryEntry[];

	constructor(entries: readonly SummaryEntry[]) {
		super();
		if (entries.length === 0) {
			constructionError('A summary needs at least one entry');
		}
		const names = new Set<string>();
		for (const entry of entries) {
			if (names.has(entry.name)) {
				constructionError(`Duplicate summary entry '${entry.name}'`);
			}
			names.add(entry.name);
			if (collectReductions(entry.value).length === 0) {
				constructionError(`Summary entry '${entry.name}' does not reduce`);
			}
		}
		this.entries = Object.freeze([...entries]);
	}

	get names(): readonly string[] {
		return this.entries.map(e => e.name);
	}

	protected computeSchema(): RecordType {
		return new RecordType(this.entries.map(e => ({ name: e.name, type: e.value.type })));
	}

	override get dimension(): Dimension | null {
		return null;
	}

	getChildren(): readonly ReductionNode[] {
		return this.entries.flatMap(e => collectReductions(e.value));
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		const reductions = newChildren.map(asReduction);
		const expected = this.getChildren();
		if (reductions.length !== expected.length) {
			leanframeError(`${this.nodeType} expects ${expected.length} children, got ${reductions.length}`, StatusCode.INTERNAL);
		}
		if (reductions.every((r, i) => r === expected[i])) {
			return this;
		}
		let offset = 0;
		const entries = this.entries.map(entry => {
			const count = collectReductions(entry.value).length;
			const value = replaceReductions(entry.value, reductions.slice(offset, offset + count));
			offset += count;
			return { name: entry.name, value };
		});
		return new SummaryNode(entries);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { entries: this.entries.map(e => [e.name, e.value.key]) };
	}

	override toString(): string {
		return `summary(${this.entries.map(e => `${e.name}=${e.value.toString()}`).join(', ')})`;
	}
}

function asReduction(node: ExprNode): ReductionNode {
	if (!(node instanceof ReductionNode)) {
		leanframeError(`Summary children must be reductions, got ${node.nodeType}`, StatusCode.INTERNAL);
	}
	return node;
}
