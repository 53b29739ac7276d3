import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import { RecordType, type Dimension } from '../../common/datatype.js';
import { constructionError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { BOOL_TYPE, FLOAT64_TYPE, INT64_TYPE, type ElementType } from '../../types/element-type.js';

export type ReductionName = 'any' | 'all' | 'sum' | 'max' | 'min' | 'mean' | 'var' | 'std' | 'count' | 'nunique';

export const REDUCTION_NAMES: readonly ReductionName[] = ['any', 'all', 'sum', 'max', 'min', 'mean', 'var', 'std', 'count', 'nunique'];

/** Reductions that are defined over whole rows as well as single columns */
const ROW_REDUCTIONS: ReadonlySet<ReductionName> = new Set(['count', 'nunique']);

/**
 * Collapses the row dimension of its child to a single value.
 *
 * >>> sum(t['amount'])
 */
export class ReductionNode extends ExprNode {
	override readonly nodeType = ExprKind.Reduction;
	private readonly resultType: ElementType;

	constructor(public readonly reduction: ReductionName, public readonly child: ExprNode) {
		super();
		const fields = child.schema.fields;
		if (fields.length !== 1) {
			if (!ROW_REDUCTIONS.has(reduction)) {
				constructionError(`${reduction} needs a single-column input, got ${child.schema.toString()}`, StatusCode.MISMATCH);
			}
			this.resultType = INT64_TYPE;
		} else {
			this.resultType = reducedType(reduction, fields[0].type);
		}
	}

	/** The output field: named after the reduced column, or the reduction for whole rows */
	get fieldName(): string {
		const fields = this.child.schema.fields;
		return fields.length === 1 ? fields[0].name : this.reduction;
	}

	protected computeSchema(): RecordType {
		return RecordType.of([this.fieldName, this.resultType]);
	}

	override get dimension(): Dimension | null {
		return null;
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		return this.withChild(newChildren[0]);
	}

	/** Typed variant of withChildren for single-child rebuilds */
	withChild(child: ExprNode): ReductionNode {
		return child === this.child ? this : new ReductionNode(this.reduction, child);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { reduction: this.reduction };
	}

	override toString(): string {
		return `${this.reduction}(${this.child.toString()})`;
	}
}

function reducedType(reduction: ReductionName, input: ElementType): ElementType {
	switch (reduction) {
		case 'count':
		case 'nunique':
			return INT64_TYPE;
		case 'any':
		case 'all':
			if (!input.isBoolean) {
				constructionError(`${reduction} requires a boolean column, got ${input.name}`, StatusCode.MISMATCH);
			}
			return BOOL_TYPE;
		case 'sum':
			if (input.isBoolean || input.isInteger) return INT64_TYPE;
			if (input.isNumeric) return FLOAT64_TYPE;
			return constructionError(`sum requires a numeric column, got ${input.name}`, StatusCode.MISMATCH);
		case 'mean':
		case 'var':
		case 'std':
			if (!input.isNumeric) {
				constructionError(`${reduction} requires a numeric column, got ${input.name}`, StatusCode.MISMATCH);
			}
			return FLOAT64_TYPE;
		case 'min':
		case 'max':
			if (!input.isNumeric && !input.isTextual && !input.isTemporal) {
				constructionError(`${reduction} requires an orderable column, got ${input.name}`, StatusCode.MISMATCH);
			}
			return input;
	}
}
