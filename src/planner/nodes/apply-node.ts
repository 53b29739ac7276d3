import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import { TableShape, type Dimension, type RecordType } from '../../common/datatype.js';
import { SchemaInferenceError, TypeParseError } from '../../common/errors.js';
import type { ElementType } from '../../types/element-type.js';
import { parseTableShape } from '../../types/parse.js';
import { getType } from '../../types/registry.js';
import { functionId } from '../../util/function-id.js';
import type { UserFunction } from './map-node.js';

/** Declared result of an Apply: a table shape, or a scalar element type */
export type ApplyShape = TableShape | ElementType;

/**
 * Apply a user function to a whole table.
 *
 * Before: compute(apply(f, expr))
 * After:  f(compute(expr))
 */
export class ApplyNode extends ExprNode {
	override readonly nodeType = ExprKind.Apply;
	readonly declared: ApplyShape | undefined;

	constructor(public readonly func: UserFunction, public readonly child: ExprNode, shape?: ApplyShape | string) {
		super();
		this.declared = typeof shape === 'string' ? parseApplyShape(shape) : shape;
	}

	override get hasKnownSchema(): boolean {
		return this.declared instanceof TableShape && this.declared.dimension !== null;
	}

	protected computeSchema(): RecordType {
		if (!this.declared) {
			throw new SchemaInferenceError(`Shape of ${this.toString()} is not declared; pass one to apply()`);
		}
		if (!(this.declared instanceof TableShape) || this.declared.dimension === null) {
			throw new SchemaInferenceError(`Non-tabular shape '${shapeText(this.declared)}' for ${this.toString()}`);
		}
		return this.declared.schema;
	}

	override get dimension(): Dimension | null {
		if (this.declared === undefined) return 'var';
		return this.declared instanceof TableShape ? this.declared.dimension : null;
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new ApplyNode(this.func, child, this.declared);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { func: functionId(this.func), shape: this.declared ? shapeText(this.declared) : null };
	}

	override toString(): string {
		return `apply(${this.func.name || 'fn'}, ${this.child.toString()})`;
	}
}

function shapeText(shape: ApplyShape): string {
	return shape instanceof TableShape ? shape.toString() : shape.name;
}

function parseApplyShape(text: string): ApplyShape {
	if (text.includes('{')) {
		return parseTableShape(text);
	}
	const type = getType(text.trim());
	if (!type) {
		throw new TypeParseError(`Unknown type '${text.trim()}'`, text, 0);
	}
	return type;
}
