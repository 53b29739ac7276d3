import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import { RecordType, TableShape, type Dimension } from '../../common/datatype.js';
import { parseTableShape } from '../../types/parse.js';

/**
 * A named table leaf. Concrete data is bound to it by an execution backend.
 */
export class SymbolNode extends ExprNode {
	override readonly nodeType = ExprKind.Symbol;
	readonly declared: TableShape;

	constructor(public readonly name: string, shape: TableShape | RecordType | string) {
		super();
		this.declared = typeof shape === 'string'
			? parseTableShape(shape)
			: shape instanceof RecordType ? new TableShape('var', shape) : shape;
	}

	protected computeSchema(): RecordType {
		return this.declared.schema;
	}

	override get dimension(): Dimension | null {
		return this.declared.dimension;
	}

	getChildren(): readonly [] {
		return [];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 0);
		return this;
	}

	getLogicalAttributes(): LogicalAttributes {
		return { name: this.name, shape: this.declared.toString() };
	}

	override toString(): string {
		return this.name;
	}
}
