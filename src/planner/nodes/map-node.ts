import { ExprKind } from './expr-kind.js';
import { ExprNode, expectArity, type LogicalAttributes } from './expr-node.js';
import type { RecordType } from '../../common/datatype.js';
import { SchemaInferenceError } from '../../common/errors.js';
import { parseRecordType } from '../../types/parse.js';
import { functionId } from '../../util/function-id.js';

/** An opaque user function; only its identity is tracked */
export type UserFunction = (...args: never[]) => unknown;

/**
 * Map a user function across the rows of a table.
 * The output row type must be declared for the schema to be known.
 */
export class MapNode extends ExprNode {
	override readonly nodeType = ExprKind.Map;
	readonly declared: RecordType | undefined;

	constructor(public readonly child: ExprNode, public readonly func: UserFunction, schema?: RecordType | string) {
		super();
		this.declared = typeof schema === 'string' ? parseRecordType(schema) : schema;
	}

	override get hasKnownSchema(): boolean {
		return this.declared !== undefined;
	}

	protected computeSchema(): RecordType {
		if (!this.declared) {
			throw new SchemaInferenceError(`Schema of ${this.toString()} is not declared; pass one to map()`);
		}
		return this.declared;
	}

	getChildren(): readonly [ExprNode] {
		return [this.child];
	}

	withChildren(newChildren: readonly ExprNode[]): ExprNode {
		expectArity(this, newChildren, 1);
		const [child] = newChildren;
		return child === this.child ? this : new MapNode(child, this.func, this.declared);
	}

	getLogicalAttributes(): LogicalAttributes {
		return { func: functionId(this.func), schema: this.declared?.toString() ?? null };
	}

	override toString(): string {
		return `map(${this.child.toString()}, ${this.func.name || 'fn'})`;
	}
}
