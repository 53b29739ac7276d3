import type { ExprKind } from './expr-kind.js';
import { TableShape, type Dimension, type RecordType } from '../../common/datatype.js';
import type { ElementType } from '../../types/element-type.js';
import { SchemaInferenceError, leanframeError } from '../../common/errors.js';
import { StatusCode } from '../../common/types.js';
import { Cached } from '../../util/cached.js';

/**
 * Kind-specific fields that take part in structural identity.
 * Values must be JSON-serializable.
 */
export type LogicalAttributes = Record<string, unknown>;

/**
 * Base class for all nodes of the expression tree.
 * ExprNodes are immutable once constructed; rewrites build new nodes.
 */
export abstract class ExprNode {
	private static nextId = 0;

	readonly id: string;
	abstract readonly nodeType: ExprKind;

	private readonly schemaCache: Cached<RecordType>;
	private readonly keyCache: Cached<string>;

	constructor() {
		this.id = `${ExprNode.nextId++}`;
		// Both are pure functions of immutable fields, so memoising cannot go stale
		this.schemaCache = new Cached(() => this.computeSchema());
		this.keyCache = new Cached(() => this.computeKey());
	}

	/** Compute the record type of one output row from own fields and child schemas */
	protected abstract computeSchema(): RecordType;

	abstract getChildren(): readonly ExprNode[];

	/**
	 * Return this node with its children replaced by newChildren.
	 *
	 * Implementations must:
	 *   1. Verify arity (throw if length mismatch)
	 *   2. Return `this` if nothing changed
	 *   3. Otherwise construct a new instance, re-validating invariants
	 */
	abstract withChildren(newChildren: readonly ExprNode[]): ExprNode;

	/** Kind-specific fields, excluding children */
	abstract getLogicalAttributes(): LogicalAttributes;

	abstract toString(): string;

	get schema(): RecordType {
		return this.schemaCache.value;
	}

	/** False when the schema depends on information the caller never declared */
	get hasKnownSchema(): boolean {
		return true;
	}

	get columns(): readonly string[] {
		return this.schema.names;
	}

	/** Row dimension; null when the node reduces to a single value */
	get dimension(): Dimension | null {
		const first = this.getChildren()[0];
		return first ? first.dimension : 'var';
	}

	get shape(): TableShape {
		return new TableShape(this.dimension, this.schema);
	}

	/** Element type of a single-field node */
	get dtype(): ElementType {
		const fields = this.schema.fields;
		if (fields.length !== 1) {
			throw new SchemaInferenceError(`dtype not defined for multi-column expression ${this.toString()}; use schema instead`);
		}
		return fields[0].type;
	}

	/** Structural key: equal keys mean structurally identical expressions */
	get key(): string {
		return this.keyCache.value;
	}

	visit(visitor: ExprNodeVisitor): void {
		visitor(this);
		this.getChildren().forEach(child => child.visit(visitor));
	}

	private computeKey(): string {
		const attrs = JSON.stringify(this.getLogicalAttributes());
		const children = this.getChildren().map(child => child.key).join(',');
		return `${this.nodeType}${attrs}(${children})`;
	}
}

export type ExprNodeVisitor = (node: ExprNode) => void;

/** Throws unless `children` has exactly `expected` entries */
export function expectArity(node: ExprNode, children: readonly ExprNode[], expected: number): void {
	if (children.length !== expected) {
		leanframeError(`${node.nodeType} expects ${expected} children, got ${children.length}`, StatusCode.INTERNAL);
	}
}

/** Render a column name the way node strings quote it */
export function quoteName(name: string): string {
	return `'${name}'`;
}
