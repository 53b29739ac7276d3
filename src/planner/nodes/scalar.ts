import type { LiteralValue } from '../../common/types.js';
import { StatusCode } from '../../common/types.js';
import { constructionError } from '../../common/errors.js';
import {
	BOOL_TYPE,
	FLOAT64_TYPE,
	INT64_TYPE,
	STRING_TYPE,
	sameType,
	widenNumeric,
	type ElementType,
} from '../../types/element-type.js';
import type { ReductionNode } from './reduction-node.js';

export type ArithmeticOperator = '+' | '-' | '*' | '/' | '%' | '**';
export type ComparisonOperator = '==' | '!=' | '<' | '<=' | '>' | '>=';
export type LogicalOperator = 'and' | 'or';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator;

export type UnaryOperator = 'neg' | 'not' | 'abs' | 'sin' | 'cos' | 'tan' | 'exp' | 'log';

/**
 * Scalar expressions evaluated per row inside a ColumnWise broadcast,
 * or once over reductions inside a Summary entry.
 */
export type ScalarExpr = ScalarSymbol | Literal | BinaryOp | UnaryOp | ReductionValue;

/** A placeholder standing for one column of the broadcast's source table */
export class ScalarSymbol {
	readonly kind = 'symbol';

	constructor(public readonly name: string, public readonly type: ElementType) {}

	get key(): string {
		return `sym(${JSON.stringify(this.name)}:${this.type.name})`;
	}

	toString(): string {
		return this.name;
	}
}

export class Literal {
	readonly kind = 'literal';
	readonly type: ElementType;

	constructor(public readonly value: LiteralValue) {
		this.type = literalType(value);
	}

	get key(): string {
		return `lit(${JSON.stringify(this.value)})`;
	}

	toString(): string {
		return typeof this.value === 'string' ? `'${this.value.replace(/'/g, "\\'")}'` : String(this.value);
	}
}

export class BinaryOp {
	readonly kind = 'binary';
	readonly type: ElementType;

	constructor(
		public readonly op: BinaryOperator,
		public readonly left: ScalarExpr,
		public readonly right: ScalarExpr,
	) {
		this.type = binaryResultType(op, left.type, right.type);
	}

	get key(): string {
		return `bin(${this.op},${this.left.key},${this.right.key})`;
	}

	toString(): string {
		return `${wrap(this.left)} ${this.op} ${wrap(this.right)}`;
	}
}

export class UnaryOp {
	readonly kind = 'unary';
	readonly type: ElementType;

	constructor(public readonly op: UnaryOperator, public readonly operand: ScalarExpr) {
		this.type = unaryResultType(op, operand.type);
	}

	get key(): string {
		return `un(${this.op},${this.operand.key})`;
	}

	toString(): string {
		if (this.op === 'neg') {
			return `-${wrap(this.operand)}`;
		}
		return `${this.op}(${this.operand.toString()})`;
	}
}

/**
 * A reduction used as a scalar value inside a Summary entry.
 * Keyed without its reduction so that Summary keys can list reductions as children.
 */
export class ReductionValue {
	readonly kind = 'reduction';

	constructor(public readonly reduction: ReductionNode) {}

	get type(): ElementType {
		return this.reduction.dtype;
	}

	get key(): string {
		return 'red(?)';
	}

	toString(): string {
		return this.reduction.toString();
	}
}

function wrap(expr: ScalarExpr): string {
	return expr.kind === 'binary' ? `(${expr.toString()})` : expr.toString();
}

function literalType(value: LiteralValue): ElementType {
	if (typeof value === 'boolean') return BOOL_TYPE;
	if (typeof value === 'string') return STRING_TYPE;
	return Number.isInteger(value) ? INT64_TYPE : FLOAT64_TYPE;
}

function isOrderable(type: ElementType): boolean {
	return !!(type.isNumeric || type.isTextual || type.isTemporal);
}

function comparable(a: ElementType, b: ElementType): boolean {
	if (a.isNumeric && b.isNumeric) return true;
	return sameType(a, b);
}

function binaryResultType(op: BinaryOperator, left: ElementType, right: ElementType): ElementType {
	switch (op) {
		case '==':
		case '!=':
			if (!comparable(left, right)) {
				constructionError(`Cannot compare ${left.name} with ${right.name} using '${op}'`, StatusCode.MISMATCH);
			}
			return BOOL_TYPE;
		case '<':
		case '<=':
		case '>':
		case '>=':
			if (!comparable(left, right) || !isOrderable(left)) {
				constructionError(`Cannot order ${left.name} against ${right.name} using '${op}'`, StatusCode.MISMATCH);
			}
			return BOOL_TYPE;
		case 'and':
		case 'or':
			if (!left.isBoolean || !right.isBoolean) {
				constructionError(`'${op}' requires boolean operands, got ${left.name} and ${right.name}`, StatusCode.MISMATCH);
			}
			return BOOL_TYPE;
		case '+':
			if (left.isTextual && right.isTextual) {
				return STRING_TYPE;
			}
			return numericResult(op, left, right);
		case '-':
		case '*':
		case '%':
			return numericResult(op, left, right);
		case '/':
		case '**':
			numericResult(op, left, right);
			return FLOAT64_TYPE;
	}
}

function numericResult(op: BinaryOperator, left: ElementType, right: ElementType): ElementType {
	if (!left.isNumeric || !right.isNumeric) {
		constructionError(`'${op}' requires numeric operands, got ${left.name} and ${right.name}`, StatusCode.MISMATCH);
	}
	return widenNumeric(left, right);
}

function unaryResultType(op: UnaryOperator, operand: ElementType): ElementType {
	if (op === 'not') {
		if (!operand.isBoolean) {
			constructionError(`'not' requires a boolean operand, got ${operand.name}`, StatusCode.MISMATCH);
		}
		return BOOL_TYPE;
	}
	if (!operand.isNumeric) {
		constructionError(`'${op}' requires a numeric operand, got ${operand.name}`, StatusCode.MISMATCH);
	}
	return op === 'neg' || op === 'abs' ? operand : FLOAT64_TYPE;
}

/** Visit every node of a scalar expression, parents before operands */
export function walkScalar(expr: ScalarExpr, visitor: (e: ScalarExpr) => void): void {
	visitor(expr);
	switch (expr.kind) {
		case 'binary':
			walkScalar(expr.left, visitor);
			walkScalar(expr.right, visitor);
			break;
		case 'unary':
			walkScalar(expr.operand, visitor);
			break;
		case 'symbol':
		case 'literal':
		case 'reduction':
			break;
	}
}

/** Names of all column placeholders referenced, sorted and de-duplicated */
export function symbolNames(expr: ScalarExpr): string[] {
	const names = new Set<string>();
	walkScalar(expr, e => {
		if (e.kind === 'symbol') names.add(e.name);
	});
	return [...names].sort();
}

/** Reductions embedded in the expression, in left-to-right order */
export function collectReductions(expr: ScalarExpr): ReductionNode[] {
	const result: ReductionNode[] = [];
	walkScalar(expr, e => {
		if (e.kind === 'reduction') result.push(e.reduction);
	});
	return result;
}

/**
 * Rebuild an expression bottom-up, giving `fn` the chance to replace each leaf.
 * Interior nodes are rebuilt only when an operand changed.
 */
export function mapScalarLeaves(expr: ScalarExpr, fn: (leaf: ScalarSymbol | Literal | ReductionValue) => ScalarExpr): ScalarExpr {
	switch (expr.kind) {
		case 'binary': {
			const left = mapScalarLeaves(expr.left, fn);
			const right = mapScalarLeaves(expr.right, fn);
			return left === expr.left && right === expr.right ? expr : new BinaryOp(expr.op, left, right);
		}
		case 'unary': {
			const operand = mapScalarLeaves(expr.operand, fn);
			return operand === expr.operand ? expr : new UnaryOp(expr.op, operand);
		}
		case 'symbol':
		case 'literal':
		case 'reduction':
			return fn(expr);
	}
}

/** Replace embedded reductions, in order, with the given ones */
export function replaceReductions(expr: ScalarExpr, reductions: readonly ReductionNode[]): ScalarExpr {
	let next = 0;
	const result = mapScalarLeaves(expr, leaf => {
		if (leaf.kind !== 'reduction') return leaf;
		const replacement = reductions[next++];
		if (replacement === undefined) {
			constructionError('Not enough reductions to rebuild scalar expression', StatusCode.INTERNAL);
		}
		return replacement === leaf.reduction ? leaf : new ReductionValue(replacement);
	});
	if (next !== reductions.length) {
		constructionError(`Expected ${next} reductions, got ${reductions.length}`, StatusCode.INTERNAL);
	}
	return result;
}

/** Render with each placeholder replaced by `render(name)` */
export function renderScalar(expr: ScalarExpr, render: (symbol: string) => string): string {
	switch (expr.kind) {
		case 'symbol': return render(expr.name);
		case 'literal':
		case 'reduction':
			return expr.toString();
		case 'binary': {
			const side = (e: ScalarExpr) => e.kind === 'binary' ? `(${renderScalar(e, render)})` : renderScalar(e, render);
			return `${side(expr.left)} ${expr.op} ${side(expr.right)}`;
		}
		case 'unary':
			if (expr.op === 'neg') {
				return expr.operand.kind === 'binary'
					? `-(${renderScalar(expr.operand, render)})`
					: `-${renderScalar(expr.operand, render)}`;
			}
			return `${expr.op}(${renderScalar(expr.operand, render)})`;
	}
}
