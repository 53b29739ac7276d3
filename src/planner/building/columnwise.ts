import type { LiteralValue } from '../../common/types.js';
import { ConstructionError, MismatchedSourceError } from '../../common/errors.js';
import { createLogger } from '../../common/logger.js';
import { ColumnNode } from '../nodes/column-node.js';
import { ColumnWiseNode } from '../nodes/columnwise-node.js';
import type { ExprNode } from '../nodes/expr-node.js';
import { BinaryOp, Literal, ScalarSymbol, UnaryOp, type BinaryOperator, type ScalarExpr, type UnaryOperator } from '../nodes/scalar.js';

const buildLog = createLogger('building:columnwise');

/** Inputs accepted by column-wise operators */
export type ColumnInput = ColumnNode | ColumnWiseNode | LiteralValue;

/** Builds one scalar expression from the per-input scalar forms */
export type ScalarBuilder = (...operands: ScalarExpr[]) => ScalarExpr;

/**
 * Merge column-like inputs under a scalar operator into a single broadcast.
 *
 * Columns become placeholders named after the column, existing broadcasts
 * contribute their inner expression, and literals pass through. Every column
 * must trace back to one source table.
 *
 * @throws MismatchedSourceError when inputs come from more than one table
 */
export function columnwise(op: ScalarBuilder, ...inputs: ColumnInput[]): ColumnWiseNode {
	const operands: ScalarExpr[] = [];
	const sources = new Map<string, ExprNode>();

	for (const input of inputs) {
		if (input instanceof ColumnWiseNode) {
			operands.push(input.expr);
			sources.set(input.child.key, input.child);
		} else if (input instanceof ColumnNode) {
			operands.push(new ScalarSymbol(input.column, input.dtype));
			sources.set(input.child.key, input.child);
		} else {
			// Something like 5 or 'Alice'
			operands.push(new Literal(input));
		}
	}

	if (sources.size > 1) {
		throw new MismatchedSourceError([...sources.values()].map(s => s.toString()));
	}
	const [source] = sources.values();
	if (!source) {
		throw new ConstructionError('Column-wise operation needs at least one column input');
	}

	const expr = op(...operands);
	buildLog('Fused %d inputs over %s into %s', inputs.length, source.toString(), expr.toString());
	return new ColumnWiseNode(source, expr);
}

function binary(op: BinaryOperator): (left: ColumnInput, right: ColumnInput) => ColumnWiseNode {
	return (left, right) => columnwise((l, r) => new BinaryOp(op, l, r), left, right);
}

function unary(op: UnaryOperator): (operand: ColumnNode | ColumnWiseNode) => ColumnWiseNode {
	return operand => columnwise(x => new UnaryOp(op, x), operand);
}

// Comparisons
export const equal = binary('==');
export const notEqual = binary('!=');
export const lessThan = binary('<');
export const lessEqual = binary('<=');
export const greaterThan = binary('>');
export const greaterEqual = binary('>=');

// Arithmetic
export const add = binary('+');
export const subtract = binary('-');
export const multiply = binary('*');
export const divide = binary('/');
export const modulo = binary('%');
export const power = binary('**');

// Logic
export const and = binary('and');
export const or = binary('or');
export const not = unary('not');

// Functions
export const negate = unary('neg');
export const abs = unary('abs');
export const sin = unary('sin');
export const cos = unary('cos');
export const tan = unary('tan');
export const exp = unary('exp');
export const log = unary('log');
