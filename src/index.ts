/**
 * Leanframe - symbolic table expressions
 *
 * Immutable expression trees over named, typed tables, column-wise fusion of
 * scalar operations, and a lean-projection optimizer that narrows every table
 * leaf to the columns actually consumed.
 */

// Common data types and errors
export { StatusCode } from './common/types.js';
export type { LiteralValue } from './common/types.js';
export {
	LeanframeError,
	ConstructionError,
	MismatchedSourceError,
	SchemaInferenceError,
	OptimizerError,
	TypeParseError,
	leanframeError,
} from './common/errors.js';
export { RecordType, TableShape } from './common/datatype.js';
export type { RecordField, Dimension } from './common/datatype.js';

// Type system
export {
	BOOL_TYPE,
	INT8_TYPE, INT16_TYPE, INT32_TYPE, INT64_TYPE,
	UINT8_TYPE, UINT16_TYPE, UINT32_TYPE, UINT64_TYPE,
	FLOAT32_TYPE, FLOAT64_TYPE,
	STRING_TYPE,
	DATE_TYPE, DATETIME_TYPE,
	BUILTIN_TYPES,
	sameType,
	widenNumeric,
} from './types/element-type.js';
export type { ElementType } from './types/element-type.js';
export { TypeRegistry, typeRegistry, getType, registerType } from './types/registry.js';
export { parseRecordType, parseTableShape } from './types/parse.js';

// Expression nodes
export { ExprKind } from './planner/nodes/expr-kind.js';
export { ExprNode } from './planner/nodes/expr-node.js';
export type { ExprNodeVisitor, LogicalAttributes } from './planner/nodes/expr-node.js';
export type { ExprNodeByKind, AnyExprNode } from './planner/nodes/node-kinds.js';
export { SymbolNode } from './planner/nodes/symbol-node.js';
export { ProjectionNode } from './planner/nodes/projection-node.js';
export { ColumnNode } from './planner/nodes/column-node.js';
export { SelectionNode } from './planner/nodes/selection-node.js';
export { ColumnWiseNode } from './planner/nodes/columnwise-node.js';
export { ReductionNode, REDUCTION_NAMES } from './planner/nodes/reduction-node.js';
export type { ReductionName } from './planner/nodes/reduction-node.js';
export { SummaryNode } from './planner/nodes/summary-node.js';
export type { SummaryEntry } from './planner/nodes/summary-node.js';
export { ByNode } from './planner/nodes/by-node.js';
export { SortNode } from './planner/nodes/sort-node.js';
export type { SortKey } from './planner/nodes/sort-node.js';
export { DistinctNode } from './planner/nodes/distinct-node.js';
export { HeadNode, DEFAULT_HEAD_ROWS } from './planner/nodes/head-node.js';
export { LabelNode } from './planner/nodes/label-node.js';
export { ReLabelNode } from './planner/nodes/relabel-node.js';
export type { Relabeling } from './planner/nodes/relabel-node.js';
export { MapNode } from './planner/nodes/map-node.js';
export type { UserFunction } from './planner/nodes/map-node.js';
export { ApplyNode } from './planner/nodes/apply-node.js';
export type { ApplyShape } from './planner/nodes/apply-node.js';
export { JoinNode } from './planner/nodes/join-node.js';
export {
	ScalarSymbol,
	Literal,
	BinaryOp,
	UnaryOp,
	ReductionValue,
	symbolNames,
	collectReductions,
} from './planner/nodes/scalar.js';
export type { ScalarExpr, BinaryOperator, UnaryOperator } from './planner/nodes/scalar.js';

// Builders
export {
	symbol,
	column,
	project,
	select,
	sort,
	distinct,
	head,
	label,
	relabel,
	map,
	apply,
	join,
} from './planner/building/table.js';
export {
	columnwise,
	equal, notEqual, lessThan, lessEqual, greaterThan, greaterEqual,
	add, subtract, multiply, divide, modulo, power,
	and, or, not,
	negate, abs, sin, cos, tan, exp, log,
} from './planner/building/columnwise.js';
export type { ColumnInput, ScalarBuilder } from './planner/building/columnwise.js';
export {
	reduce,
	any, all, sum, max, min, mean, variance, std, count, nunique,
	combine,
	combineUnary,
	summary,
	by,
} from './planner/building/aggregates.js';
export type { AggregateInput } from './planner/building/aggregates.js';

// Analysis
export { structuralKey, isIdentical, contains } from './planner/analysis/structural.js';
export { substitute } from './planner/analysis/substitute.js';
export { commonSubexpression, findCommonSubexpression } from './planner/analysis/common-subexpression.js';
export { ExprArena } from './planner/analysis/arena.js';

// Optimizer
export { leanProjection, LeanOptimizer, resolveLeanRule, DEFAULT_LEAN_TUNING } from './planner/optimizer.js';
export type { LeanOptions } from './planner/optimizer.js';
export type { LeanTuning } from './planner/optimizer-tuning.js';
export type { LeanContext, LeanInterceptor } from './planner/framework/context.js';
export type { LeanResult, LeanRuleHandle, LeanRuleTable } from './planner/framework/registry.js';
export { DebugTraceHook, CompositeTraceHook } from './planner/framework/trace.js';
export type { TraceHook } from './planner/framework/trace.js';

// Logging
export { enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
