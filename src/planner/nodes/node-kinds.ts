import { ExprKind } from './expr-kind.js';
import type { SymbolNode } from './symbol-node.js';
import type { ProjectionNode } from './projection-node.js';
import type { ColumnNode } from './column-node.js';
import type { SelectionNode } from './selection-node.js';
import type { ColumnWiseNode } from './columnwise-node.js';
import type { ReductionNode } from './reduction-node.js';
import type { SummaryNode } from './summary-node.js';
import type { ByNode } from './by-node.js';
import type { SortNode } from './sort-node.js';
import type { DistinctNode } from './distinct-node.js';
import type { HeadNode } from './head-node.js';
import type { LabelNode } from './label-node.js';
import type { ReLabelNode } from './relabel-node.js';
import type { MapNode } from './map-node.js';
import type { ApplyNode } from './apply-node.js';
import type { JoinNode } from './join-node.js';

/**
 * Node class for each expression kind.
 * Mapped types over this interface let the compiler check that per-kind tables are complete.
 */
export interface ExprNodeByKind {
	[ExprKind.Symbol]: SymbolNode;
	[ExprKind.Projection]: ProjectionNode;
	[ExprKind.Column]: ColumnNode;
	[ExprKind.Selection]: SelectionNode;
	[ExprKind.ColumnWise]: ColumnWiseNode;
	[ExprKind.Reduction]: ReductionNode;
	[ExprKind.Summary]: SummaryNode;
	[ExprKind.By]: ByNode;
	[ExprKind.Sort]: SortNode;
	[ExprKind.Distinct]: DistinctNode;
	[ExprKind.Head]: HeadNode;
	[ExprKind.Label]: LabelNode;
	[ExprKind.ReLabel]: ReLabelNode;
	[ExprKind.Map]: MapNode;
	[ExprKind.Apply]: ApplyNode;
	[ExprKind.Join]: JoinNode;
}

export type AnyExprNode = ExprNodeByKind[ExprKind];
