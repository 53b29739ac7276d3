/**
 * The closed set of expression node kinds.
 * Every kind must have a lean-projection rule; see planner/rules/lean.
 */
export enum ExprKind {
	Symbol = 'Symbol',
	Projection = 'Projection',
	Column = 'Column',
	Selection = 'Selection',
	ColumnWise = 'ColumnWise',
	Reduction = 'Reduction',
	Summary = 'Summary',
	By = 'By',
	Sort = 'Sort',
	Distinct = 'Distinct',
	Head = 'Head',
	Label = 'Label',
	ReLabel = 'ReLabel',
	Map = 'Map',
	Apply = 'Apply',
	Join = 'Join',
}
