/**
 * Lean-projection tuning parameters
 */
export interface LeanTuning {
	/** Maximum rule recursion depth before the optimizer gives up */
	readonly maxDepth: number;

	/** Check that the rewritten expression has exactly the input's schema */
	readonly verifySchema: boolean;

	/** Intern the result so structurally identical subtrees are one instance */
	readonly internSubtrees: boolean;
}

/**
 * Default lean-projection tuning parameters
 */
export const DEFAULT_LEAN_TUNING: LeanTuning = {
	maxDepth: 256,
	verifySchema: true,
	internSubtrees: false,
};
