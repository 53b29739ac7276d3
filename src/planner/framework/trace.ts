/**
 * Trace framework for lean-projection rule execution
 */

import { createLogger } from '../../common/logger.js';
import type { ExprNode } from '../nodes/expr-node.js';
import type { LeanRuleHandle, LeanResult } from './registry.js';

/**
 * Trace hooks for optimizer rule execution
 */
export interface TraceHook {
	/** Called when a rule starts on a node with the given request */
	onRuleStart?(handle: LeanRuleHandle, node: ExprNode, fields: ReadonlySet<string>): void;

	/** Called when a rule completes */
	onRuleEnd?(handle: LeanRuleHandle, before: ExprNode, result: LeanResult): void;

	/** Called when an optimization pass starts */
	onPhaseStart?(phase: string): void;

	/** Called when an optimization pass ends */
	onPhaseEnd?(phase: string): void;
}

/**
 * Default trace hook that logs to debug channels
 */
export class DebugTraceHook implements TraceHook {
	private readonly ruleLog = createLogger('optimizer:trace:rules');
	private readonly phaseLog = createLogger('optimizer:trace:phases');

	onRuleStart(handle: LeanRuleHandle, node: ExprNode, fields: ReadonlySet<string>): void {
		this.ruleLog('→ %s starting on %s#%s with [%s]', handle.id, node.nodeType, node.id, [...fields].join(', '));
	}

	onRuleEnd(handle: LeanRuleHandle, before: ExprNode, result: LeanResult): void {
		if (result.node !== before) {
			this.ruleLog('✓ %s rewrote %s#%s → %s#%s, needs [%s]',
				handle.id, before.nodeType, before.id, result.node.nodeType, result.node.id, [...result.fields].join(', '));
		} else {
			this.ruleLog('– %s left %s#%s unchanged', handle.id, before.nodeType, before.id);
		}
	}

	onPhaseStart(phase: string): void {
		this.phaseLog('Starting phase: %s', phase);
	}

	onPhaseEnd(phase: string): void {
		this.phaseLog('Completed phase: %s', phase);
	}
}

/**
 * Composite trace hook that combines multiple hooks
 */
export class CompositeTraceHook implements TraceHook {
	constructor(private readonly hooks: readonly TraceHook[]) {}

	onRuleStart(handle: LeanRuleHandle, node: ExprNode, fields: ReadonlySet<string>): void {
		for (const hook of this.hooks) {
			hook.onRuleStart?.(handle, node, fields);
		}
	}

	onRuleEnd(handle: LeanRuleHandle, before: ExprNode, result: LeanResult): void {
		for (const hook of this.hooks) {
			hook.onRuleEnd?.(handle, before, result);
		}
	}

	onPhaseStart(phase: string): void {
		for (const hook of this.hooks) {
			hook.onPhaseStart?.(phase);
		}
	}

	onPhaseEnd(phase: string): void {
		for (const hook of this.hooks) {
			hook.onPhaseEnd?.(phase);
		}
	}
}
