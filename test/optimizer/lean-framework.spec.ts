import { expect } from 'chai';
import { symbol, column, project, relabel, join } from '../../src/planner/building/table.js';
import { by, sum } from '../../src/planner/building/aggregates.js';
import { LeanOptimizer, leanProjection, resolveLeanRule, DEFAULT_LEAN_TUNING } from '../../src/planner/optimizer.js';
import { CompositeTraceHook, type TraceHook } from '../../src/planner/framework/trace.js';
import type { LeanContext } from '../../src/planner/framework/context.js';
import { leanResult, type LeanResult, type LeanRuleHandle } from '../../src/planner/framework/registry.js';
import { ExprKind } from '../../src/planner/nodes/expr-kind.js';
import type { ExprNode } from '../../src/planner/nodes/expr-node.js';
import { JoinNode } from '../../src/planner/nodes/join-node.js';
import { ReLabelNode } from '../../src/planner/nodes/relabel-node.js';
import { OptimizerError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';
import { expectNode } from '../util/expr-helpers.js';

class RecordingHook implements TraceHook {
	readonly started: string[] = [];
	readonly rewritten: string[] = [];
	readonly phases: string[] = [];

	onRuleStart(handle: LeanRuleHandle, _node: ExprNode, _fields: ReadonlySet<string>): void {
		this.started.push(handle.id);
	}

	onRuleEnd(handle: LeanRuleHandle, before: ExprNode, result: LeanResult): void {
		if (result.node !== before) this.rewritten.push(handle.id);
	}

	onPhaseStart(phase: string): void {
		this.phases.push(`start:${phase}`);
	}

	onPhaseEnd(phase: string): void {
		this.phases.push(`end:${phase}`);
	}
}

describe('Lean rule framework', () => {
	const shape = 'var * {a: int32, b: int32, c: int32, d: int32}';
	const t = symbol('t', shape);

	describe('rule table', () => {
		it('has a rule for every node kind', () => {
			for (const kind of Object.values(ExprKind)) {
				const rule = resolveLeanRule(kind);
				expect(rule.nodeType, kind).to.equal(kind);
				expect(rule.id).to.match(/^lean-/);
			}
		});

		it('uses distinct rule ids', () => {
			const ids = Object.values(ExprKind).map(kind => resolveLeanRule(kind).id);
			expect(new Set(ids).size).to.equal(ids.length);
		});

		it('refuses nodes of another kind', () => {
			const context: LeanContext = {
				tuning: DEFAULT_LEAN_TUNING,
				depth: 0,
				trace: undefined,
				lean: () => {
					throw new Error('not expected to recurse');
				},
				leanIntercepted: () => {
					throw new Error('not expected to recurse');
				},
			};
			expect(() => resolveLeanRule(ExprKind.Column).run(t, new Set(), context))
				.to.throw(OptimizerError, 'Rule lean-column applies to Column, got Symbol')
				.with.property('code', StatusCode.INTERNAL);
		});
	});

	describe('group-by consistency', () => {
		it('fails when a rewritten side no longer reads the leaned grouped table', () => {
			const accounts = symbol('t', 'var * {name: string, amount: int32}');
			const grouped = by(column(accounts, 'name'), sum(column(accounts, 'amount')));
			// Hands back a narrowed table, but leaves both sides reading the original
			const context: LeanContext = {
				tuning: DEFAULT_LEAN_TUNING,
				depth: 0,
				trace: undefined,
				lean: () => leanResult(project(accounts, ['name']), ['name']),
				leanIntercepted: (node, fields) => leanResult(node, fields),
			};
			expect(() => resolveLeanRule(ExprKind.By).run(grouped, new Set(['name', 'amount']), context))
				.to.throw(OptimizerError, 'is not read by both')
				.with.property('code', StatusCode.INTERNAL);
		});
	});

	describe('tracing', () => {
		it('reports every rule and the phase', () => {
			const hook = new RecordingHook();
			leanProjection(column(t, 'a'), { trace: hook });
			expect(hook.started).to.deep.equal(['lean-column', 'lean-symbol']);
			expect(hook.rewritten).to.deep.equal(['lean-symbol', 'lean-column']);
			expect(hook.phases).to.deep.equal(['start:lean-projection', 'end:lean-projection']);
		});

		it('reports unchanged nodes as such', () => {
			const hook = new RecordingHook();
			const once = leanProjection(column(t, 'a'));
			leanProjection(once, { trace: hook });
			expect(hook.started).to.deep.equal(['lean-column', 'lean-projection', 'lean-symbol']);
			expect(hook.rewritten).to.deep.equal(['lean-symbol']);
		});

		it('fans out to every composed hook', () => {
			const first = new RecordingHook();
			const second = new RecordingHook();
			leanProjection(column(t, 'b'), { trace: new CompositeTraceHook([first, second]) });
			expect(first.started).to.deep.equal(['lean-column', 'lean-symbol']);
			expect(second.started).to.deep.equal(first.started);
			expect(second.phases).to.deep.equal(first.phases);
		});
	});

	describe('tuning', () => {
		it('merges overrides over the defaults', () => {
			expect(new LeanOptimizer().tuning).to.deep.equal(DEFAULT_LEAN_TUNING);
			expect(new LeanOptimizer({ tuning: { maxDepth: 4 } }).tuning)
				.to.deep.equal({ maxDepth: 4, verifySchema: true, internSubtrees: false });
		});

		it('interns identical subtrees on request', () => {
			const twin = symbol('t', shape);
			const expr = join(t, relabel(twin, { b: 'b2', c: 'c2', d: 'd2' }), 'a');

			const plain = expectNode(leanProjection(expr), JoinNode);
			const plainRight = expectNode(plain.right, ReLabelNode);
			expect(plain.left).to.not.equal(plainRight.child);
			expect(plain.left.key).to.equal(plainRight.child.key);

			const interned = expectNode(leanProjection(expr, { tuning: { internSubtrees: true } }), JoinNode);
			expect(interned.left).to.equal(expectNode(interned.right, ReLabelNode).child);
			expect(interned.toString()).to.equal(
				"join(t[['a', 'b', 'c', 'd']], t[['a', 'b', 'c', 'd']].relabel({b: 'b2', c: 'c2', d: 'd2'}), 'a', 'a')"
			);
		});
	});
});
