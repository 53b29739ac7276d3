import { expect } from 'chai';
import {
	symbol, column, project, select, sort, distinct, head, label, relabel, map, apply, join,
} from '../../src/planner/building/table.js';
import { add, greaterThan, negate } from '../../src/planner/building/columnwise.js';
import { by, combine, count, sum, summary } from '../../src/planner/building/aggregates.js';
import { leanProjection, LeanOptimizer } from '../../src/planner/optimizer.js';
import { ColumnNode } from '../../src/planner/nodes/column-node.js';
import { ByNode } from '../../src/planner/nodes/by-node.js';
import { JoinNode } from '../../src/planner/nodes/join-node.js';
import { ProjectionNode } from '../../src/planner/nodes/projection-node.js';
import { ReLabelNode } from '../../src/planner/nodes/relabel-node.js';
import { SummaryNode } from '../../src/planner/nodes/summary-node.js';
import { OptimizerError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';
import type { ExprNode } from '../../src/planner/nodes/expr-node.js';
import { distinctLeafColumns, expectLeanLeaves, expectNode, leafProjections } from '../util/expr-helpers.js';

describe('Lean projection', () => {
	const t = symbol('t', 'var * {a: int, b: int, c: int, d: int}');
	const rowFn = (..._args: never[]): number => 0;

	describe('selection and column pull', () => {
		const expr = column(select(t, greaterThan(column(t, 'a'), 0)), 'b');

		it('narrows the table to the selected and predicate columns', () => {
			const lean = leanProjection(expr);
			expect(lean.toString()).to.equal("t[['a', 'b']][t[['a', 'b']]['a'] > 0]['b']");
			expect(lean.columns).to.deep.equal(['b']);
			expect(distinctLeafColumns(lean)).to.deep.equal(['a,b']);
		});

		it('projects the source of a predicate built over an ancestor of the selected table', () => {
			const lean = leanProjection(column(select(project(t, ['a', 'b']), greaterThan(column(t, 'a'), 0)), 'b'));
			expect(lean.toString()).to.equal("t[['b']][t[['a']]['a'] > 0]['b']");
			expect(leanProjection(lean)).to.equal(lean);
		});

		it('is idempotent', () => {
			const once = leanProjection(expr);
			expect(leanProjection(once)).to.equal(once);
		});

		it('leaves the input untouched', () => {
			const before = expr.toString();
			leanProjection(expr);
			expect(expr.toString()).to.equal(before);
		});
	});

	describe('symbols and projections', () => {
		it('projects a bare table onto all its columns', () => {
			expect(leanProjection(t).toString()).to.equal("t[['a', 'b', 'c', 'd']]");
		});

		it('keeps the column order of an explicit projection', () => {
			const lean = leanProjection(project(t, ['d', 'a']));
			expect(lean.toString()).to.equal("t[['d', 'a']]");
			expect(lean.columns).to.deep.equal(['d', 'a']);
		});

		it('narrows nested projections to what is read', () => {
			const lean = leanProjection(column(project(t, ['a', 'b', 'c']), 'a'));
			expect(lean.toString()).to.equal("t[['a']]['a']");
		});

		it('collapses nested projections', () => {
			const lean = leanProjection(project(project(t, ['c', 'b', 'a']), ['b']));
			expect(lean.toString()).to.equal("t[['b']]");
		});

		it('restores column order changed by sorted leaf projections', () => {
			const l = symbol('l', '{name: string, id: int32}');
			const r = symbol('r', '{id: int32, amount: float64}');
			const lean = leanProjection(join(l, r, 'id'));
			const outer = expectNode(lean, ProjectionNode);
			expect(outer.projected).to.deep.equal(['name', 'id', 'amount']);
			expect(lean.toString()).to.equal("join(l[['id', 'name']], r[['amount', 'id']], 'id', 'id')[['name', 'id', 'amount']]");
		});
	});

	describe('broadcasts', () => {
		it('requests every active column', () => {
			const lean = leanProjection(add(column(t, 'a'), column(t, 'c')));
			expect(lean.toString()).to.equal("t[['a', 'c']]['a'] + t[['a', 'c']]['c']");
		});
	});

	describe('summaries', () => {
		const s = summary({ total: sum(column(t, 'a')), cnt: count(column(t, 'b')) });

		it('drops entries nobody requests', () => {
			const result = new LeanOptimizer().leanNode(s, new Set(['total']), 0);
			const lean = expectNode(result.node, SummaryNode);
			expect(lean.names).to.deep.equal(['total']);
			expect(lean.toString()).to.equal("summary(total=sum(t[['a']]['a']))");
			expect([...result.fields]).to.deep.equal(['a']);
		});

		it('drops entries through a projection', () => {
			const lean = leanProjection(project(s, ['total']));
			expect(lean.toString()).to.equal("summary(total=sum(t[['a']]['a']))[['total']]");
			expect(distinctLeafColumns(lean)).to.deep.equal(['a']);
		});

		it('keeps every entry of a root summary', () => {
			const lean = leanProjection(s);
			expect(lean.toString()).to.equal("summary(total=sum(t[['a']]['a']), cnt=count(t[['b']]['b']))");
		});

		it('leans each reduction of a combined entry', () => {
			const lean = leanProjection(summary({ avg: combine('/', sum(column(t, 'a')), count(column(t, 'c'))) }));
			expect(lean.toString()).to.equal("summary(avg=sum(t[['a']]['a']) / count(t[['c']]['c']))");
		});
	});

	describe('reductions', () => {
		it('ignores the request above a reduction', () => {
			const lean = leanProjection(sum(column(t, 'c')));
			expect(lean.toString()).to.equal("sum(t[['c']]['c'])");
		});

		it('keeps all columns of a row count', () => {
			const lean = leanProjection(count(project(t, ['b', 'a'])));
			expect(lean.toString()).to.equal("count(t[['b', 'a']])");
		});

		it('reads through labels', () => {
			const lean = leanProjection(sum(label(column(t, 'a'), 'x')));
			expect(lean.toString()).to.equal("sum(t[['a']]['a'].label('x'))");
			expect(lean.columns).to.deep.equal(['x']);
		});
	});

	describe('group-by', () => {
		const accounts = symbol('t', 'var * {name: string, amount: int, id: int}');
		const grouped = by(column(accounts, 'name'), sum(column(accounts, 'amount')));

		it('shares one pruned table between grouper and apply', () => {
			const lean = expectNode(leanProjection(grouped), ByNode);
			expect(distinctLeafColumns(lean)).to.deep.equal(['amount,name']);
			expect(lean.parent.toString()).to.equal("t[['amount', 'name']]");
			expect(lean.toString()).to.equal(
				"by(t[['amount', 'name']]['name'], sum(t[['amount', 'name']]['amount']))"
			);
			expect(lean.schema.equals(grouped.schema)).to.be.true;
		});

		it('is stable under a second pass', () => {
			const once = leanProjection(grouped);
			expect(leanProjection(once)).to.equal(once);
		});

		it('keeps predicate columns of a shared selection', () => {
			const positive = select(accounts, greaterThan(column(accounts, 'amount'), 0));
			const lean = expectNode(leanProjection(by(column(positive, 'name'), count(column(positive, 'id')))), ByNode);
			expect(lean.parent.toString()).to.equal("t[['amount', 'id', 'name']][t[['amount', 'id', 'name']]['amount'] > 0]");
			expect(distinctLeafColumns(lean)).to.deep.equal(['amount,id,name']);
		});

		it('leans a summary apply', () => {
			const b = by(column(accounts, 'name'), summary({ total: sum(column(accounts, 'amount')), n: count(column(accounts, 'id')) }));
			const lean = expectNode(leanProjection(project(b, ['name', 'total'])), ProjectionNode);
			const inner = expectNode(lean.child, ByNode);
			expect(inner.columns).to.deep.equal(['name', 'total']);
			expect(distinctLeafColumns(lean)).to.deep.equal(['amount,name']);
		});

		it('keeps every apply entry when the requested ones do not read the grouped table', () => {
			const u = symbol('u', '{x: int32}');
			const b = by(column(accounts, 'name'), summary({ total: sum(column(accounts, 'amount')), other: sum(column(u, 'x')) }));
			const lean = leanProjection(project(b, ['name', 'other']));
			expect(lean.toString()).to.equal(
				"by(t[['amount', 'name']]['name'], summary(total=sum(t[['amount', 'name']]['amount']), other=sum(u[['x']]['x'])))[['name', 'other']]"
			);
		});

		it('groups over a relabeled table', () => {
			const renamed = relabel(accounts, { name: 'nm' });
			const b = by(column(renamed, 'nm'), sum(column(renamed, 'amount')));
			const lean = expectNode(leanProjection(b), ByNode);
			expect(lean.toString()).to.equal(
				"by(t[['amount', 'name']].relabel({name: 'nm'})['nm'], sum(t[['amount', 'name']].relabel({name: 'nm'})['amount']))"
			);
			expect(lean.parent.toString()).to.equal("t[['amount', 'name']].relabel({name: 'nm'})");
			expect(lean.schema.equals(b.schema)).to.be.true;
		});

		it('groups over a join', () => {
			const names = symbol('names', '{id: int32, name: string}');
			const amounts = symbol('amounts', '{acct: int32, amount: float64}');
			const joined = join(names, amounts, 'id', 'acct');
			const b = by(column(joined, 'name'), sum(column(joined, 'amount')));
			const lean = expectNode(leanProjection(b), ByNode);
			expect(lean.toString()).to.equal(
				"by(join(names[['id', 'name']], amounts[['acct', 'amount']], 'id', 'acct')['name'], "
				+ "sum(join(names[['id', 'name']], amounts[['acct', 'amount']], 'id', 'acct')['amount']))"
			);
			expect(leanProjection(lean)).to.equal(lean);
		});
	});

	describe('ordering and row limits', () => {
		it('keeps sort keys', () => {
			const lean = leanProjection(column(sort(t, 'c'), 'b'));
			expect(lean.toString()).to.equal("t[['b', 'c']].sort('c', ascending=true)['b']");
		});

		it('leans a computed sort key', () => {
			const lean = leanProjection(column(sort(t, negate(column(t, 'd'))), 'a'));
			expect(lean.toString()).to.equal("t[['a', 'd']].sort(-t[['a', 'd']]['d'], ascending=true)['a']");
		});

		it('passes requests through head', () => {
			expect(leanProjection(column(head(t, 5), 'a')).toString()).to.equal("t[['a']].head(5)['a']");
		});

		it('keeps every column under distinct', () => {
			expect(leanProjection(column(distinct(t), 'a')).toString()).to.equal("distinct(t[['a', 'b', 'c', 'd']])['a']");
		});
	});

	describe('renaming', () => {
		it('translates requests through the rename', () => {
			expect(leanProjection(column(relabel(t, { a: 'x' }), 'x')).toString())
				.to.equal("t[['a']].relabel({a: 'x'})['x']");
		});

		it('drops renames of pruned columns', () => {
			const lean = leanProjection(column(relabel(t, { a: 'x' }), 'b'));
			expect(lean.toString()).to.equal("t[['b']].relabel({})['b']");
			const renamed = expectNode(expectNode(lean, ColumnNode).child, ReLabelNode);
			expect(renamed.labels).to.deep.equal([]);
			expect(expectNode(renamed.child, ProjectionNode).projected).to.deep.equal(['b']);
		});
	});

	describe('opaque functions', () => {
		it('gives mapped functions whole rows', () => {
			const lean = leanProjection(column(map(t, rowFn, '{y: int}'), 'y'));
			expect(lean.toString()).to.equal("map(t[['a', 'b', 'c', 'd']], rowFn)['y']");
		});

		it('leans below functions without a declared schema', () => {
			expect(leanProjection(map(t, rowFn)).toString()).to.equal("map(t[['a', 'b', 'c', 'd']], rowFn)");
			expect(leanProjection(apply(rowFn, column(t, 'a'), 'int32')).toString()).to.equal("apply(rowFn, t[['a']]['a'])");
		});
	});

	describe('joins', () => {
		const l = symbol('l', '{id: int32, name: string}');
		const r = symbol('r', '{id: int32, amount: float64}');

		it('keeps both join keys', () => {
			const lean = expectNode(leanProjection(join(l, r, 'id')), JoinNode);
			expect(lean.schema.toString()).to.equal('{id: int32, name: string, amount: float64}');
			expect(lean.toString()).to.equal("join(l[['id', 'name']], r[['amount', 'id']], 'id', 'id')");
		});

		it('prunes a side down to its key', () => {
			const lean = leanProjection(project(join(l, r, 'id'), ['name']));
			const leaves = leafProjections(lean);
			expect(leaves.get('l')).to.deep.equal([['id', 'name']]);
			expect(leaves.get('r')).to.deep.equal([['id']]);
			expect(lean.schema.toString()).to.equal('{name: string}');
		});
	});

	describe('leaf projections', () => {
		const accounts = symbol('t', 'var * {name: string, amount: int, id: int}');
		const u = symbol('u', '{x: int32}');
		const l = symbol('l', '{id: int32, name: string}');
		const r = symbol('r', '{id: int32, amount: float64}');
		const positive = select(accounts, greaterThan(column(accounts, 'amount'), 0));
		const renamed = relabel(accounts, { name: 'nm' });
		const joined = join(l, r, 'id');
		const s = summary({ total: sum(column(t, 'a')), cnt: count(column(t, 'b')) });

		const cases: [string, () => ExprNode][] = [
			['selection and column pull', () => column(select(t, greaterThan(column(t, 'a'), 0)), 'b')],
			['predicate over an ancestor', () => column(select(project(t, ['a', 'b']), greaterThan(column(t, 'a'), 0)), 'b')],
			['summary projection', () => project(s, ['total'])],
			['group-by', () => by(column(accounts, 'name'), sum(column(accounts, 'amount')))],
			['group-by over a selection', () => by(column(positive, 'name'), count(column(positive, 'id')))],
			['group-by with a summary', () => project(
				by(column(accounts, 'name'), summary({ total: sum(column(accounts, 'amount')), n: count(column(accounts, 'id')) })),
				['name', 'total']
			)],
			['group-by with an unread entry', () => project(
				by(column(accounts, 'name'), summary({ total: sum(column(accounts, 'amount')), other: sum(column(u, 'x')) })),
				['name', 'other']
			)],
			['group-by over a rename', () => by(column(renamed, 'nm'), sum(column(renamed, 'amount')))],
			['group-by over a join', () => by(column(joined, 'name'), sum(column(joined, 'amount')))],
			['sort by column', () => column(sort(t, 'c'), 'b')],
			['sort by expression', () => column(sort(t, negate(column(t, 'd'))), 'a')],
			['rename kept', () => column(relabel(t, { a: 'x' }), 'x')],
			['rename pruned', () => column(relabel(t, { a: 'x' }), 'b')],
			['join', () => join(l, r, 'id')],
			['join projection', () => project(join(l, r, 'id'), ['name'])],
			['distinct', () => column(distinct(t), 'a')],
			['head', () => column(head(t, 5), 'a')],
			['map', () => column(map(t, rowFn, '{y: int}'), 'y')],
		];

		for (const [name, build] of cases) {
			it(`carries exactly the consumed columns: ${name}`, () => {
				expectLeanLeaves(leanProjection(build()));
			});
		}
	});

	describe('failures', () => {
		it('refuses requests for fields the node does not have', () => {
			expect(() => new LeanOptimizer().leanNode(t, new Set(['zzz']), 0))
				.to.throw(OptimizerError, "Requested field 'zzz'")
				.with.property('code', StatusCode.MISUSE);
		});

		it('enforces the maximum depth', () => {
			const expr = column(select(t, greaterThan(column(t, 'a'), 0)), 'b');
			expect(() => leanProjection(expr, { tuning: { maxDepth: 1 } }))
				.to.throw(OptimizerError, 'Maximum lean depth 1 exceeded')
				.with.property('code', StatusCode.INTERNAL);
		});
	});
});
