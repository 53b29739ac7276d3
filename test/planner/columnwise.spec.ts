import { expect } from 'chai';
import { symbol, column, project } from '../../src/planner/building/table.js';
import {
	columnwise, add, and, equal, greaterThan, lessThan, log, multiply, negate, not,
} from '../../src/planner/building/columnwise.js';
import { ColumnWiseNode } from '../../src/planner/nodes/columnwise-node.js';
import { BinaryOp, Literal, ScalarSymbol, UnaryOp } from '../../src/planner/nodes/scalar.js';
import { ConstructionError, MismatchedSourceError } from '../../src/common/errors.js';
import { StatusCode } from '../../src/common/types.js';
import { BOOL_TYPE, FLOAT64_TYPE, INT32_TYPE } from '../../src/types/element-type.js';

describe('Column-wise fusion', () => {
	const t = symbol('t', 'var * {name: string, amount: int32, id: int32}');
	const s = symbol('s', 'var * {amount: int32}');

	it('turns a comparison into a broadcast over the source table', () => {
		const cw = greaterThan(column(t, 'amount'), 0);
		expect(cw).to.be.instanceOf(ColumnWiseNode);
		expect(cw.child).to.equal(t);
		expect(cw.activeColumns()).to.deep.equal(['amount']);
		expect(cw.schema.toString()).to.equal('{amount: bool}');
		expect(cw.dtype).to.equal(BOOL_TYPE);
		expect(cw.toString()).to.equal("t['amount'] > 0");
	});

	it('names multi-column results after the expression', () => {
		const cw = add(column(t, 'amount'), column(t, 'id'));
		expect(cw.activeColumns()).to.deep.equal(['amount', 'id']);
		expect(cw.fieldName).to.equal('amount + id');
		expect(cw.dtype).to.equal(INT32_TYPE);
		expect(cw.toString()).to.equal("t['amount'] + t['id']");
	});

	it('fuses nested broadcasts into one scalar tree', () => {
		const cw = greaterThan(add(column(t, 'amount'), 1), column(t, 'id'));
		expect(cw.child).to.equal(t);
		expect(cw.expr).to.be.instanceOf(BinaryOp);
		expect(cw.expr.toString()).to.equal('(amount + 1) > id');
		expect(cw.fieldName).to.equal('(amount + 1) > id');
		expect(cw.toString()).to.equal("(t['amount'] + 1) > t['id']");
		expect(cw.getChildren()).to.deep.equal([t]);
	});

	it('de-duplicates active columns', () => {
		const amount = column(t, 'amount');
		expect(multiply(amount, amount).activeColumns()).to.deep.equal(['amount']);
		expect(multiply(amount, amount).fieldName).to.equal('amount');
	});

	it('combines boolean broadcasts', () => {
		const cw = and(greaterThan(column(t, 'amount'), 0), lessThan(column(t, 'id'), 10));
		expect(cw.dtype).to.equal(BOOL_TYPE);
		expect(cw.toString()).to.equal("(t['amount'] > 0) and (t['id'] < 10)");
	});

	it('renders string literals quoted', () => {
		expect(equal(column(t, 'name'), 'Alice').toString()).to.equal("t['name'] == 'Alice'");
	});

	it('supports unary operators', () => {
		expect(negate(column(t, 'amount')).toString()).to.equal("-t['amount']");
		expect(negate(column(t, 'amount')).dtype).to.equal(INT32_TYPE);
		expect(log(column(t, 'amount')).toString()).to.equal("log(t['amount'])");
		expect(log(column(t, 'amount')).dtype).to.equal(FLOAT64_TYPE);
	});

	it('accepts custom scalar builders', () => {
		const cw = columnwise((x, y) => new BinaryOp('-', new UnaryOp('abs', x), y), column(t, 'amount'), 3);
		expect(cw.expr.toString()).to.equal('abs(amount) - 3');
	});

	it('treats structurally identical tables as one source', () => {
		const t2 = symbol('t', 'var * {name: string, amount: int32, id: int32}');
		expect(add(column(t, 'amount'), column(t2, 'id')).activeColumns()).to.deep.equal(['amount', 'id']);
	});

	it('refuses columns of different tables', () => {
		const err = (() => {
			try {
				add(column(t, 'amount'), column(s, 'amount'));
			} catch (e) {
				return e;
			}
			return undefined;
		})();
		expect(err).to.be.instanceOf(MismatchedSourceError);
		expect(err).to.be.instanceOf(ConstructionError);
		expect(err).to.have.property('code', StatusCode.MISMATCH);
		expect(err).to.have.property('sources').that.deep.equals(['t', 's']);
	});

	it('treats a projection as a different table from its source', () => {
		expect(() => add(column(project(t, ['amount']), 'amount'), column(t, 'id')))
			.to.throw(MismatchedSourceError, 'All inputs must be from same table');
	});

	it('needs at least one column', () => {
		expect(() => columnwise(x => x, 5)).to.throw(ConstructionError, 'at least one column input');
	});

	it('type-checks operators', () => {
		expect(() => add(column(t, 'name'), 1))
			.to.throw(ConstructionError, "'+' requires numeric operands")
			.with.property('code', StatusCode.MISMATCH);
		expect(() => not(column(t, 'amount'))).to.throw(ConstructionError, "'not' requires a boolean operand");
		expect(() => greaterThan(column(t, 'name'), 1)).to.throw(ConstructionError, 'Cannot order string');
	});

	it('rejects placeholders the table does not have', () => {
		expect(() => new ColumnWiseNode(t, new ScalarSymbol('zzz', INT32_TYPE)))
			.to.throw(ConstructionError, "Mismatched column: 'zzz'");
	});

	it('keeps literal-only operands typed', () => {
		expect(new Literal(1.5).type).to.equal(FLOAT64_TYPE);
		expect(new Literal(true).type).to.equal(BOOL_TYPE);
	});
});
