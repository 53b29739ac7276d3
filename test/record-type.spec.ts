import { expect } from 'chai';
import { RecordType, TableShape } from '../src/common/datatype.js';
import { ConstructionError } from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';
import { FLOAT64_TYPE, INT32_TYPE, STRING_TYPE } from '../src/types/element-type.js';

describe('RecordType', () => {
	const record = RecordType.of(['a', INT32_TYPE], ['b', STRING_TYPE]);

	it('keeps field order', () => {
		expect(record.names).to.deep.equal(['a', 'b']);
		expect(record.size).to.equal(2);
		expect(record.indexOf('b')).to.equal(1);
		expect(record.indexOf('z')).to.equal(-1);
		expect(record.toString()).to.equal('{a: int32, b: string}');
	});

	it('rejects duplicate names', () => {
		expect(() => RecordType.of(['a', INT32_TYPE], ['a', STRING_TYPE]))
			.to.throw(ConstructionError, "Duplicate field name 'a'");
	});

	it('reports unknown fields as mismatched columns', () => {
		expect(() => record.typeOf('c'))
			.to.throw(ConstructionError, "Mismatched column: 'c' is not one of ['a', 'b']")
			.with.property('code', StatusCode.NOTFOUND);
	});

	it('compares structurally', () => {
		expect(record.equals(RecordType.of(['a', INT32_TYPE], ['b', STRING_TYPE]))).to.be.true;
		expect(record.equals(RecordType.of(['b', STRING_TYPE], ['a', INT32_TYPE]))).to.be.false;
		expect(record.equals(RecordType.of(['a', FLOAT64_TYPE], ['b', STRING_TYPE]))).to.be.false;
	});

	it('checks containment by name and type', () => {
		expect(record.contains(RecordType.of(['b', STRING_TYPE]))).to.be.true;
		expect(record.contains(RecordType.of(['b', INT32_TYPE]))).to.be.false;
	});

	it('restricts and reorders', () => {
		expect(record.restrict(['b', 'a']).toString()).to.equal('{b: string, a: int32}');
	});

	it('renames in place', () => {
		expect(record.rename(new Map([['a', 'x']])).toString()).to.equal('{x: int32, b: string}');
	});

	it('refuses to concatenate overlapping records', () => {
		expect(() => record.concat(RecordType.of(['b', FLOAT64_TYPE]))).to.throw(ConstructionError);
		expect(record.concat(RecordType.of(['c', FLOAT64_TYPE])).names).to.deep.equal(['a', 'b', 'c']);
	});
});

describe('TableShape', () => {
	const record = RecordType.of(['a', INT32_TYPE]);

	it('renders the dimension', () => {
		expect(new TableShape('var', record).toString()).to.equal('var * {a: int32}');
		expect(new TableShape(3, record).toString()).to.equal('3 * {a: int32}');
	});

	it('renders a reduced shape as its record', () => {
		const shape = new TableShape(null, record);
		expect(shape.isTabular).to.be.false;
		expect(shape.toString()).to.equal('{a: int32}');
	});

	it('compares dimension and schema', () => {
		expect(new TableShape('var', record).equals(new TableShape('var', record))).to.be.true;
		expect(new TableShape('var', record).equals(new TableShape(3, record))).to.be.false;
	});
});
