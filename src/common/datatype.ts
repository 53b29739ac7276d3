import { sameType, type ElementType } from '../types/element-type.js';
import { constructionError } from './errors.js';
import { StatusCode } from './types.js';

export type RecordField = {
	readonly name: string;
	readonly type: ElementType;
};

/**
 * An ordered sequence of uniquely named, typed fields.
 * This is the schema of one row of a table-shaped expression.
 */
export class RecordType {
	readonly fields: readonly RecordField[];
	private readonly index: ReadonlyMap<string, number>;

	constructor(fields: readonly RecordField[]) {
		const index = new Map<string, number>();
		fields.forEach((field, i) => {
			if (index.has(field.name)) {
				constructionError(`Duplicate field name '${field.name}' in record type`);
			}
			index.set(field.name, i);
		});
		this.fields = Object.freeze([...fields]);
		this.index = index;
	}

	static of(...fields: [name: string, type: ElementType][]): RecordType {
		return new RecordType(fields.map(([name, type]) => ({ name, type })));
	}

	get names(): readonly string[] {
		return this.fields.map(f => f.name);
	}

	get size(): number {
		return this.fields.length;
	}

	has(name: string): boolean {
		return this.index.has(name);
	}

	indexOf(name: string): number {
		return this.index.get(name) ?? -1;
	}

	typeOf(name: string): ElementType {
		const i = this.index.get(name);
		if (i === undefined) {
			constructionError(`Mismatched column: '${name}' is not one of ${this.describeNames()}`, StatusCode.NOTFOUND);
		}
		return this.fields[i].type;
	}

	equals(other: RecordType): boolean {
		return this.fields.length === other.fields.length
			&& this.fields.every((f, i) => f.name === other.fields[i].name && sameType(f.type, other.fields[i].type));
	}

	/** True if every field of `other` is present here with the same type */
	contains(other: RecordType): boolean {
		return other.fields.every(f => {
			const i = this.index.get(f.name);
			return i !== undefined && sameType(this.fields[i].type, f.type);
		});
	}

	/** Restrict (and reorder) to the given names */
	restrict(names: readonly string[]): RecordType {
		return new RecordType(names.map(name => ({ name, type: this.typeOf(name) })));
	}

	/** Substitute field names, preserving order */
	rename(mapping: ReadonlyMap<string, string>): RecordType {
		return new RecordType(this.fields.map(f => ({ name: mapping.get(f.name) ?? f.name, type: f.type })));
	}

	concat(other: RecordType): RecordType {
		return new RecordType([...this.fields, ...other.fields]);
	}

	toString(): string {
		return `{${this.fields.map(f => `${f.name}: ${f.type.name}`).join(', ')}}`;
	}

	private describeNames(): string {
		return `[${this.names.map(n => `'${n}'`).join(', ')}]`;
	}
}

/** Row dimension of a table shape: unknown length, or a fixed row count */
export type Dimension = 'var' | number;

/**
 * Table-level shape: a row dimension plus the record type of each row.
 * A null dimension marks a reduced (single value) shape.
 */
export class TableShape {
	constructor(
		public readonly dimension: Dimension | null,
		public readonly schema: RecordType,
	) {}

	get isTabular(): boolean {
		return this.dimension !== null;
	}

	get isFixed(): boolean {
		return typeof this.dimension === 'number';
	}

	equals(other: TableShape): boolean {
		return this.dimension === other.dimension && this.schema.equals(other.schema);
	}

	toString(): string {
		return this.dimension === null ? this.schema.toString() : `${this.dimension} * ${this.schema.toString()}`;
	}
}
