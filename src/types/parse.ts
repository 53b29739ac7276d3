import { RecordType, TableShape, type Dimension, type RecordField } from '../common/datatype.js';
import { TypeParseError } from '../common/errors.js';
import { typeRegistry, type TypeRegistry } from './registry.js';

/**
 * Parser for schema description strings.
 *
 * Grammar:
 *   shape  := [dim '*'] record
 *   dim    := 'var' | integer
 *   record := '{' [field (',' field)* [',']] '}'
 *   field  := (identifier | quoted) ':' identifier
 */
class SchemaParser {
	private pos = 0;

	constructor(private readonly text: string, private readonly registry: TypeRegistry) {}

	parseShape(): TableShape {
		let dimension: Dimension = 'var';
		this.skipSpace();
		if (this.peek() !== '{') {
			dimension = this.parseDimension();
			this.expect('*');
		}
		const schema = this.parseRecord();
		this.expectEnd();
		return new TableShape(dimension, schema);
	}

	parseRecordOnly(): RecordType {
		this.skipSpace();
		if (this.peek() !== '{') {
			// Tolerate a leading dimension; only the row type is returned
			this.parseDimension();
			this.expect('*');
		}
		const schema = this.parseRecord();
		this.expectEnd();
		return schema;
	}

	private parseDimension(): Dimension {
		this.skipSpace();
		const start = this.pos;
		const word = this.readWord();
		if (word === 'var') {
			return 'var';
		}
		if (/^\d+$/.test(word)) {
			return Number.parseInt(word, 10);
		}
		throw this.error(`Expected 'var', a row count or '{'`, start);
	}

	private parseRecord(): RecordType {
		this.expect('{');
		const fields: RecordField[] = [];
		const seen = new Set<string>();
		this.skipSpace();
		while (this.peek() !== '}') {
			const nameStart = this.pos;
			const name = this.parseFieldName();
			if (seen.has(name)) {
				throw this.error(`Duplicate field name '${name}'`, nameStart);
			}
			seen.add(name);
			this.expect(':');
			this.skipSpace();
			const typeStart = this.pos;
			const typeName = this.readWord();
			if (!typeName) {
				throw this.error(`Expected a type name for field '${name}'`, typeStart);
			}
			const type = this.registry.getType(typeName);
			if (!type) {
				throw this.error(`Unknown type '${typeName}'`, typeStart);
			}
			fields.push({ name, type });
			this.skipSpace();
			if (this.peek() === ',') {
				this.pos++;
				this.skipSpace();
			} else if (this.peek() !== '}') {
				throw this.error(`Expected ',' or '}'`, this.pos);
			}
		}
		this.expect('}');
		return new RecordType(fields);
	}

	private parseFieldName(): string {
		this.skipSpace();
		const quote = this.peek();
		if (quote === '"' || quote === "'") {
			const start = this.pos;
			const end = this.text.indexOf(quote, start + 1);
			if (end < 0) {
				throw this.error('Unterminated quoted field name', start);
			}
			this.pos = end + 1;
			return this.text.slice(start + 1, end);
		}
		const start = this.pos;
		const word = this.readWord();
		if (!word) {
			throw this.error('Expected a field name', start);
		}
		return word;
	}

	private readWord(): string {
		const match = /^[A-Za-z_][A-Za-z0-9_]*|^\d+/.exec(this.text.slice(this.pos));
		if (!match) {
			return '';
		}
		this.pos += match[0].length;
		return match[0];
	}

	private expect(ch: string): void {
		this.skipSpace();
		if (this.peek() !== ch) {
			throw this.error(`Expected '${ch}'`, this.pos);
		}
		this.pos++;
	}

	private expectEnd(): void {
		this.skipSpace();
		if (this.pos < this.text.length) {
			throw this.error('Unexpected trailing input', this.pos);
		}
	}

	private peek(): string {
		return this.text.charAt(this.pos);
	}

	private skipSpace(): void {
		while (this.pos < this.text.length && /\s/.test(this.text.charAt(this.pos))) {
			this.pos++;
		}
	}

	private error(message: string, position: number): TypeParseError {
		return new TypeParseError(message, this.text, position);
	}
}

/**
 * Parse a table shape such as `var * {name: string, amount: int}` or `5 * {x: float64}`.
 * A bare record is given a variable row dimension.
 */
export function parseTableShape(text: string, registry: TypeRegistry = typeRegistry): TableShape {
	return new SchemaParser(text, registry).parseShape();
}

/**
 * Parse the row type of a schema description; any leading dimension is accepted and dropped.
 */
export function parseRecordType(text: string, registry: TypeRegistry = typeRegistry): RecordType {
	return new SchemaParser(text, registry).parseRecordOnly();
}
