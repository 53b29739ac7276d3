/**
 * Element types describe the value held by one field of a record.
 * They are identified by name; two element types are equal iff their names are.
 */
export interface ElementType {
	/** Canonical type name (e.g. "int32", "string") */
	readonly name: string;

	// Metadata
	/** Is this a numeric type? */
	readonly isNumeric?: boolean;
	/** Is this an integral numeric type? */
	readonly isInteger?: boolean;
	/** Bit width of numeric types, used to widen arithmetic results */
	readonly width?: number;
	/** Is this a textual type? */
	readonly isTextual?: boolean;
	/** Is this a temporal type? */
	readonly isTemporal?: boolean;
	/** Is this the boolean type? */
	readonly isBoolean?: boolean;
}

export const BOOL_TYPE: ElementType = { name: 'bool', isBoolean: true };

export const INT8_TYPE: ElementType = { name: 'int8', isNumeric: true, isInteger: true, width: 8 };
export const INT16_TYPE: ElementType = { name: 'int16', isNumeric: true, isInteger: true, width: 16 };
export const INT32_TYPE: ElementType = { name: 'int32', isNumeric: true, isInteger: true, width: 32 };
export const INT64_TYPE: ElementType = { name: 'int64', isNumeric: true, isInteger: true, width: 64 };
export const UINT8_TYPE: ElementType = { name: 'uint8', isNumeric: true, isInteger: true, width: 8 };
export const UINT16_TYPE: ElementType = { name: 'uint16', isNumeric: true, isInteger: true, width: 16 };
export const UINT32_TYPE: ElementType = { name: 'uint32', isNumeric: true, isInteger: true, width: 32 };
export const UINT64_TYPE: ElementType = { name: 'uint64', isNumeric: true, isInteger: true, width: 64 };

export const FLOAT32_TYPE: ElementType = { name: 'float32', isNumeric: true, width: 32 };
export const FLOAT64_TYPE: ElementType = { name: 'float64', isNumeric: true, width: 64 };

export const STRING_TYPE: ElementType = { name: 'string', isTextual: true };

export const DATE_TYPE: ElementType = { name: 'date', isTemporal: true };
export const DATETIME_TYPE: ElementType = { name: 'datetime', isTemporal: true };

export const BUILTIN_TYPES: readonly ElementType[] = [
	BOOL_TYPE,
	INT8_TYPE, INT16_TYPE, INT32_TYPE, INT64_TYPE,
	UINT8_TYPE, UINT16_TYPE, UINT32_TYPE, UINT64_TYPE,
	FLOAT32_TYPE, FLOAT64_TYPE,
	STRING_TYPE,
	DATE_TYPE, DATETIME_TYPE,
];

export function sameType(a: ElementType, b: ElementType): boolean {
	return a.name === b.name;
}

/**
 * Result type of numeric arithmetic between two operands.
 * Integers widen to the wider operand; any floating operand yields a float.
 */
export function widenNumeric(a: ElementType, b: ElementType): ElementType {
	if (a.isInteger && b.isInteger) {
		return (b.width ?? 0) > (a.width ?? 0) ? b : a;
	}
	if (a.name === 'float32' && b.name === 'float32') {
		return FLOAT32_TYPE;
	}
	return FLOAT64_TYPE;
}
