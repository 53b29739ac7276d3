/**
 * Values that may appear as literals inside scalar expressions.
 */
export type LiteralValue = number | string | boolean;

/**
 * Status codes carried by every Leanframe error.
 * Used by callers to tell error families apart without string matching.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	NOTFOUND = 12,
	SCHEMA = 17,
	CONSTRAINT = 19,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
}
