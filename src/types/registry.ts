import { BUILTIN_TYPES, BOOL_TYPE, INT32_TYPE, FLOAT64_TYPE, STRING_TYPE, type ElementType } from './element-type.js';
import { createLogger } from '../common/logger.js';
import { leanframeError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

const log = createLogger('types:registry');
const debugLog = log.extend('debug');

/**
 * Type registry that maps type names (and aliases) to element type definitions.
 * Lookups are case-insensitive.
 */
export class TypeRegistry {
	private types = new Map<string, ElementType>();

	constructor() {
		for (const type of BUILTIN_TYPES) {
			this.registerType(type);
		}

		// Register common aliases
		this.types.set('int', INT32_TYPE);
		this.types.set('integer', INT32_TYPE);

		this.types.set('real', FLOAT64_TYPE);
		this.types.set('float', FLOAT64_TYPE);
		this.types.set('double', FLOAT64_TYPE);

		this.types.set('boolean', BOOL_TYPE);

		this.types.set('str', STRING_TYPE);
		this.types.set('text', STRING_TYPE);
	}

	/**
	 * Register a new element type
	 * @throws LeanframeError if a type with the same name is already registered
	 */
	registerType(type: ElementType): void {
		const key = type.name.toLowerCase();
		if (this.types.has(key)) {
			leanframeError(`Element type '${type.name}' is already registered`, StatusCode.CONSTRAINT);
		}
		this.types.set(key, type);
		debugLog('Registered element type %s', type.name);
	}

	/** Register an alias for an already registered type */
	registerAlias(alias: string, typeName: string): void {
		const type = this.getType(typeName);
		if (!type) {
			leanframeError(`Cannot alias '${alias}' to unknown type '${typeName}'`, StatusCode.NOTFOUND);
		}
		this.types.set(alias.toLowerCase(), type);
	}

	getType(name: string): ElementType | undefined {
		return this.types.get(name.toLowerCase());
	}

	hasType(name: string): boolean {
		return this.types.has(name.toLowerCase());
	}
}

/**
 * Global type registry instance
 */
export const typeRegistry = new TypeRegistry();

/**
 * Look up an element type by name or alias in the global registry
 */
export function getType(name: string): ElementType | undefined {
	return typeRegistry.getType(name);
}

/**
 * Register a custom element type in the global registry
 */
export function registerType(type: ElementType): void {
	typeRegistry.registerType(type);
}
