const ids = new WeakMap<object, number>();
let nextId = 0;

/**
 * Stable identity for an opaque user function, so that expressions holding
 * the same function instance are structurally identical.
 */
export function functionId(fn: object): number {
	let id = ids.get(fn);
	if (id === undefined) {
		id = nextId++;
		ids.set(fn, id);
	}
	return id;
}
