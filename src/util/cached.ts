/** Minimalistic caching utility for values derived from immutable state. */
export class Cached<T> {
	private cachedValue: T | undefined;

	constructor(private readonly compute: () => T) {}

	get value(): T {
		if (this.cachedValue === undefined) {	// More strict than truthy
			this.cachedValue = this.compute();
		}
		return this.cachedValue;
	}

	get hasValue(): boolean {
		return this.cachedValue !== undefined;
	}
}
