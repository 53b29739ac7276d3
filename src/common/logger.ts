import debug from 'debug';

const BASE_NAMESPACE = 'leanframe';

/**
 * Logger for one subsystem, e.g. `createLogger('optimizer:rule:lean-aggregate')` writes
 * to `leanframe:optimizer:rule:lean-aggregate`. Use `.extend('warn')` for a warning channel.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Turn on the channels matching `pattern`, optionally redirecting output.
 *
 * @example
 * ```typescript
 * // Optimizer phases and rule traces, without the registry noise
 * enableLogging('leanframe:optimizer*,-leanframe:optimizer:framework:*', console.log.bind(console));
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

export function disableLogging(): void {
	debug.disable();
}

/** Whether `namespace` (relative to `leanframe:`) currently writes output */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
