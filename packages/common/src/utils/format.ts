/**
 * Formatting utilities for log and error messages.
 *
 * @module @tuneforge/common/utils/format
 */

/**
 * Render a hyperparameter assignment as `name=value` pairs in key order.
 *
 * @example
 * ```ts
 * formatParams({ lambda: 0.1, depth: 3 }); // => "depth=3, lambda=0.1"
 * ```
 */
export function formatParams(params: Readonly<Record<string, unknown>>): string {
	return Object.keys(params)
		.sort()
		.map((key) => `${key}=${String(params[key])}`)
		.join(", ");
}
