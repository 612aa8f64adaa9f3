/**
 * Structural copy and comparison of configuration objects.
 *
 * Class instances keep their prototype when copied, functions are shared by
 * reference, and two values are equal when they have the same prototype and
 * pairwise-equal own enumerable properties.
 *
 * @module @tuneforge/common/utils/structural
 */

/**
 * Deep-copy a value, preserving prototypes and cycles.
 *
 * @example
 * ```ts
 * const snapshot = deepCopy(settings);
 * snapshot.model === settings.model; // => false
 * ```
 */
export function deepCopy<T>(value: T): T {
	return copyValue(value, new Map()) as T;
}

function copyValue(value: unknown, seen: Map<object, unknown>): unknown {
	if (value === null || typeof value !== "object") {
		return value;
	}

	const existing = seen.get(value);
	if (existing !== undefined) return existing;

	if (Array.isArray(value)) {
		const out: unknown[] = [];
		seen.set(value, out);
		for (const item of value) out.push(copyValue(item, seen));
		return Object.isFrozen(value) ? Object.freeze(out) : out;
	}

	if (value instanceof Date) {
		return new Date(value.getTime());
	}

	if (value instanceof Map) {
		const out = new Map<unknown, unknown>();
		seen.set(value, out);
		for (const [key, item] of value) out.set(key, copyValue(item, seen));
		return out;
	}

	if (value instanceof Set) {
		const out = new Set<unknown>();
		seen.set(value, out);
		for (const item of value) out.add(copyValue(item, seen));
		return out;
	}

	const out: Record<string, unknown> = Object.create(Object.getPrototypeOf(value));
	seen.set(value, out);
	for (const [key, item] of Object.entries(value)) {
		out[key] = copyValue(item, seen);
	}
	return Object.isFrozen(value) ? Object.freeze(out) : out;
}

/**
 * Structural equality over primitives, arrays, maps, sets, dates and objects.
 * Functions compare by identity; NaN equals NaN.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
	return equalValues(a, b, new Map());
}

function equalValues(a: unknown, b: unknown, seen: Map<object, object>): boolean {
	if (Object.is(a, b)) return true;
	if (a === null || b === null || typeof a !== "object" || typeof b !== "object") {
		return false;
	}
	if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;

	// Cyclic structures: assume equal on revisit
	if (seen.get(a) === b) return true;
	seen.set(a, b);

	if (Array.isArray(a) && Array.isArray(b)) {
		if (a.length !== b.length) return false;
		return a.every((item, i) => equalValues(item, b[i], seen));
	}

	if (a instanceof Date && b instanceof Date) {
		return a.getTime() === b.getTime();
	}

	if (a instanceof Map && b instanceof Map) {
		if (a.size !== b.size) return false;
		for (const [key, item] of a) {
			if (!b.has(key) || !equalValues(item, b.get(key), seen)) return false;
		}
		return true;
	}

	if (a instanceof Set && b instanceof Set) {
		if (a.size !== b.size) return false;
		for (const item of a) {
			if (!b.has(item)) return false;
		}
		return true;
	}

	const entriesA = Object.entries(a);
	const keysB = Object.keys(b);
	if (entriesA.length !== keysB.length) return false;

	const recordB: Record<string, unknown> = { ...b };
	return entriesA.every(
		([key, item]) => Object.hasOwn(recordB, key) && equalValues(item, recordB[key], seen),
	);
}

/**
 * Compare two objects field by field, ignoring the listed fields.
 *
 * @example
 * ```ts
 * isSameExcept({ n: 5, repeats: 1 }, { n: 10, repeats: 1 }, ["n"]); // => true
 * ```
 */
export function isSameExcept<T extends object>(
	current: T,
	previous: T,
	exclude: readonly (keyof T & string)[],
): boolean {
	const skip = new Set<string>(exclude);
	const a = Object.entries(current).filter(([key]) => !skip.has(key));
	const b = Object.entries(previous).filter(([key]) => !skip.has(key));
	if (a.length !== b.length) return false;

	const recordB = new Map(b);
	return a.every(([key, value]) => recordB.has(key) && deepEqual(value, recordB.get(key)));
}
