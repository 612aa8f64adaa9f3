/**
 * Seeded random number generation.
 *
 * Strategies and resampling draw from a {@link DeterministicRNG} rather than
 * `Math.random()` so that searches are reproducible from a seed.
 *
 * @module @tuneforge/common/utils/random
 */

export interface DeterministicRNG {
	/** Next float in [0, 1) */
	next(): number;

	/** Next integer in [min, max] (inclusive) */
	nextInt(min: number, max: number): number;

	/** Next float in [min, max) */
	nextFloat(min: number, max: number): number;

	/** Independent copy with the same internal state */
	clone(): DeterministicRNG;
}

/**
 * mulberry32 generator: 32-bit state, fast, adequate for sampling and shuffling.
 */
export class SeededRNG implements DeterministicRNG {
	private state: number;

	constructor(seed: number) {
		this.state = seed >>> 0;
	}

	next(): number {
		this.state = (this.state + 0x6d2b79f5) >>> 0;
		let t = this.state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	}

	nextInt(min: number, max: number): number {
		return min + Math.floor(this.next() * (max - min + 1));
	}

	nextFloat(min: number, max: number): number {
		return min + this.next() * (max - min);
	}

	clone(): SeededRNG {
		const copy = new SeededRNG(0);
		copy.state = this.state;
		return copy;
	}
}

/**
 * Create a generator from a seed.
 */
export function createRNG(seed: number): DeterministicRNG {
	return new SeededRNG(seed);
}

/**
 * Fisher-Yates shuffle returning a new array; the input is left untouched.
 */
export function shuffled<T>(items: readonly T[], rng: DeterministicRNG): T[] {
	const out = [...items];
	for (let i = out.length - 1; i > 0; i--) {
		const j = rng.nextInt(0, i);
		const tmp = out[i];
		out[i] = out[j];
		out[j] = tmp;
	}
	return out;
}
