/**
 * Performance measures.
 *
 * A measure compares predictions with targets. Its orientation tells
 * best-model selection whether lower (`loss`) or higher (`score`) is better.
 *
 * @module @tuneforge/tuner/measures
 */

export type Orientation = "loss" | "score";

export interface Measure<Y, P> {
	readonly name: string;
	readonly orientation: Orientation;
	readonly supportsWeights: boolean;
	evaluate(yhat: readonly P[], y: readonly Y[], w?: readonly number[]): number;
	/** Describe why the predictions cannot be measured, or return null */
	check?(yhat: readonly P[], y: readonly Y[]): string | null;
}

function mean(values: readonly number[], w?: readonly number[]): number {
	if (values.length === 0) return Number.NaN;
	if (!w) {
		return values.reduce((sum, v) => sum + v, 0) / values.length;
	}
	let total = 0;
	let weight = 0;
	for (let i = 0; i < values.length; i++) {
		total += values[i] * w[i];
		weight += w[i];
	}
	return total / weight;
}

function checkNumeric(yhat: readonly unknown[]): string | null {
	const bad = yhat.findIndex((v) => typeof v !== "number" || !Number.isFinite(v));
	return bad === -1 ? null : `prediction ${bad} is not a finite number`;
}

export const l1: Measure<number, number> = {
	name: "l1",
	orientation: "loss",
	supportsWeights: true,
	evaluate: (yhat, y, w) => mean(yhat.map((p, i) => Math.abs(p - y[i])), w),
	check: checkNumeric,
};

export const l2: Measure<number, number> = {
	name: "l2",
	orientation: "loss",
	supportsWeights: true,
	evaluate: (yhat, y, w) => mean(yhat.map((p, i) => (p - y[i]) ** 2), w),
	check: checkNumeric,
};

export const rms: Measure<number, number> = {
	name: "rms",
	orientation: "loss",
	supportsWeights: true,
	evaluate: (yhat, y, w) => Math.sqrt(l2.evaluate(yhat, y, w)),
	check: checkNumeric,
};

export const accuracy: Measure<unknown, unknown> = {
	name: "accuracy",
	orientation: "score",
	supportsWeights: true,
	evaluate: (yhat, y, w) => mean(yhat.map((p, i) => (p === y[i] ? 1 : 0)), w),
};

export const misclassificationRate: Measure<unknown, unknown> = {
	name: "misclassification_rate",
	orientation: "loss",
	supportsWeights: true,
	evaluate: (yhat, y, w) => 1 - accuracy.evaluate(yhat, y, w),
};
