/**
 * Train/test splitting schemes.
 *
 * @module @tuneforge/tuner/resampling
 */

import { ConfigurationError, createRNG, shuffled } from "@tuneforge/common";

export interface Fold {
	readonly train: readonly number[];
	readonly test: readonly number[];
}

export interface Holdout {
	readonly type: "holdout";
	readonly fractionTrain: number;
	readonly shuffle: boolean;
	readonly seed: number;
}

export interface CV {
	readonly type: "cv";
	readonly nfolds: number;
	readonly shuffle: boolean;
	readonly seed: number;
}

export interface ExplicitFolds {
	readonly type: "explicit";
	readonly folds: readonly Fold[];
}

export type ResamplingStrategy = Holdout | CV | ExplicitFolds;

export interface HoldoutOptions {
	fractionTrain?: number;
	shuffle?: boolean;
	seed?: number;
}

export interface CVOptions {
	nfolds?: number;
	shuffle?: boolean;
	seed?: number;
}

export function holdout(options: HoldoutOptions = {}): Holdout {
	const { fractionTrain = 0.7, shuffle = false, seed = 0 } = options;
	if (!(fractionTrain > 0 && fractionTrain < 1)) {
		throw new ConfigurationError("fractionTrain must lie strictly between 0 and 1", "resampling", undefined, {
			value: fractionTrain,
		});
	}
	return { type: "holdout", fractionTrain, shuffle, seed };
}

export function cv(options: CVOptions = {}): CV {
	const { nfolds = 6, shuffle = false, seed = 0 } = options;
	if (!Number.isInteger(nfolds) || nfolds < 2) {
		throw new ConfigurationError("nfolds must be an integer of at least 2", "resampling", undefined, {
			value: nfolds,
		});
	}
	return { type: "cv", nfolds, shuffle, seed };
}

export function explicitFolds(folds: readonly Fold[]): ExplicitFolds {
	if (folds.length === 0) {
		throw new ConfigurationError("explicitFolds needs at least one fold", "resampling");
	}
	return { type: "explicit", folds };
}

function rowOrder(nRows: number, shuffle: boolean, seed: number): number[] {
	const rows = Array.from({ length: nRows }, (_, i) => i);
	return shuffle ? shuffled(rows, createRNG(seed)) : rows;
}

/**
 * Folds for one repeat of a resampling scheme over `nRows` rows.
 *
 * Shuffled schemes draw from `seed + repeat`, so repeats differ while the
 * whole sequence stays reproducible.
 *
 * CV folds are contiguous runs of the (possibly shuffled) row order; the
 * first `nRows % nfolds` folds hold one extra row.
 */
export function trainTestPairs(strategy: ResamplingStrategy, nRows: number, repeat = 0): Fold[] {
	switch (strategy.type) {
		case "holdout": {
			const rows = rowOrder(nRows, strategy.shuffle, strategy.seed + repeat);
			const nTrain = Math.round(strategy.fractionTrain * nRows);
			if (nTrain === 0 || nTrain === nRows) {
				throw new ConfigurationError(
					`Holdout with fractionTrain ${strategy.fractionTrain} leaves an empty split on ${nRows} rows`,
					"resampling",
				);
			}
			return [{ train: rows.slice(0, nTrain), test: rows.slice(nTrain) }];
		}

		case "cv": {
			const { nfolds } = strategy;
			if (nfolds > nRows) {
				throw new ConfigurationError(
					`Cannot split ${nRows} rows into ${nfolds} folds`,
					"resampling",
				);
			}
			const rows = rowOrder(nRows, strategy.shuffle, strategy.seed + repeat);
			const base = Math.floor(nRows / nfolds);
			const extra = nRows % nfolds;
			const folds: Fold[] = [];
			let start = 0;
			for (let k = 0; k < nfolds; k++) {
				const end = start + base + (k < extra ? 1 : 0);
				folds.push({
					train: [...rows.slice(0, start), ...rows.slice(end)],
					test: rows.slice(start, end),
				});
				start = end;
			}
			return folds;
		}

		case "explicit":
			for (const fold of strategy.folds) {
				const outside = [...fold.train, ...fold.test].find(
					(row) => !Number.isInteger(row) || row < 0 || row >= nRows,
				);
				if (outside !== undefined) {
					throw new ConfigurationError(
						`Fold row ${outside} is outside the ${nRows} rows of the data`,
						"resampling",
					);
				}
			}
			return strategy.folds.map((fold) => ({ train: [...fold.train], test: [...fold.test] }));
	}
}
