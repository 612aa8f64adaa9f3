/**
 * Resampling evaluation of one model configuration.
 *
 * An evaluator owns a mutable model slot. The event runner points the slot at
 * a candidate and calls {@link ResamplingEvaluator.evaluate}; concurrent
 * events therefore need one evaluator each (see `EvaluatorPool`).
 *
 * @module @tuneforge/tuner/resampling
 */

import { ConfigurationError } from "@tuneforge/common";
import PQueue from "p-queue";
import { type Acceleration, resolveWorkers } from "../acceleration.js";
import type { Measure, Orientation } from "../measures/index.js";
import type { Dataset, Model, Operation } from "../model/types.js";
import { type Fold, type ResamplingStrategy, trainTestPairs } from "./strategies.js";

export interface PerformanceEvaluation {
	readonly measures: readonly { readonly name: string; readonly orientation: Orientation }[];
	/** Mean over all folds and repeats, one value per measure */
	readonly measurement: readonly number[];
	/** Per measure, one value per fold (repeats concatenated) */
	readonly perFold: readonly (readonly number[])[];
	readonly folds: number;
	readonly repeats: number;
}

export interface ResamplingEvaluatorOptions<X, Y, P> {
	model: Model<X, Y, P>;
	data: Dataset<X, Y>;
	resampling: ResamplingStrategy;
	measures: readonly Measure<Y, P>[];
	operation: Operation<X, P>;
	weights?: readonly number[] | null;
	checkMeasure?: boolean;
	repeats?: number;
	acceleration?: Acceleration;
}

function subset<T>(values: readonly T[], rows: readonly number[]): T[] {
	return rows.map((row) => values[row]);
}

export class ResamplingEvaluator<X, Y, P> {
	/** Configuration evaluated by the next call to `evaluate` */
	model: Model<X, Y, P>;

	readonly data: Dataset<X, Y>;
	readonly resampling: ResamplingStrategy;
	readonly measures: readonly Measure<Y, P>[];
	readonly operation: Operation<X, P>;
	readonly weights: readonly number[] | null;
	readonly checkMeasure: boolean;
	readonly repeats: number;
	readonly acceleration: Acceleration;

	constructor(options: ResamplingEvaluatorOptions<X, Y, P>) {
		const { data } = options;
		if (data.X.length !== data.y.length) {
			throw new ConfigurationError(
				`Data has ${data.X.length} inputs but ${data.y.length} targets`,
				"data",
			);
		}
		const weights = options.weights ?? null;
		if (weights && weights.length !== data.X.length) {
			throw new ConfigurationError(
				`Got ${weights.length} weights for ${data.X.length} rows`,
				"weights",
			);
		}

		this.model = options.model;
		this.data = data;
		this.resampling = options.resampling;
		this.measures = options.measures;
		this.operation = options.operation;
		this.weights = weights;
		this.checkMeasure = options.checkMeasure ?? true;
		this.repeats = options.repeats ?? 1;
		this.acceleration = options.acceleration ?? { type: "cpu1" };
	}

	/**
	 * Evaluate the model currently in the slot.
	 *
	 * The slot is read once, before any fold runs.
	 */
	async evaluate(verbosity = 0): Promise<PerformanceEvaluation> {
		const model = this.model;
		const nRows = this.data.X.length;

		const folds: Fold[] = [];
		for (let repeat = 0; repeat < this.repeats; repeat++) {
			folds.push(...trainTestPairs(this.resampling, nRows, repeat));
		}

		const perFold: number[][] = this.measures.map(() => new Array<number>(folds.length));
		const runFold = async (index: number): Promise<void> => {
			const values = await this.evaluateFold(model, folds[index], verbosity);
			values.forEach((value, m) => {
				perFold[m][index] = value;
			});
		};

		const workers = resolveWorkers(this.acceleration);
		if (workers === 1) {
			for (let i = 0; i < folds.length; i++) {
				await runFold(i);
			}
		} else {
			const queue = new PQueue({ concurrency: workers });
			await Promise.all(
				folds.map((_, i) =>
					queue.add(() => runFold(i)).catch((error: unknown) => {
						queue.clear();
						throw error;
					}),
				),
			);
		}

		return {
			measures: this.measures.map(({ name, orientation }) => ({ name, orientation })),
			measurement: perFold.map((values) => values.reduce((sum, v) => sum + v, 0) / values.length),
			perFold,
			folds: folds.length,
			repeats: this.repeats,
		};
	}

	/**
	 * Fresh evaluator with the same settings and data and its own model slot.
	 */
	clone(): ResamplingEvaluator<X, Y, P> {
		return new ResamplingEvaluator({
			model: this.model,
			data: this.data,
			resampling: this.resampling,
			measures: this.measures,
			operation: this.operation,
			weights: this.weights,
			checkMeasure: this.checkMeasure,
			repeats: this.repeats,
			acceleration: this.acceleration,
		});
	}

	private async evaluateFold(
		model: Model<X, Y, P>,
		fold: Fold,
		verbosity: number,
	): Promise<number[]> {
		const { X, y } = this.data;
		const rowWeights = this.weights ?? this.data.w;
		const trainData: Dataset<X, Y> = {
			X: subset(X, fold.train),
			y: subset(y, fold.train),
			...(this.data.w && { w: subset(this.data.w, fold.train) }),
		};

		const fitted = await model.fit(trainData, verbosity);
		const yhat = await this.operation(fitted, subset(X, fold.test));
		const yTest = subset(y, fold.test);
		const wTest = rowWeights ? subset(rowWeights, fold.test) : undefined;

		if (this.checkMeasure) {
			this.check(yhat, yTest);
		}

		return this.measures.map((measure) =>
			measure.evaluate(yhat, yTest, measure.supportsWeights ? wTest : undefined),
		);
	}

	private check(yhat: readonly P[], y: readonly Y[]): void {
		if (yhat.length !== y.length) {
			throw new ConfigurationError(
				`Operation returned ${yhat.length} predictions for ${y.length} test rows`,
				"operation",
			);
		}
		for (const measure of this.measures) {
			const problem = measure.check?.(yhat, y);
			if (problem) {
				throw new ConfigurationError(
					`Measure ${measure.name} cannot score these predictions: ${problem}`,
					"measure",
				);
			}
		}
	}
}
