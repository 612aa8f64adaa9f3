/**
 * Tuned-model controller: a model wrapper that searches a hyperparameter range
 * and keeps the best configuration.
 *
 * @example
 * ```ts
 * const tuned = new TunedModel({
 *   model: new Ridge({ lambda: 1 }),
 *   tuning: new Grid({ resolution: 5 }),
 *   range: [{ type: "float", name: "lambda", low: 0.01, high: 10, log: true }],
 *   resampling: cv({ nfolds: 5 }),
 *   measure: rms,
 * });
 *
 * const { fitresult, metaState, report } = await tuned.fit(1, data);
 * tuned.n = 50;
 * const extended = await tuned.update(1, fitresult, metaState, data);
 * ```
 *
 * @module @tuneforge/tuner
 */

import { randomUUID } from "node:crypto";
import { ConfigurationError, deepCopy, isSameExcept } from "@tuneforge/common";
import { createLogger, type Logger, withSearchContext } from "@tuneforge/logger";
import { type Acceleration, cpu1, defaultAcceleration } from "./acceleration.js";
import { validateTunedModelSettings } from "./config/schema.js";
import { build } from "./executor/build.js";
import type { ProgressHandler } from "./executor/progress.js";
import { EvaluatorPool } from "./executor/worker-pool.js";
import type { Measure } from "./measures/index.js";
import { Machine } from "./model/machine.js";
import { type Dataset, type Model, type Operation, predict } from "./model/types.js";
import { ResamplingEvaluator } from "./resampling/evaluator.js";
import { holdout, type ResamplingStrategy } from "./resampling/strategies.js";
import type { History, TuningStrategy } from "./strategies/types.js";

export interface TunedModelSettings<X, Y, P, TRange, TState, TResult, TSummary> {
	model: Model<X, Y, P> | null;
	tuning: TuningStrategy<TRange, TState, TResult, TSummary>;
	resampling: ResamplingStrategy;
	measure: Measure<Y, P> | readonly Measure<Y, P>[] | null;
	weights: readonly number[] | null;
	operation: Operation<X, P>;
	range: TRange | null;
	trainBest: boolean;
	repeats: number;
	/** Iteration budget; null means the strategy's default */
	n: number | null;
	acceleration: Acceleration;
	accelerationResampling: Acceleration;
	checkMeasure: boolean;
}

export interface TunedModelOptions<X, Y, P, TRange, TState, TResult, TSummary> {
	model?: Model<X, Y, P> | null;
	tuning: TuningStrategy<TRange, TState, TResult, TSummary>;
	resampling?: ResamplingStrategy;
	measure?: Measure<Y, P> | readonly Measure<Y, P>[] | null;
	weights?: readonly number[] | null;
	operation?: Operation<X, P>;
	/** Typed by `tuning` */
	range?: NoInfer<TRange> | null;
	trainBest?: boolean;
	repeats?: number;
	n?: number | null;
	acceleration?: Acceleration;
	accelerationResampling?: Acceleration;
	checkMeasure?: boolean;
	logger?: Logger;
	onProgress?: ProgressHandler;
}

export interface TunedModelMetaState<X, Y, P, TRange, TState, TResult, TSummary> {
	readonly history: History<Model<X, Y, P>, TResult>;
	/** Deep copy of the settings the history was built with */
	readonly snapshot: TunedModelSettings<X, Y, P, TRange, TState, TResult, TSummary>;
	readonly state: TState;
	readonly pool: EvaluatorPool<X, Y, P>;
	/** Effective iteration budget */
	readonly n: number;
	readonly data: Dataset<X, Y>;
	readonly searchId: string;
}

export type TunedModelReport<X, Y, P, TResult, TSummary> = TSummary & {
	bestModel: Model<X, Y, P>;
	bestResult: TResult;
	/** The trained best model's own report; null when it was not trained */
	bestReport: unknown;
};

export interface TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary> {
	fitresult: Machine<X, Y, P>;
	metaState: TunedModelMetaState<X, Y, P, TRange, TState, TResult, TSummary>;
	report: TunedModelReport<X, Y, P, TResult, TSummary>;
}

export interface TunedModelFittedParams<X, Y, P> {
	bestModel: Model<X, Y, P>;
	/** null when the best model was not trained */
	bestFittedParams: unknown;
}

interface ResolvedSettings<X, Y, P, TRange, TState, TResult, TSummary>
	extends TunedModelSettings<X, Y, P, TRange, TState, TResult, TSummary> {
	model: Model<X, Y, P>;
	range: TRange;
	measures: readonly Measure<Y, P>[];
}

export class TunedModel<X, Y, P, TRange, TState, TResult, TSummary>
	implements TunedModelSettings<X, Y, P, TRange, TState, TResult, TSummary>
{
	model: Model<X, Y, P> | null;
	tuning: TuningStrategy<TRange, TState, TResult, TSummary>;
	resampling: ResamplingStrategy;
	measure: Measure<Y, P> | readonly Measure<Y, P>[] | null;
	weights: readonly number[] | null;
	operation: Operation<X, P>;
	range: TRange | null;
	trainBest: boolean;
	repeats: number;
	n: number | null;
	acceleration: Acceleration;
	accelerationResampling: Acceleration;
	checkMeasure: boolean;

	private readonly logger: Logger;
	private readonly onProgress?: ProgressHandler;

	constructor(options: TunedModelOptions<X, Y, P, TRange, TState, TResult, TSummary>) {
		this.model = options.model ?? null;
		this.tuning = options.tuning;
		this.resampling = options.resampling ?? holdout();
		this.measure = options.measure ?? null;
		this.weights = options.weights ?? null;
		this.operation = options.operation ?? predict;
		this.range = options.range ?? null;
		this.trainBest = options.trainBest ?? true;
		this.repeats = options.repeats ?? 1;
		this.n = options.n ?? null;
		this.acceleration = options.acceleration ?? defaultAcceleration();
		this.accelerationResampling = options.accelerationResampling ?? cpu1();
		this.checkMeasure = options.checkMeasure ?? true;

		this.logger = options.logger ?? createLogger({ component: "tuned-model" });
		this.onProgress = options.onProgress;

		const message = this.clean();
		if (message) {
			this.logger.info({ msg: message });
		}
	}

	/**
	 * Validate the settings and describe any questionable combination.
	 *
	 * @returns Advisory message, empty when there is nothing to report
	 * @throws {ConfigurationError} If a setting is missing or malformed
	 */
	clean(): string {
		validateTunedModelSettings(this.settings());

		const outer = this.acceleration.type;
		const inner = this.accelerationResampling.type;
		if (inner === "processes" && (outer === "processes" || outer === "threads")) {
			return (
				`The combination acceleration=${outer} and accelerationResampling=${inner} is not generally optimal. ` +
				"You may want to consider setting acceleration=cpuProcesses() and accelerationResampling=cpuThreads()."
			);
		}
		return "";
	}

	/**
	 * Current settings as a plain record.
	 */
	settings(): TunedModelSettings<X, Y, P, TRange, TState, TResult, TSummary> {
		return {
			model: this.model,
			tuning: this.tuning,
			resampling: this.resampling,
			measure: this.measure,
			weights: this.weights,
			operation: this.operation,
			range: this.range,
			trainBest: this.trainBest,
			repeats: this.repeats,
			n: this.n,
			acceleration: this.acceleration,
			accelerationResampling: this.accelerationResampling,
			checkMeasure: this.checkMeasure,
		};
	}

	/**
	 * Run a fresh search over `data`.
	 *
	 * @throws {ConfigurationError} If the settings or range are invalid
	 * @throws {EvaluationError} If a candidate's evaluation fails
	 * @throws {EmptyHistoryError} If the strategy proposes no candidates
	 */
	async fit(
		verbosity: number,
		data: Dataset<X, Y>,
	): Promise<TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary>> {
		const settings = this.resolve();
		const n = this.effectiveN(settings);
		const searchId = randomUUID();
		const logger = withSearchContext(this.logger, {
			searchId,
			strategy: settings.tuning.name,
			phase: "fit",
		});

		const state = settings.tuning.setup(settings.model, settings.range, verbosity);
		const pool = new EvaluatorPool(
			new ResamplingEvaluator({
				model: settings.model,
				data,
				resampling: settings.resampling,
				measures: settings.measures,
				operation: settings.operation,
				weights: settings.weights,
				checkMeasure: settings.checkMeasure,
				repeats: settings.repeats,
				acceleration: settings.accelerationResampling,
			}),
		);

		if (verbosity >= 1) {
			logger.info({ msg: `Attempting to evaluate ${n} models.`, n });
		}
		const history = await build([], n, {
			strategy: settings.tuning,
			model: settings.model,
			state,
			verbosity,
			acceleration: settings.acceleration,
			pool,
			logger,
			onProgress: this.onProgress,
		});

		return this.finish(settings, { history, state, pool, n, data, searchId }, verbosity, null);
	}

	/**
	 * Extend a previous search when only `n` has grown; otherwise search afresh.
	 *
	 * The old meta-state is never modified, so it stays usable if this call fails.
	 */
	async update(
		verbosity: number,
		oldFitresult: Machine<X, Y, P>,
		oldMetaState: TunedModelMetaState<X, Y, P, TRange, TState, TResult, TSummary>,
		data: Dataset<X, Y>,
	): Promise<TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary>> {
		const settings = this.resolve();
		const n = this.effectiveN(settings);

		const extending =
			data === oldMetaState.data &&
			n >= oldMetaState.n &&
			isSameExcept(this.settings(), oldMetaState.snapshot, ["n"]);
		if (!extending) {
			if (verbosity >= 1) {
				this.logger.info({ msg: "Settings changed; starting a new search", searchId: oldMetaState.searchId });
			}
			return this.fit(verbosity, data);
		}

		const { searchId, pool } = oldMetaState;
		const logger = withSearchContext(this.logger, {
			searchId,
			strategy: settings.tuning.name,
			phase: "update",
		});
		const state = deepCopy(oldMetaState.state);

		if (verbosity >= 1 && n > oldMetaState.history.length) {
			logger.info({
				msg: `Attempting to add ${n - oldMetaState.history.length} models to search, bringing total to ${n}.`,
				n,
			});
		}
		const history = await build(oldMetaState.history, n, {
			strategy: settings.tuning,
			model: settings.model,
			state,
			verbosity,
			acceleration: settings.acceleration,
			pool,
			logger,
			onProgress: this.onProgress,
		});

		const reusable = history.length === oldMetaState.history.length ? oldFitresult : null;
		return this.finish(settings, { history, state, pool, n, data, searchId }, verbosity, reusable);
	}

	async predict(fitresult: Machine<X, Y, P>, X: readonly X[]): Promise<P[]> {
		return fitresult.predict(X);
	}

	fittedParams(fitresult: Machine<X, Y, P>): TunedModelFittedParams<X, Y, P> {
		return {
			bestModel: fitresult.model,
			bestFittedParams: fitresult.isTrained ? fitresult.fittedParams() : null,
		};
	}

	private resolve(): ResolvedSettings<X, Y, P, TRange, TState, TResult, TSummary> {
		const settings = this.settings();
		validateTunedModelSettings(settings);

		const { model, range, measure } = settings;
		if (model === null) throw new ConfigurationError("No model specified", "model");
		if (range === null) throw new ConfigurationError("No range specified", "range");
		if (measure === null) throw new ConfigurationError("No measure specified", "measure");

		const measures: readonly Measure<Y, P>[] = isMeasureList(measure) ? measure : [measure];
		return { ...settings, model, range, measure, measures };
	}

	private effectiveN(settings: ResolvedSettings<X, Y, P, TRange, TState, TResult, TSummary>): number {
		const n = settings.n ?? settings.tuning.defaultN(settings.range);
		if (!Number.isFinite(n)) {
			throw new ConfigurationError(
				`${settings.tuning.name} has no natural iteration count; set n`,
				"n",
			);
		}
		return n;
	}

	/**
	 * Select the best record, train it if asked to, and assemble report and meta-state.
	 */
	private async finish(
		settings: ResolvedSettings<X, Y, P, TRange, TState, TResult, TSummary>,
		search: Omit<TunedModelMetaState<X, Y, P, TRange, TState, TResult, TSummary>, "snapshot">,
		verbosity: number,
		reusable: Machine<X, Y, P> | null,
	): Promise<TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary>> {
		const { tuning, trainBest } = settings;
		const best = tuning.best(search.history);

		let fitresult: Machine<X, Y, P>;
		if (reusable && reusable.isTrained === trainBest) {
			fitresult = reusable;
		} else {
			fitresult = new Machine(best.model.clone(), search.data);
			if (trainBest) {
				if (verbosity >= 1) {
					this.logger.info({ msg: "Training best model on all supplied data", model: best.model.name });
				}
				await fitresult.fit(verbosity - 1);
			}
		}

		const report: TunedModelReport<X, Y, P, TResult, TSummary> = {
			...tuning.report(search.history, search.state),
			bestModel: best.model,
			bestResult: best.result,
			bestReport: fitresult.isTrained ? fitresult.report() : null,
		};

		return {
			fitresult,
			metaState: { ...search, snapshot: deepCopy(this.settings()) },
			report,
		};
	}
}

function isMeasureList<Y, P>(
	measure: Measure<Y, P> | readonly Measure<Y, P>[],
): measure is readonly Measure<Y, P>[] {
	return Array.isArray(measure);
}
