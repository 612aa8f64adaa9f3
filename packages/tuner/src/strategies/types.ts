/**
 * Tuning strategy protocol.
 *
 * @module @tuneforge/tuner/strategies
 */

import type { Model } from "../model/types.js";
import type { PerformanceEvaluation } from "../resampling/evaluator.js";

/**
 * A candidate configuration, optionally paired with strategy-private metadata
 * that is handed back unchanged to {@link TuningStrategy.result}.
 */
export type Metamodel<M> = M | readonly [M, unknown];

export interface HistoryRecord<M, R> {
	readonly model: M;
	readonly result: R;
}

/**
 * Every evaluation of one logical search, in evaluation order.
 */
export type History<M, R> = readonly HistoryRecord<M, R>[];

export function isPaired<M>(metamodel: Metamodel<M>): metamodel is readonly [M, unknown] {
	return Array.isArray(metamodel);
}

export interface TuningStrategy<TRange, TState, TResult, TSummary> {
	readonly name: string;

	/**
	 * Initialize search state. Throws `ConfigurationError` when the range does
	 * not fit the model.
	 */
	setup<X, Y, P>(model: Model<X, Y, P>, range: TRange, verbosity: number): TState;

	/**
	 * Propose up to `remaining` new candidates, cloned from `model`.
	 * Fewer (or none) signals that the supply is exhausted. Must not modify `history`.
	 */
	models<X, Y, P>(
		model: Model<X, Y, P>,
		state: TState,
		history: History<Model<X, Y, P>, TResult>,
		remaining: number,
		verbosity: number,
	): Metamodel<Model<X, Y, P>>[];

	/** Turn one raw evaluation into a history entry */
	result<X, Y, P>(
		history: History<Model<X, Y, P>, TResult>,
		state: TState,
		evaluation: PerformanceEvaluation,
		metadata: unknown,
	): TResult;

	/**
	 * Best record of a history. Deterministic in the history alone;
	 * throws `EmptyHistoryError` on an empty one.
	 */
	best<X, Y, P>(history: History<Model<X, Y, P>, TResult>): HistoryRecord<Model<X, Y, P>, TResult>;

	report<X, Y, P>(history: History<Model<X, Y, P>, TResult>, state: TState): TSummary;

	/** Iteration budget when none is configured; `Infinity` when unbounded */
	defaultN(range: TRange): number;
}
