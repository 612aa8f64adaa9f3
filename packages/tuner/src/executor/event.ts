/**
 * Evaluation of a single candidate.
 *
 * @module @tuneforge/tuner/executor
 */

import { ConfigurationError, EvaluationError, formatParams } from "@tuneforge/common";
import type { Logger } from "@tuneforge/logger";
import type { Model } from "../model/types.js";
import type { PerformanceEvaluation, ResamplingEvaluator } from "../resampling/evaluator.js";
import {
	type History,
	type HistoryRecord,
	isPaired,
	type Metamodel,
	type TuningStrategy,
} from "../strategies/types.js";

export interface EventContext<X, Y, P, TState, TResult> {
	strategy: TuningStrategy<unknown, TState, TResult, unknown>;
	/** History before the batch this event belongs to */
	history: History<Model<X, Y, P>, TResult>;
	state: TState;
	verbosity: number;
	logger: Logger;
}

/**
 * Verbosity handed to the resampling evaluator.
 */
export function innerVerbosity(verbosity: number): number {
	return verbosity >= 2 ? verbosity - 3 : verbosity - 1;
}

/**
 * Point the evaluator at the candidate, evaluate it and build its history record.
 *
 * @throws {EvaluationError} If the evaluation fails
 */
export async function runEvent<X, Y, P, TState, TResult>(
	metamodel: Metamodel<Model<X, Y, P>>,
	index: number,
	evaluator: ResamplingEvaluator<X, Y, P>,
	context: EventContext<X, Y, P, TState, TResult>,
): Promise<HistoryRecord<Model<X, Y, P>, TResult>> {
	const { strategy, history, state, verbosity, logger } = context;
	const [model, metadata] = isPaired(metamodel) ? metamodel : ([metamodel, undefined] as const);

	evaluator.model = model;
	if (verbosity > 2) {
		logger.info({ msg: "Evaluating candidate", index, hyperparameters: model.hyperparameters });
	}

	let evaluation: PerformanceEvaluation;
	try {
		evaluation = await evaluator.evaluate(innerVerbosity(verbosity));
	} catch (error) {
		if (error instanceof ConfigurationError) throw error;
		throw new EvaluationError(
			`Evaluation of candidate ${index} (${formatParams(model.hyperparameters)}) failed`,
			{ hyperparameters: { ...model.hyperparameters }, index },
			error instanceof Error ? error : new Error(String(error)),
		);
	}

	const result = strategy.result(history, state, evaluation, metadata);
	if (verbosity > 1) {
		logger.info({ msg: "Candidate evaluated", index, hyperparameters: model.hyperparameters, result });
	}
	return Object.freeze({ model, result });
}
