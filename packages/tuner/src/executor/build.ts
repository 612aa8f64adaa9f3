import type { Logger } from "@tuneforge/logger";
import type { Acceleration } from "../acceleration.js";
import type { Model } from "../model/types.js";
import type { History, TuningStrategy } from "../strategies/types.js";
import { assembleEvents } from "./dispatch.js";
import type { ProgressHandler } from "./progress.js";
import type { EvaluatorPool } from "./worker-pool.js";

export interface BuildOptions<X, Y, P, TState, TResult> {
	strategy: TuningStrategy<unknown, TState, TResult, unknown>;
	/** Prototype the strategy clones candidates from */
	model: Model<X, Y, P>;
	state: TState;
	verbosity: number;
	acceleration: Acceleration;
	pool: EvaluatorPool<X, Y, P>;
	logger: Logger;
	onProgress?: ProgressHandler;
}

/**
 * Grow a history to `n` records, one batch at a time.
 *
 * Stops early when the strategy proposes fewer candidates than asked for.
 * The returned history starts with the records of `history`, unchanged;
 * `history` itself is never modified.
 */
export async function build<X, Y, P, TState, TResult>(
	history: History<Model<X, Y, P>, TResult>,
	n: number,
	options: BuildOptions<X, Y, P, TState, TResult>,
): Promise<History<Model<X, Y, P>, TResult>> {
	const { strategy, model, state, verbosity, acceleration, pool, logger, onProgress } = options;

	let current = history;
	let exhausted = false;
	while (current.length < n && !exhausted) {
		const needed = n - current.length;
		const proposed = strategy.models(model, state, current, needed, verbosity);

		if (proposed.length < needed) {
			exhausted = true;
			const evaluated = current.length + proposed.length;
			if (verbosity > -1) {
				logger.info({
					msg: `Only ${evaluated} (of ${n}) models evaluated. Model supply exhausted.`,
					evaluated,
					requested: n,
				});
			}
			onProgress?.({ type: "exhausted", evaluated, requested: n });
		}
		if (proposed.length === 0) break;

		const batch = proposed.slice(0, needed);
		const records = await assembleEvents(batch, pool, acceleration, {
			strategy,
			history: current,
			state,
			verbosity,
			logger,
			onProgress,
		});
		current = Object.freeze([...current, ...records]);
	}

	return current;
}
