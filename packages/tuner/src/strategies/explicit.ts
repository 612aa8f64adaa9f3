import { ConfigurationError } from "@tuneforge/common";
import type { AnyModel, Hyperparameters, Model } from "../model/types.js";
import { BaseStrategy, type DefaultResult } from "./base.js";
import type { History, Metamodel } from "./types.js";

export interface ExplicitState {
	readonly candidates: readonly Hyperparameters[];
}

/**
 * Evaluates a fixed list of configurations, in order.
 *
 * The range is a list of models of the prototype's kind; each is re-created
 * from the prototype with the listed model's hyperparameters.
 */
export class Explicit extends BaseStrategy<readonly AnyModel[], ExplicitState> {
	readonly name = "Explicit";

	setup<X, Y, P>(model: Model<X, Y, P>, range: readonly AnyModel[], _verbosity: number): ExplicitState {
		if (!Array.isArray(range) || range.length === 0) {
			throw new ConfigurationError("Explicit needs a non-empty list of models", "range");
		}
		const candidates = range.map((candidate, i) => {
			if (candidate.name !== model.name) {
				throw new ConfigurationError(
					`Candidate ${i} is a ${candidate.name}, expected ${model.name}`,
					"range",
					undefined,
					{ value: candidate.name },
				);
			}
			// Rejects hyperparameters the prototype does not have
			model.clone(candidate.hyperparameters);
			return candidate.hyperparameters;
		});
		return { candidates };
	}

	models<X, Y, P>(
		model: Model<X, Y, P>,
		state: ExplicitState,
		history: History<Model<X, Y, P>, DefaultResult>,
		remaining: number,
		_verbosity: number,
	): Metamodel<Model<X, Y, P>>[] {
		const start = history.length;
		return state.candidates
			.slice(start, start + remaining)
			.map((hyperparameters) => model.clone(hyperparameters));
	}

	defaultN(range: readonly AnyModel[]): number {
		return range.length;
	}
}
