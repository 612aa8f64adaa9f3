import { createRNG, type DeterministicRNG } from "@tuneforge/common";
import { tunerConfig } from "../config/env.js";
import type { Hyperparameters, Model } from "../model/types.js";
import type { SearchSpace } from "../spaces/types.js";
import { validateSearchSpace } from "../spaces/validate.js";
import { sampleParameter } from "../spaces/values.js";
import { BaseStrategy, type DefaultResult } from "./base.js";
import type { History, Metamodel } from "./types.js";

export interface RandomSearchOptions {
	seed?: number;
}

export interface RandomSearchState {
	readonly space: SearchSpace;
	readonly rng: DeterministicRNG;
}

/**
 * Independent uniform draws (geometric for `log` parameters). Never runs out.
 */
export class RandomSearch extends BaseStrategy<SearchSpace, RandomSearchState> {
	readonly name = "RandomSearch";
	readonly seed: number;

	constructor(options: RandomSearchOptions = {}) {
		super();
		this.seed = options.seed ?? tunerConfig.randomSeed;
	}

	setup<X, Y, P>(model: Model<X, Y, P>, range: SearchSpace, _verbosity: number): RandomSearchState {
		return { space: validateSearchSpace(model, range), rng: createRNG(this.seed) };
	}

	models<X, Y, P>(
		model: Model<X, Y, P>,
		state: RandomSearchState,
		_history: History<Model<X, Y, P>, DefaultResult>,
		remaining: number,
		_verbosity: number,
	): Metamodel<Model<X, Y, P>>[] {
		return Array.from({ length: remaining }, () => {
			const point: Hyperparameters = Object.fromEntries(
				state.space.map((param) => [param.name, sampleParameter(param, state.rng)]),
			);
			return [model.clone(point), point] as const;
		});
	}

	defaultN(_range: SearchSpace): number {
		return tunerConfig.defaultN;
	}
}
