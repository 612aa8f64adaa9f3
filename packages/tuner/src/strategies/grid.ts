import { createRNG, shuffled } from "@tuneforge/common";
import { tunerConfig } from "../config/env.js";
import type { Hyperparameters, Model } from "../model/types.js";
import type { SearchSpace } from "../spaces/types.js";
import { validateSearchSpace } from "../spaces/validate.js";
import { gridSize, parameterValues } from "../spaces/values.js";
import { BaseStrategy, type DefaultResult } from "./base.js";
import type { History, Metamodel } from "./types.js";

export interface GridOptions {
	/** Points per numeric parameter */
	resolution?: number;
	/** Visit the grid in a seeded random order */
	shuffle?: boolean;
	seed?: number;
}

export interface GridState {
	readonly space: SearchSpace;
	readonly points: readonly Hyperparameters[];
}

/**
 * Cartesian product of per-parameter values; the first parameter varies slowest.
 */
export function gridPoints(space: SearchSpace, resolution: number): Hyperparameters[] {
	return space.reduce<Hyperparameters[]>(
		(points, param) =>
			points.flatMap((point) =>
				parameterValues(param, resolution).map((value) => ({ ...point, [param.name]: value })),
			),
		[{}],
	);
}

/**
 * Exhaustive search over a regular grid.
 *
 * Proposals continue from the point after the last one in the history, so
 * extending a search never revisits points.
 */
export class Grid extends BaseStrategy<SearchSpace, GridState> {
	readonly name = "Grid";
	readonly resolution: number;
	readonly shuffle: boolean;
	readonly seed: number;

	constructor(options: GridOptions = {}) {
		super();
		this.resolution = options.resolution ?? tunerConfig.gridResolution;
		this.shuffle = options.shuffle ?? false;
		this.seed = options.seed ?? tunerConfig.randomSeed;
	}

	setup<X, Y, P>(model: Model<X, Y, P>, range: SearchSpace, _verbosity: number): GridState {
		const space = validateSearchSpace(model, range);
		const points = gridPoints(space, this.resolution);
		return {
			space,
			points: this.shuffle ? shuffled(points, createRNG(this.seed)) : points,
		};
	}

	models<X, Y, P>(
		model: Model<X, Y, P>,
		state: GridState,
		history: History<Model<X, Y, P>, DefaultResult>,
		remaining: number,
		_verbosity: number,
	): Metamodel<Model<X, Y, P>>[] {
		const start = history.length;
		return state.points
			.slice(start, start + remaining)
			.map((point) => [model.clone(point), point] as const);
	}

	defaultN(range: SearchSpace): number {
		return gridSize(range, this.resolution);
	}
}
