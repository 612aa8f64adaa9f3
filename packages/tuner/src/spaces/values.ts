/**
 * Candidate values for a single search-space parameter.
 *
 * @module @tuneforge/tuner/spaces
 */

import type { DeterministicRNG } from "@tuneforge/common";
import type { HyperparameterValue } from "../model/types.js";
import type { FloatParameter, IntParameter, SearchSpaceParameter } from "./types.js";

function linspace(low: number, high: number, count: number): number[] {
	if (count <= 1 || low === high) return [low];
	const stepSize = (high - low) / (count - 1);
	const values = Array.from({ length: count }, (_, i) => low + i * stepSize);
	values[count - 1] = high;
	return values;
}

function geomspace(low: number, high: number, count: number): number[] {
	return linspace(Math.log(low), Math.log(high), count).map((x, i, all) =>
		i === 0 ? low : i === all.length - 1 ? high : Math.exp(x),
	);
}

function stepped(param: FloatParameter | IntParameter, step: number): number[] {
	const count = Math.floor((param.high - param.low) / step + 1e-9);
	return Array.from({ length: count + 1 }, (_, i) => param.low + i * step);
}

function unique(values: number[]): number[] {
	return [...new Set(values)];
}

/**
 * Grid values for one parameter.
 *
 * - float: `resolution` points, linear or geometric (`log`); `step` wins over `resolution`
 * - int: every integer when they fit in `resolution`, otherwise `resolution`
 *   spaced points rounded to unique integers
 * - categorical: the choices, in order
 *
 * @example
 * ```ts
 * parameterValues({ type: "int", name: "k", low: 1, high: 10 }, 10); // => [1, 2, ..., 10]
 * parameterValues({ type: "float", name: "lambda", low: 0, high: 1 }, 3); // => [0, 0.5, 1]
 * ```
 */
export function parameterValues(
	param: SearchSpaceParameter,
	resolution: number,
): HyperparameterValue[] {
	switch (param.type) {
		case "categorical":
			return [...param.choices];

		case "float":
			if (param.step !== undefined) return stepped(param, param.step);
			return param.log
				? geomspace(param.low, param.high, resolution)
				: linspace(param.low, param.high, resolution);

		case "int": {
			if (param.step !== undefined) return stepped(param, param.step);
			const count = param.high - param.low + 1;
			if (count <= resolution) {
				return Array.from({ length: count }, (_, i) => param.low + i);
			}
			const spaced = param.log
				? geomspace(param.low, param.high, resolution)
				: linspace(param.low, param.high, resolution);
			return unique(spaced.map((x) => Math.round(x)));
		}
	}
}

/**
 * Draw one value for a parameter.
 */
export function sampleParameter(
	param: SearchSpaceParameter,
	rng: DeterministicRNG,
): HyperparameterValue {
	switch (param.type) {
		case "categorical":
			return param.choices[rng.nextInt(0, param.choices.length - 1)];

		case "float": {
			if (param.step !== undefined) {
				const steps = Math.floor((param.high - param.low) / param.step + 1e-9);
				return param.low + rng.nextInt(0, steps) * param.step;
			}
			if (param.log) {
				return Math.exp(rng.nextFloat(Math.log(param.low), Math.log(param.high)));
			}
			return rng.nextFloat(param.low, param.high);
		}

		case "int": {
			if (param.step !== undefined) {
				const steps = Math.floor((param.high - param.low) / param.step);
				return param.low + rng.nextInt(0, steps) * param.step;
			}
			if (param.log) {
				const drawn = Math.floor(
					Math.exp(rng.nextFloat(Math.log(param.low), Math.log(param.high + 1))),
				);
				return Math.min(param.high, Math.max(param.low, drawn));
			}
			return rng.nextInt(param.low, param.high);
		}
	}
}

/**
 * Number of grid points a search space expands to.
 */
export function gridSize(space: readonly SearchSpaceParameter[], resolution: number): number {
	return space.reduce((size, param) => size * parameterValues(param, resolution).length, 1);
}
