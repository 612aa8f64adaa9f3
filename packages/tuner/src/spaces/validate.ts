/**
 * Range validation against the model being tuned.
 *
 * @module @tuneforge/tuner/spaces
 */

import { ConfigurationError } from "@tuneforge/common";
import { z } from "zod";
import type { Hyperparameters, Model } from "../model/types.js";
import type { SearchSpace, SearchSpaceParameter } from "./types.js";

const NameSchema = z.string().min(1, "Parameter name cannot be empty");

const FloatParameterSchema = z.object({
	type: z.literal("float"),
	name: NameSchema,
	low: z.number(),
	high: z.number(),
	step: z.number().positive("step must be positive").optional(),
	log: z.boolean().optional(),
});

const IntParameterSchema = z.object({
	type: z.literal("int"),
	name: NameSchema,
	low: z.number().int("low must be an integer"),
	high: z.number().int("high must be an integer"),
	step: z.number().int("step must be an integer").positive("step must be positive").optional(),
	log: z.boolean().optional(),
});

const CategoricalParameterSchema = z.object({
	type: z.literal("categorical"),
	name: NameSchema,
	choices: z
		.array(z.union([z.string(), z.number(), z.boolean()]))
		.min(1, "choices cannot be empty"),
});

const SearchSpaceSchema = z
	.array(
		z.discriminatedUnion("type", [
			FloatParameterSchema,
			IntParameterSchema,
			CategoricalParameterSchema,
		]),
	)
	.min(1, "Search space needs at least one parameter");

function rangeError(message: string, param?: SearchSpaceParameter): ConfigurationError {
	return new ConfigurationError(`Invalid range: ${message}`, "range", undefined, {
		value: param?.name,
	});
}

function checkParameter(
	model: { readonly name: string; readonly hyperparameters: Hyperparameters },
	param: SearchSpaceParameter,
): void {
	if (!Object.hasOwn(model.hyperparameters, param.name)) {
		throw rangeError(`${model.name} has no hyperparameter "${param.name}"`, param);
	}
	const current = model.hyperparameters[param.name];

	if (param.type === "categorical") {
		const mismatched = param.choices.find((choice) => typeof choice !== typeof current);
		if (mismatched !== undefined) {
			throw rangeError(
				`choice ${String(mismatched)} for "${param.name}" is not a ${typeof current}`,
				param,
			);
		}
		return;
	}

	if (typeof current !== "number") {
		throw rangeError(`"${param.name}" is a ${typeof current}, not a number`, param);
	}
	if (param.low > param.high) {
		throw rangeError(`"${param.name}" has low ${param.low} above high ${param.high}`, param);
	}
	if (param.log && param.low <= 0) {
		throw rangeError(`"${param.name}" is log-scaled but its low bound is not positive`, param);
	}
}

/**
 * Parse a range and check it against the model's hyperparameters.
 *
 * @throws {ConfigurationError} If the range is malformed or names a
 *   hyperparameter the model lacks or types differently
 */
export function validateSearchSpace<X, Y, P>(model: Model<X, Y, P>, range: unknown): SearchSpace {
	const parsed = SearchSpaceSchema.safeParse(range);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		const path = issue.path.map(String).join(".");
		throw rangeError(path ? `${path}: ${issue.message}` : issue.message);
	}

	const space: SearchSpace = parsed.data;
	const seen = new Set<string>();
	for (const param of space) {
		if (seen.has(param.name)) {
			throw rangeError(`"${param.name}" appears more than once`, param);
		}
		seen.add(param.name);
		checkParameter(model, param);
	}
	return space;
}
