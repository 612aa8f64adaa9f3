/**
 * Validation of tuned-model settings.
 *
 * @module @tuneforge/tuner/config
 */

import { ConfigurationError } from "@tuneforge/common";
import { z } from "zod";

const isPresent = (value: unknown): boolean => value !== null && value !== undefined;
const isFunction = (value: unknown): boolean => typeof value === "function";

const AccelerationSchema = z.discriminatedUnion("type", [
	z.object({ type: z.literal("cpu1") }),
	z.object({
		type: z.literal("threads"),
		workers: z.number().int().positive("workers must be positive").optional(),
	}),
	z.object({
		type: z.literal("processes"),
		workers: z.number().int().positive("workers must be positive").optional(),
	}),
]);

const MeasureSchema = z.object({
	name: z.string().min(1, "Measure name cannot be empty"),
	orientation: z.enum(["loss", "score"]),
	supportsWeights: z.boolean(),
	evaluate: z.custom(isFunction, "evaluate must be a function"),
});

const TunedModelSettingsSchema = z.object({
	model: z.custom(isPresent, "model is required"),
	tuning: z.object({
		name: z.string(),
		setup: z.custom(isFunction, "setup must be a function"),
		models: z.custom(isFunction, "models must be a function"),
		best: z.custom(isFunction, "best must be a function"),
	}),
	resampling: z.object({ type: z.enum(["holdout", "cv", "explicit"]) }),
	measure: z.union([MeasureSchema, z.array(MeasureSchema).min(1, "measure list cannot be empty")], {
		message: "measure is required",
	}),
	weights: z.array(z.number().nonnegative("weights must be non-negative")).nullable(),
	operation: z.custom(isFunction, "operation must be a function"),
	range: z.custom(isPresent, "range is required"),
	trainBest: z.boolean(),
	repeats: z.number().int("repeats must be an integer").positive("repeats must be positive"),
	n: z.number().int("n must be an integer").positive("n must be positive").nullable(),
	acceleration: AccelerationSchema,
	accelerationResampling: AccelerationSchema,
	checkMeasure: z.boolean(),
});

/**
 * @throws {ConfigurationError} Naming the first offending setting
 */
export function validateTunedModelSettings(settings: unknown): void {
	const result = TunedModelSettingsSchema.safeParse(settings);
	if (result.success) return;

	const issue = result.error.issues[0];
	const path = issue.path.map(String).join(".");
	throw new ConfigurationError(
		`Invalid tuned model setting ${path}: ${issue.message}`,
		String(issue.path[0] ?? ""),
	);
}
