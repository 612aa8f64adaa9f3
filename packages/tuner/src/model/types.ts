/**
 * Contract between the tuner and the learning models it tunes.
 *
 * The tuner never looks inside a model: it clones prototypes with new
 * hyperparameter values, fits them on row subsets and asks for predictions.
 *
 * @module @tuneforge/tuner/model
 */

import { ConfigurationError } from "@tuneforge/common";

export type HyperparameterValue = number | string | boolean;

export type Hyperparameters = Readonly<Record<string, HyperparameterValue>>;

/**
 * Tabular data with one entry per row. `w` holds optional per-row weights.
 */
export interface Dataset<X, Y> {
	readonly X: readonly X[];
	readonly y: readonly Y[];
	readonly w?: readonly number[];
}

export interface Fitted<X, P> {
	predict(X: readonly X[]): P[] | Promise<P[]>;
	/** Learned parameters, if the model exposes them */
	fittedParams?(): unknown;
	/** Training diagnostics, if the model produces any */
	report?(): unknown;
}

export interface Model<X, Y, P> {
	readonly name: string;
	readonly hyperparameters: Hyperparameters;
	/**
	 * Fresh instance with some hyperparameters replaced.
	 * Unknown names must be rejected with a {@link ConfigurationError}.
	 */
	clone(overrides?: Hyperparameters): Model<X, Y, P>;
	fit(data: Dataset<X, Y>, verbosity: number): Fitted<X, P> | Promise<Fitted<X, P>>;
}

export type AnyModel = Model<unknown, unknown, unknown>;

/**
 * Turns a fitted model and new inputs into the values a measure compares with the targets.
 */
export type Operation<X, P> = (fitted: Fitted<X, P>, X: readonly X[]) => P[] | Promise<P[]>;

export function predict<X, P>(fitted: Fitted<X, P>, X: readonly X[]): P[] | Promise<P[]> {
	return fitted.predict(X);
}

/**
 * Merge overrides into a hyperparameter record, rejecting names the model does not have
 * and values whose type differs from the current one.
 *
 * Intended for `Model.clone` implementations.
 */
export function mergeHyperparameters(
	modelName: string,
	current: Hyperparameters,
	overrides: Hyperparameters = {},
): Hyperparameters {
	for (const [name, value] of Object.entries(overrides)) {
		if (!Object.hasOwn(current, name)) {
			throw new ConfigurationError(`${modelName} has no hyperparameter "${name}"`, "range", undefined, {
				value: name,
			});
		}
		if (typeof current[name] !== typeof value) {
			throw new ConfigurationError(
				`${modelName}.${name} expects a ${typeof current[name]}, got ${typeof value}`,
				"range",
				undefined,
				{ value },
			);
		}
	}
	return Object.freeze({ ...current, ...overrides });
}
