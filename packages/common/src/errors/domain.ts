/**
 * Domain-specific error classes for hyperparameter tuning.
 *
 * @module @tuneforge/common/errors/domain
 */

import { TuneforgeError } from "./base.js";

/**
 * Error codes for domain errors.
 */
export const ErrorCodes = {
	// Setup and construction
	CONFIGURATION_INVALID: "CONFIGURATION_INVALID",

	// Best-model selection
	HISTORY_EMPTY: "HISTORY_EMPTY",

	// Resampling evaluation
	EVALUATION_FAILED: "EVALUATION_FAILED",

	// Prediction
	MODEL_NOT_TRAINED: "MODEL_NOT_TRAINED",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Error for invalid tuning configuration.
 *
 * Thrown when a range is incompatible with the model, when a required
 * option is missing, or when a measure does not fit the predictions.
 *
 * @example
 * ```ts
 * throw new ConfigurationError("Model has no hyperparameter \"depth\"", "range");
 * ```
 */
export class ConfigurationError extends TuneforgeError {
	/**
	 * The option or range field that is invalid.
	 */
	public readonly field?: string;

	/**
	 * The offending value, when there is one.
	 */
	public readonly value?: unknown;

	constructor(message: string, field?: string, cause?: Error, options?: { value?: unknown }) {
		super(message, ErrorCodes.CONFIGURATION_INVALID, cause);
		this.name = "ConfigurationError";
		this.field = field;
		this.value = options?.value;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			field: this.field,
			value: this.value,
		};
	}
}

/**
 * Error raised when a best entry is requested from an empty history.
 *
 * Usually means the strategy supplied no candidates at all.
 */
export class EmptyHistoryError extends TuneforgeError {
	/**
	 * Name of the strategy asked to select from the history.
	 */
	public readonly strategy?: string;

	constructor(strategy?: string) {
		super(
			strategy
				? `Cannot select a best model: ${strategy} history is empty`
				: "Cannot select a best model: history is empty",
			ErrorCodes.HISTORY_EMPTY,
		);
		this.name = "EmptyHistoryError";
		this.strategy = strategy;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			strategy: this.strategy,
		};
	}
}

/**
 * Error for a failed resampling evaluation of one candidate model.
 *
 * Aborts the batch the candidate belongs to.
 *
 * @example
 * ```ts
 * throw new EvaluationError("Evaluation failed", { hyperparameters: { k: 7 }, index: 6 }, err);
 * ```
 */
export class EvaluationError extends TuneforgeError {
	/**
	 * Hyperparameters of the candidate that failed.
	 */
	public readonly hyperparameters?: Record<string, unknown>;

	/**
	 * Position of the candidate in its batch.
	 */
	public readonly index?: number;

	constructor(
		message: string,
		details: { hyperparameters?: Record<string, unknown>; index?: number } = {},
		cause?: Error,
	) {
		super(message, ErrorCodes.EVALUATION_FAILED, cause);
		this.name = "EvaluationError";
		this.hyperparameters = details.hyperparameters;
		this.index = details.index;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			hyperparameters: this.hyperparameters,
			index: this.index,
		};
	}
}

/**
 * Error for predictions requested from a model that was never trained.
 */
export class NotTrainedError extends TuneforgeError {
	public readonly modelName?: string;

	constructor(modelName?: string) {
		super(
			modelName
				? `${modelName} has not been trained; enable trainBest or fit the machine first`
				: "Model has not been trained; enable trainBest or fit the machine first",
			ErrorCodes.MODEL_NOT_TRAINED,
		);
		this.name = "NotTrainedError";
		this.modelName = modelName;
	}

	override toJSON(): Record<string, unknown> {
		return {
			...super.toJSON(),
			modelName: this.modelName,
		};
	}
}
