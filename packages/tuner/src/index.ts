/**
 * @tuneforge/tuner - Hyperparameter tuning for any model that can be cloned, fitted and asked to predict
 *
 * This package provides:
 * - TunedModel: the fit/update controller and its TuningMachine binding
 * - Tuning strategies (Grid, RandomSearch, Explicit) and their protocol
 * - Resampling evaluation, measures and search-space definitions
 * - Batch dispatch under cpu1, threads and processes accelerations
 */

// Acceleration
export {
	type Acceleration,
	type AccelerationType,
	cpu1,
	cpuProcesses,
	cpuThreads,
	defaultAcceleration,
	resolveWorkers,
} from "./acceleration.js";
// Config
export { tunerConfig } from "./config/env.js";
export { validateTunedModelSettings } from "./config/schema.js";
// Executor
export * from "./executor/index.js";
// Measures
export * from "./measures/index.js";
// Models
export { Machine } from "./model/machine.js";
export * from "./model/types.js";
// Resampling
export {
	type PerformanceEvaluation,
	ResamplingEvaluator,
	type ResamplingEvaluatorOptions,
} from "./resampling/evaluator.js";
export * from "./resampling/strategies.js";
// Search spaces
export * from "./spaces/types.js";
export { validateSearchSpace } from "./spaces/validate.js";
export { gridSize, parameterValues, sampleParameter } from "./spaces/values.js";
// Strategies
export {
	BaseStrategy,
	bestIndex,
	type DefaultResult,
	type DefaultSummary,
	type DefaultSummaryEntry,
} from "./strategies/base.js";
export { Explicit, type ExplicitState } from "./strategies/explicit.js";
export { Grid, type GridOptions, type GridState, gridPoints } from "./strategies/grid.js";
export {
	RandomSearch,
	type RandomSearchOptions,
	type RandomSearchState,
} from "./strategies/random-search.js";
export * from "./strategies/types.js";
// Controller
export {
	TunedModel,
	type TunedModelFit,
	type TunedModelFittedParams,
	type TunedModelMetaState,
	type TunedModelOptions,
	type TunedModelReport,
	type TunedModelSettings,
} from "./tuned-model.js";
export { TuningMachine } from "./tuning-machine.js";
