/**
 * Error types for tuneforge.
 *
 * @module @tuneforge/common/errors
 */

export { TuneforgeError } from "./base.js";
export type { ErrorCode } from "./domain.js";
export {
	ConfigurationError,
	EmptyHistoryError,
	ErrorCodes,
	EvaluationError,
	NotTrainedError,
} from "./domain.js";
