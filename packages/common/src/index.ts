/**
 * @tuneforge/common - Shared errors and utilities for the tuneforge packages.
 *
 * @example
 * ```ts
 * import { ConfigurationError, envNum, deepCopy } from "@tuneforge/common";
 *
 * // Or import from subpaths
 * import { EvaluationError } from "@tuneforge/common/errors";
 * import { createRNG } from "@tuneforge/common/utils";
 * ```
 *
 * @module @tuneforge/common
 */

// =============================================================================
// Utils
// =============================================================================

export type { DeterministicRNG } from "./utils/index.js";
export {
	createRNG,
	// Structural helpers
	deepCopy,
	deepEqual,
	// Environment helpers
	envBool,
	envNum,
	envStr,
	// Formatting
	formatParams,
	isSameExcept,
	// Randomness
	SeededRNG,
	shuffled,
} from "./utils/index.js";

// =============================================================================
// Errors
// =============================================================================

export type { ErrorCode } from "./errors/index.js";
export {
	ConfigurationError,
	EmptyHistoryError,
	ErrorCodes,
	EvaluationError,
	NotTrainedError,
	// Base error
	TuneforgeError,
} from "./errors/index.js";
