/**
 * Utility functions for tuneforge.
 *
 * @module @tuneforge/common/utils
 */

export { envBool, envNum, envStr } from "./env.js";
export { formatParams } from "./format.js";
export { createRNG, type DeterministicRNG, SeededRNG, shuffled } from "./random.js";
export { deepCopy, deepEqual, isSameExcept } from "./structural.js";
