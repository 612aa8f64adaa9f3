/**
 * Tuner defaults read from the environment once, at module load.
 *
 * @example
 * ```ts
 * import { tunerConfig } from "@tuneforge/tuner";
 *
 * const resolution = tunerConfig.gridResolution;
 * ```
 *
 * @module @tuneforge/tuner/config
 */

import { availableParallelism } from "node:os";
import { envNum, envStr } from "@tuneforge/common";

export const tunerConfig = {
	/** Outer acceleration used when a tuned model does not name one */
	acceleration: envStr("TUNEFORGE_ACCELERATION", "cpu1"),

	/** Worker count for threads/processes accelerations that leave it unset */
	workers: envNum("TUNEFORGE_WORKERS", availableParallelism()),

	/** Points per numeric parameter for Grid */
	gridResolution: envNum("TUNEFORGE_GRID_RESOLUTION", 10),

	/** Seed for Grid shuffling and RandomSearch */
	randomSeed: envNum("TUNEFORGE_RANDOM_SEED", 1234),

	/** Iteration budget for strategies with an unbounded supply */
	defaultN: envNum("TUNEFORGE_DEFAULT_N", 10),
} as const;
