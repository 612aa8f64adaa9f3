/**
 * Concurrency policies for batch dispatch and for resampling.
 *
 * Node runs user models on one event loop, so both parallel policies run
 * evaluations as concurrent lanes, each lane owning a private evaluator:
 *
 * - `processes`: dynamic scheduling; each task takes whichever worker is free
 * - `threads`: static scheduling; the batch is split into contiguous partitions,
 *   one per worker
 *
 * @module @tuneforge/tuner/acceleration
 */

import { ConfigurationError } from "@tuneforge/common";
import { tunerConfig } from "./config/env.js";

export type Acceleration =
	| { readonly type: "cpu1" }
	| { readonly type: "threads"; readonly workers?: number }
	| { readonly type: "processes"; readonly workers?: number };

export type AccelerationType = Acceleration["type"];

export function cpu1(): Acceleration {
	return { type: "cpu1" };
}

export function cpuThreads(workers?: number): Acceleration {
	return workers === undefined ? { type: "threads" } : { type: "threads", workers };
}

export function cpuProcesses(workers?: number): Acceleration {
	return workers === undefined ? { type: "processes" } : { type: "processes", workers };
}

/**
 * Number of workers a policy runs with. `cpu1` always has one.
 */
export function resolveWorkers(acceleration: Acceleration): number {
	if (acceleration.type === "cpu1") return 1;
	return Math.max(1, acceleration.workers ?? tunerConfig.workers);
}

/**
 * Acceleration named by `TUNEFORGE_ACCELERATION`.
 */
export function defaultAcceleration(): Acceleration {
	switch (tunerConfig.acceleration) {
		case "cpu1":
			return cpu1();
		case "threads":
			return cpuThreads();
		case "processes":
			return cpuProcesses();
		default:
			throw new ConfigurationError(
				`Unknown acceleration "${tunerConfig.acceleration}" in TUNEFORGE_ACCELERATION (expected cpu1, threads or processes)`,
				"acceleration",
				undefined,
				{ value: tunerConfig.acceleration },
			);
	}
}
