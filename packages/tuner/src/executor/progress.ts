import type { Logger } from "@tuneforge/logger";
import PQueue from "p-queue";

export type TuningProgressEvent =
	| { type: "progress"; completed: number; total: number }
	| { type: "exhausted"; evaluated: number; requested: number };

export type ProgressHandler = (event: TuningProgressEvent) => void;

export interface ProgressTrackerOptions {
	total: number;
	verbosity: number;
	logger: Logger;
	onProgress?: ProgressHandler;
}

/**
 * Counts completed events of one batch. Increments are serialized so lanes
 * finishing together report distinct counts.
 *
 * Silent below verbosity 1.
 */
export class ProgressTracker {
	private completed = 0;
	private readonly lock = new PQueue({ concurrency: 1 });

	constructor(private readonly options: ProgressTrackerOptions) {}

	get count(): number {
		return this.completed;
	}

	async tick(): Promise<void> {
		await this.lock.add(() => {
			this.completed++;
			const { total, verbosity, logger, onProgress } = this.options;
			if (verbosity < 1) return;

			onProgress?.({ type: "progress", completed: this.completed, total });
			logger.debug({ msg: "Batch progress", completed: this.completed, total });
		});
	}
}
