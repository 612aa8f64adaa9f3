/**
 * Batch dispatch under the three acceleration policies.
 *
 * All policies return records in the order of the submitted candidates.
 *
 * @module @tuneforge/tuner/executor
 */

import PQueue from "p-queue";
import { type Acceleration, resolveWorkers } from "../acceleration.js";
import type { Model } from "../model/types.js";
import type { HistoryRecord, Metamodel } from "../strategies/types.js";
import { type EventContext, runEvent } from "./event.js";
import { type ProgressHandler, ProgressTracker } from "./progress.js";
import type { EvaluatorPool } from "./worker-pool.js";

export interface DispatchContext<X, Y, P, TState, TResult> extends EventContext<X, Y, P, TState, TResult> {
	onProgress?: ProgressHandler;
}

type BatchRecord<X, Y, P, TResult> = HistoryRecord<Model<X, Y, P>, TResult>;

function collect<T>(slots: readonly (T | undefined)[]): T[] {
	return slots.map((slot, i) => {
		if (slot === undefined) {
			throw new Error(`Batch slot ${i} was never filled`);
		}
		return slot;
	});
}

async function runSequential<X, Y, P, TState, TResult>(
	metamodels: readonly Metamodel<Model<X, Y, P>>[],
	pool: EvaluatorPool<X, Y, P>,
	context: DispatchContext<X, Y, P, TState, TResult>,
	progress: ProgressTracker,
): Promise<BatchRecord<X, Y, P, TResult>[]> {
	const evaluator = pool.acquire(0);
	const records: BatchRecord<X, Y, P, TResult>[] = [];
	for (const [i, metamodel] of metamodels.entries()) {
		records.push(await runEvent(metamodel, i, evaluator, context));
		await progress.tick();
	}
	return records;
}

/**
 * Dynamic scheduling: each task borrows a free worker id for its duration.
 * The first failure drops the tasks that have not started.
 */
async function runProcesses<X, Y, P, TState, TResult>(
	metamodels: readonly Metamodel<Model<X, Y, P>>[],
	pool: EvaluatorPool<X, Y, P>,
	context: DispatchContext<X, Y, P, TState, TResult>,
	progress: ProgressTracker,
	workers: number,
): Promise<BatchRecord<X, Y, P, TResult>[]> {
	const queue = new PQueue({ concurrency: workers });
	const free = Array.from({ length: workers }, (_, id) => workers - 1 - id);
	const slots = new Array<BatchRecord<X, Y, P, TResult> | undefined>(metamodels.length);

	const tasks = metamodels.map((metamodel, i) =>
		queue
			.add(async () => {
				const workerId = free.pop() ?? 0;
				try {
					slots[i] = await runEvent(metamodel, i, pool.acquire(workerId), context);
				} finally {
					free.push(workerId);
				}
				await progress.tick();
			})
			.catch((error: unknown) => {
				queue.clear();
				throw error;
			}),
	);

	await Promise.all(tasks);
	return collect(slots);
}

/**
 * Static scheduling: contiguous partitions of `ceil(n / workers)` candidates,
 * one lane per partition, lane id doubling as worker id. A failing lane stops
 * the others before their next event.
 */
async function runThreads<X, Y, P, TState, TResult>(
	metamodels: readonly Metamodel<Model<X, Y, P>>[],
	pool: EvaluatorPool<X, Y, P>,
	context: DispatchContext<X, Y, P, TState, TResult>,
	progress: ProgressTracker,
	workers: number,
): Promise<BatchRecord<X, Y, P, TResult>[]> {
	const n = metamodels.length;
	const size = Math.ceil(n / Math.min(n, workers));
	const slots = new Array<BatchRecord<X, Y, P, TResult> | undefined>(n);
	let aborted = false;

	const lanes: Promise<void>[] = [];
	for (let lane = 0; lane * size < n; lane++) {
		const start = lane * size;
		const end = Math.min(start + size, n);
		lanes.push(
			(async () => {
				const evaluator = pool.acquire(lane);
				for (let i = start; i < end && !aborted; i++) {
					try {
						slots[i] = await runEvent(metamodels[i], i, evaluator, context);
					} catch (error) {
						aborted = true;
						throw error;
					}
					await progress.tick();
				}
			})(),
		);
	}

	await Promise.all(lanes);
	return collect(slots);
}

/**
 * Evaluate a batch of candidates and return their history records in input order.
 *
 * `threads` with a single worker runs sequentially.
 */
export async function assembleEvents<X, Y, P, TState, TResult>(
	metamodels: readonly Metamodel<Model<X, Y, P>>[],
	pool: EvaluatorPool<X, Y, P>,
	acceleration: Acceleration,
	context: DispatchContext<X, Y, P, TState, TResult>,
): Promise<BatchRecord<X, Y, P, TResult>[]> {
	if (metamodels.length === 0) return [];

	const progress = new ProgressTracker({
		total: metamodels.length,
		verbosity: context.verbosity,
		logger: context.logger,
		onProgress: context.onProgress,
	});
	const workers = resolveWorkers(acceleration);

	switch (acceleration.type) {
		case "cpu1":
			return runSequential(metamodels, pool, context, progress);
		case "processes":
			return runProcesses(metamodels, pool, context, progress, workers);
		case "threads":
			return workers === 1
				? runSequential(metamodels, pool, context, progress)
				: runThreads(metamodels, pool, context, progress, workers);
	}
}
