import { EmptyHistoryError } from "@tuneforge/common";
import type { Orientation } from "../measures/index.js";
import type { AnyModel, Hyperparameters, Model } from "../model/types.js";
import type { PerformanceEvaluation } from "../resampling/evaluator.js";
import type { History, HistoryRecord, Metamodel, TuningStrategy } from "./types.js";

export interface DefaultResult {
	readonly measure: readonly string[];
	readonly orientation: readonly Orientation[];
	readonly measurement: readonly number[];
	readonly perFold: readonly (readonly number[])[];
	readonly metadata?: unknown;
}

export interface DefaultSummaryEntry {
	readonly model: AnyModel;
	readonly hyperparameters: Hyperparameters;
	readonly measurement: readonly number[];
}

export interface DefaultSummary {
	readonly history: readonly DefaultSummaryEntry[];
	readonly bestIndex: number;
}

function improves(candidate: number, incumbent: number, orientation: Orientation): boolean {
	if (Number.isNaN(candidate)) return false;
	if (Number.isNaN(incumbent)) return true;
	return orientation === "loss" ? candidate < incumbent : candidate > incumbent;
}

/**
 * Index of the best record: the first measure decides, the rest are reported
 * only. Ties go to the earlier record.
 */
export function bestIndex(history: History<unknown, DefaultResult>): number {
	let best = -1;
	history.forEach((record, i) => {
		const orientation = record.result.orientation[0] ?? "loss";
		if (
			best === -1 ||
			improves(record.result.measurement[0], history[best].result.measurement[0], orientation)
		) {
			best = i;
		}
	});
	return best;
}

/**
 * Result, selection and report shared by the built-in strategies.
 */
export abstract class BaseStrategy<TRange, TState>
	implements TuningStrategy<TRange, TState, DefaultResult, DefaultSummary>
{
	abstract readonly name: string;

	abstract setup<X, Y, P>(model: Model<X, Y, P>, range: TRange, verbosity: number): TState;

	abstract models<X, Y, P>(
		model: Model<X, Y, P>,
		state: TState,
		history: History<Model<X, Y, P>, DefaultResult>,
		remaining: number,
		verbosity: number,
	): Metamodel<Model<X, Y, P>>[];

	abstract defaultN(range: TRange): number;

	result<X, Y, P>(
		_history: History<Model<X, Y, P>, DefaultResult>,
		_state: TState,
		evaluation: PerformanceEvaluation,
		metadata: unknown,
	): DefaultResult {
		return {
			measure: evaluation.measures.map((m) => m.name),
			orientation: evaluation.measures.map((m) => m.orientation),
			measurement: evaluation.measurement,
			perFold: evaluation.perFold,
			...(metadata !== undefined && { metadata }),
		};
	}

	best<X, Y, P>(
		history: History<Model<X, Y, P>, DefaultResult>,
	): HistoryRecord<Model<X, Y, P>, DefaultResult> {
		const index = bestIndex(history);
		if (index === -1) {
			throw new EmptyHistoryError(this.name);
		}
		return history[index];
	}

	report<X, Y, P>(history: History<Model<X, Y, P>, DefaultResult>, _state: TState): DefaultSummary {
		return {
			history: history.map(({ model, result }) => ({
				model,
				hyperparameters: model.hyperparameters,
				measurement: result.measurement,
			})),
			bestIndex: bestIndex(history),
		};
	}
}
