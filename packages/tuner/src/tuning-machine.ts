import { NotTrainedError } from "@tuneforge/common";
import type { Dataset, Model } from "./model/types.js";
import type { History } from "./strategies/types.js";
import type {
	TunedModel,
	TunedModelFit,
	TunedModelFittedParams,
	TunedModelReport,
} from "./tuned-model.js";

/**
 * Binds a tuned model to its data.
 *
 * The first `fit()` runs a fresh search; later calls hand the stored
 * meta-state to `update`, so raising `n` between calls extends the search.
 * Stored state is replaced only when a call succeeds.
 */
export class TuningMachine<X, Y, P, TRange, TState, TResult, TSummary> {
	private latest: TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary> | null = null;

	constructor(
		readonly tunedModel: TunedModel<X, Y, P, TRange, TState, TResult, TSummary>,
		readonly data: Dataset<X, Y>,
	) {}

	get isFitted(): boolean {
		return this.latest !== null;
	}

	/** History of the current search, empty before the first fit */
	get history(): History<Model<X, Y, P>, TResult> {
		return this.latest?.metaState.history ?? [];
	}

	async fit(verbosity = 1): Promise<this> {
		this.latest = this.latest
			? await this.tunedModel.update(
					verbosity,
					this.latest.fitresult,
					this.latest.metaState,
					this.data,
				)
			: await this.tunedModel.fit(verbosity, this.data);
		return this;
	}

	async predict(X: readonly X[]): Promise<P[]> {
		return this.tunedModel.predict(this.fitted().fitresult, X);
	}

	report(): TunedModelReport<X, Y, P, TResult, TSummary> {
		return this.fitted().report;
	}

	fittedParams(): TunedModelFittedParams<X, Y, P> {
		return this.tunedModel.fittedParams(this.fitted().fitresult);
	}

	private fitted(): TunedModelFit<X, Y, P, TRange, TState, TResult, TSummary> {
		if (!this.latest) {
			throw new NotTrainedError("TuningMachine");
		}
		return this.latest;
	}
}
