import { NotTrainedError } from "@tuneforge/common";
import type { Dataset, Fitted, Model } from "./types.js";

/**
 * A model bound to its training data, trained on demand.
 */
export class Machine<X, Y, P> {
	private fitted: Fitted<X, P> | null = null;

	constructor(
		readonly model: Model<X, Y, P>,
		readonly data: Dataset<X, Y>,
	) {}

	get isTrained(): boolean {
		return this.fitted !== null;
	}

	async fit(verbosity = 1): Promise<this> {
		this.fitted = await this.model.fit(this.data, verbosity);
		return this;
	}

	async predict(X: readonly X[]): Promise<P[]> {
		return this.trained().predict(X);
	}

	fittedParams(): unknown {
		return this.trained().fittedParams?.() ?? null;
	}

	report(): unknown {
		return this.trained().report?.() ?? null;
	}

	private trained(): Fitted<X, P> {
		if (!this.fitted) {
			throw new NotTrainedError(this.model.name);
		}
		return this.fitted;
	}
}
