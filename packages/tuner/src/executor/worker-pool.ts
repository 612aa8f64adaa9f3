import type { ResamplingEvaluator } from "../resampling/evaluator.js";

/**
 * Evaluators keyed by worker id. Worker 0 uses the template; every other
 * worker gets its own clone on first use, kept for the rest of the search.
 */
export class EvaluatorPool<X, Y, P> {
	private readonly evaluators = new Map<number, ResamplingEvaluator<X, Y, P>>();

	constructor(readonly template: ResamplingEvaluator<X, Y, P>) {
		this.evaluators.set(0, template);
	}

	get size(): number {
		return this.evaluators.size;
	}

	acquire(workerId: number): ResamplingEvaluator<X, Y, P> {
		let evaluator = this.evaluators.get(workerId);
		if (!evaluator) {
			evaluator = this.template.clone();
			this.evaluators.set(workerId, evaluator);
		}
		return evaluator;
	}
}
