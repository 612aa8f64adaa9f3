import { deepCopy } from "@tuneforge/common";
import { describe, expect, it } from "vitest";
import { tunerConfig } from "../config/env.js";
import type { Model } from "../model/types.js";
import type { SearchSpace } from "../spaces/types.js";
import { ConstantModel } from "../testing/index.js";
import { RandomSearch } from "./random-search.js";
import { isPaired, type Metamodel } from "./types.js";

const range: SearchSpace = [{ type: "int", name: "k", low: 1, high: 100 }];
const model = new ConstantModel({ k: 1 });

function ks(metamodels: Metamodel<Model<number, number, number>>[]): unknown[] {
	return metamodels.map((m) => (isPaired(m) ? m[0] : m).hyperparameters.k);
}

describe("RandomSearch", () => {
	it("should propose as many candidates as asked for, inside the range", () => {
		const search = new RandomSearch({ seed: 1 });
		const state = search.setup(model, range, 0);

		const values = ks(search.models(model, state, [], 25, 0));

		expect(values).toHaveLength(25);
		for (const k of values) {
			expect(k).toBeGreaterThanOrEqual(1);
			expect(k).toBeLessThanOrEqual(100);
		}
	});

	it("should repeat its draws for the same seed", () => {
		const a = new RandomSearch({ seed: 5 });
		const b = new RandomSearch({ seed: 5 });

		expect(ks(a.models(model, a.setup(model, range, 0), [], 6, 0))).toEqual(
			ks(b.models(model, b.setup(model, range, 0), [], 6, 0)),
		);
	});

	it("should carry its generator in the state", () => {
		const search = new RandomSearch({ seed: 8 });
		const state = search.setup(model, range, 0);
		search.models(model, state, [], 3, 0);
		const copy = deepCopy(state);

		expect(ks(search.models(model, copy, [], 4, 0))).toEqual(ks(search.models(model, state, [], 4, 0)));
	});

	it("should default to the configured budget", () => {
		expect(new RandomSearch().defaultN(range)).toBe(tunerConfig.defaultN);
	});
});
