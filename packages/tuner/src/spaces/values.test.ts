import { createRNG } from "@tuneforge/common";
import { describe, expect, it } from "vitest";
import type { SearchSpaceParameter } from "./types.js";
import { gridSize, parameterValues, sampleParameter } from "./values.js";

describe("parameterValues", () => {
	it("should list every integer when the range fits in the resolution", () => {
		const values = parameterValues({ type: "int", name: "k", low: 1, high: 10 }, 10);

		expect(values).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
	});

	it("should space wide integer ranges and round to unique values", () => {
		const values = parameterValues({ type: "int", name: "k", low: 1, high: 100 }, 5);

		expect(values).toEqual([1, 26, 51, 75, 100]);
	});

	it("should honor an integer step", () => {
		const values = parameterValues({ type: "int", name: "depth", low: 10, high: 100, step: 30 }, 3);

		expect(values).toEqual([10, 40, 70, 100]);
	});

	it("should space floats linearly", () => {
		const values = parameterValues({ type: "float", name: "lambda", low: 0, high: 1 }, 3);

		expect(values).toEqual([0, 0.5, 1]);
	});

	it("should honor a float step over the resolution", () => {
		const values = parameterValues({ type: "float", name: "lambda", low: 0, high: 1, step: 0.25 }, 3);

		expect(values).toEqual([0, 0.25, 0.5, 0.75, 1]);
	});

	it("should space log-scaled floats geometrically", () => {
		const values = parameterValues({ type: "float", name: "lambda", low: 1, high: 100, log: true }, 3);

		expect(values).toHaveLength(3);
		expect(values[0]).toBe(1);
		expect(values[1]).toBeCloseTo(10);
		expect(values[2]).toBe(100);
	});

	it("should return a single point for a degenerate range", () => {
		expect(parameterValues({ type: "float", name: "lambda", low: 2, high: 2 }, 5)).toEqual([2]);
	});

	it("should copy categorical choices", () => {
		const param: SearchSpaceParameter = { type: "categorical", name: "kernel", choices: ["rbf", "linear"] };
		const values = parameterValues(param, 10);

		expect(values).toEqual(["rbf", "linear"]);
		expect(values).not.toBe(param.choices);
	});
});

describe("gridSize", () => {
	it("should multiply the per-parameter counts", () => {
		const size = gridSize(
			[
				{ type: "int", name: "k", low: 1, high: 10 },
				{ type: "categorical", name: "kernel", choices: ["a", "b", "c"] },
			],
			10,
		);

		expect(size).toBe(30);
	});
});

describe("sampleParameter", () => {
	it("should draw integers inside the bounds", () => {
		const rng = createRNG(7);
		const param: SearchSpaceParameter = { type: "int", name: "k", low: 3, high: 6 };

		for (let i = 0; i < 200; i++) {
			const value = sampleParameter(param, rng);
			expect(Number.isInteger(value)).toBe(true);
			expect(value).toBeGreaterThanOrEqual(3);
			expect(value).toBeLessThanOrEqual(6);
		}
	});

	it("should draw stepped values on the step lattice", () => {
		const rng = createRNG(11);
		const param: SearchSpaceParameter = { type: "int", name: "depth", low: 10, high: 100, step: 30 };

		for (let i = 0; i < 50; i++) {
			expect([10, 40, 70, 100]).toContain(sampleParameter(param, rng));
		}
	});

	it("should draw log-scaled floats inside the bounds", () => {
		const rng = createRNG(3);
		const param: SearchSpaceParameter = { type: "float", name: "lambda", low: 0.001, high: 10, log: true };

		for (let i = 0; i < 100; i++) {
			const value = sampleParameter(param, rng);
			expect(value).toBeGreaterThanOrEqual(0.001);
			expect(value).toBeLessThan(10);
		}
	});

	it("should draw categorical values from the choices", () => {
		const rng = createRNG(5);
		const param: SearchSpaceParameter = { type: "categorical", name: "kernel", choices: ["rbf", "linear"] };

		for (let i = 0; i < 20; i++) {
			expect(["rbf", "linear"]).toContain(sampleParameter(param, rng));
		}
	});

	it("should repeat the same draws for the same seed", () => {
		const param: SearchSpaceParameter = { type: "float", name: "lambda", low: 0, high: 1 };
		const a = createRNG(42);
		const b = createRNG(42);

		const first = Array.from({ length: 5 }, () => sampleParameter(param, a));
		const second = Array.from({ length: 5 }, () => sampleParameter(param, b));

		expect(first).toEqual(second);
	});
});
