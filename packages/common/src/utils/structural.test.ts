import { describe, expect, it } from "vitest";
import { deepCopy, deepEqual, isSameExcept } from "./structural.js";

class Ridge {
	constructor(public lambda: number) {}

	penalty(): number {
		return this.lambda * 2;
	}
}

describe("deepCopy", () => {
	it("should copy nested plain data", () => {
		const original = { a: [1, 2, { b: "x" }], c: { d: true } };
		const copy = deepCopy(original);

		expect(copy).toEqual(original);
		expect(copy).not.toBe(original);
		expect(copy.a).not.toBe(original.a);
	});

	it("should preserve class prototypes", () => {
		const copy = deepCopy(new Ridge(0.5));

		expect(copy).toBeInstanceOf(Ridge);
		expect(copy.penalty()).toBe(1);
	});

	it("should share functions by reference", () => {
		const fn = (x: number) => x + 1;
		const copy = deepCopy({ fn });

		expect(copy.fn).toBe(fn);
	});

	it("should handle cycles", () => {
		const node: { name: string; self?: unknown } = { name: "root" };
		node.self = node;

		const copy = deepCopy(node);

		expect(copy.self).toBe(copy);
	});

	it("should keep mutations of the copy away from the original", () => {
		const original = { model: new Ridge(1) };
		const copy = deepCopy(original);

		copy.model.lambda = 9;

		expect(original.model.lambda).toBe(1);
	});
});

describe("deepEqual", () => {
	it("should compare primitives with NaN equal to itself", () => {
		expect(deepEqual(1, 1)).toBe(true);
		expect(deepEqual(Number.NaN, Number.NaN)).toBe(true);
		expect(deepEqual("a", "b")).toBe(false);
	});

	it("should compare nested structures", () => {
		expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 2 }] })).toBe(true);
		expect(deepEqual({ a: [1, { b: 2 }] }, { a: [1, { b: 3 }] })).toBe(false);
	});

	it("should treat different prototypes as unequal", () => {
		expect(deepEqual(new Ridge(1), { lambda: 1 })).toBe(false);
	});

	it("should compare functions by identity", () => {
		const f = () => 1;
		expect(deepEqual({ f }, { f })).toBe(true);
		expect(deepEqual({ f }, { f: () => 1 })).toBe(false);
	});

	it("should compare maps, sets and dates", () => {
		expect(deepEqual(new Map([["k", [1]]]), new Map([["k", [1]]]))).toBe(true);
		expect(deepEqual(new Set([1, 2]), new Set([2, 1]))).toBe(true);
		expect(deepEqual(new Date(5), new Date(6))).toBe(false);
	});

	it("should detect a missing key", () => {
		expect(deepEqual({ a: 1, b: undefined }, { a: 1, c: undefined })).toBe(false);
	});
});

describe("isSameExcept", () => {
	it("should ignore the excluded fields", () => {
		expect(isSameExcept({ n: 5, repeats: 1 }, { n: 10, repeats: 1 }, ["n"])).toBe(true);
	});

	it("should detect a change in any other field", () => {
		expect(isSameExcept({ n: 5, repeats: 1 }, { n: 5, repeats: 2 }, ["n"])).toBe(false);
	});

	it("should compare class instances structurally", () => {
		expect(
			isSameExcept({ model: new Ridge(1), n: 1 }, { model: deepCopy(new Ridge(1)), n: 2 }, ["n"]),
		).toBe(true);
	});
});
