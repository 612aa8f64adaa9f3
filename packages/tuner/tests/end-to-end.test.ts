import { EvaluationError } from "@tuneforge/common";
import { describe, expect, it } from "vitest";
import {
	type Acceleration,
	cpu1,
	cpuProcesses,
	cpuThreads,
	cv,
	Explicit,
	Grid,
	l1,
	l2,
	RandomSearch,
	TunedModel,
	TuningMachine,
} from "../src/index.js";
import { captureLogs, ConstantModel, MeanModel } from "../src/testing/index.js";

const zeros = { X: Array.from({ length: 10 }, (_, i) => i), y: new Array<number>(10).fill(0) };
const ramp = { X: Array.from({ length: 12 }, (_, i) => i), y: Array.from({ length: 12 }, (_, i) => i % 4) };

function constantSearch(options: {
	n?: number;
	failOn?: number;
	acceleration?: Acceleration;
	shuffle?: boolean;
	latency?: (k: number) => number;
}) {
	return new TunedModel({
		model: new ConstantModel({ k: 1 }, { failOn: options.failOn, latency: options.latency }),
		tuning: new Grid({ resolution: 10, shuffle: options.shuffle, seed: 11 }),
		range: [{ type: "int", name: "k", low: 1, high: 10 }],
		measure: l1,
		n: options.n,
		acceleration: options.acceleration ?? cpu1(),
		logger: captureLogs().logger,
	});
}

describe("tuning end to end", () => {
	it("should find the constant closest to all-zero targets", async () => {
		const mach = await new TuningMachine(constantSearch({}), zeros).fit(0);

		expect(mach.history).toHaveLength(10);
		expect(mach.report().bestModel.hyperparameters.k).toBe(1);
		expect(mach.report().bestResult.measurement).toEqual([1]);
	});

	it("should extend a shuffled grid exactly as a longer first search would begin", async () => {
		const short = await new TuningMachine(constantSearch({ n: 5, shuffle: true }), zeros).fit(0);

		const growing = new TuningMachine(constantSearch({ n: 5, shuffle: true }), zeros);
		await growing.fit(0);
		growing.tunedModel.n = 10;
		await growing.fit(0);

		const summary = (mach: typeof short) =>
			mach.history.map((r) => [r.model.hyperparameters.k, r.result.measurement[0]]);
		expect(growing.history).toHaveLength(10);
		expect(summary(growing).slice(0, 5)).toEqual(summary(short));
		expect(new Set(summary(growing).map(([k]) => k)).size).toBe(10);
	});

	it("should surface a failing candidate and keep the machine unfitted", async () => {
		const mach = new TuningMachine(constantSearch({ failOn: 7 }), zeros);

		await expect(mach.fit(0)).rejects.toThrow(EvaluationError);
		expect(mach.isFitted).toBe(false);
		expect(mach.history).toEqual([]);
	});

	it("should give the same history under every acceleration", async () => {
		const latency = (k: number) => (11 - k) * 2;
		const accelerations = [cpu1(), cpuThreads(3), cpuProcesses(4)];

		const histories = await Promise.all(
			accelerations.map(async (acceleration) => {
				const mach = await new TuningMachine(constantSearch({ acceleration, latency }), zeros).fit(0);
				return mach.history.map((r) => [r.model.hyperparameters.k, ...r.result.measurement]);
			}),
		);

		expect(histories[1]).toEqual(histories[0]);
		expect(histories[2]).toEqual(histories[0]);
	});

	it("should give the same measurements with parallel resampling", async () => {
		const evaluate = async (accelerationResampling: Acceleration) => {
			const tuned = new TunedModel({
				model: new MeanModel(),
				tuning: new RandomSearch({ seed: 5 }),
				range: [{ type: "float", name: "shift", low: -1, high: 1 }],
				measure: [l2, l1],
				resampling: cv({ nfolds: 4 }),
				repeats: 2,
				n: 6,
				acceleration: cpu1(),
				accelerationResampling,
				logger: captureLogs().logger,
			});
			const { metaState } = await tuned.fit(0, ramp);
			return metaState.history.map((r) => r.result.perFold);
		};

		const sequential = await evaluate(cpu1());
		const parallel = await evaluate(cpuThreads(3));

		expect(parallel).toEqual(sequential);
		expect(sequential[0][0]).toHaveLength(8);
	});

	it("should evaluate an explicit list of models in order", async () => {
		const tuned = new TunedModel({
			model: new ConstantModel(),
			tuning: new Explicit(),
			range: [new ConstantModel({ k: 3 }), new ConstantModel({ k: 2 }), new ConstantModel({ k: 5 })],
			measure: l1,
			acceleration: cpu1(),
			logger: captureLogs().logger,
		});

		const { metaState, report } = await tuned.fit(0, zeros);

		expect(metaState.history.map((r) => r.model.hyperparameters.k)).toEqual([3, 2, 5]);
		expect(report.bestIndex).toBe(1);
		expect(report.bestModel.hyperparameters).toEqual({ k: 2 });
	});
});
