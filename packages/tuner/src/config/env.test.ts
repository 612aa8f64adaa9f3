import { availableParallelism } from "node:os";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
	vi.resetModules();
	const { tunerConfig } = await import("./env.js");
	return tunerConfig;
}

describe("tunerConfig", () => {
	let originalEnv: NodeJS.ProcessEnv;

	beforeEach(() => {
		originalEnv = { ...process.env };
		for (const key of Object.keys(process.env)) {
			if (key.startsWith("TUNEFORGE_") && key !== "TUNEFORGE_LOG_LEVEL") {
				delete process.env[key];
			}
		}
	});

	afterEach(() => {
		process.env = originalEnv;
	});

	it("should use defaults when nothing is set", async () => {
		const config = await loadConfig();

		expect(config).toEqual({
			acceleration: "cpu1",
			workers: availableParallelism(),
			gridResolution: 10,
			randomSeed: 1234,
			defaultN: 10,
		});
	});

	it("should read overrides from the environment", async () => {
		process.env.TUNEFORGE_ACCELERATION = "processes";
		process.env.TUNEFORGE_WORKERS = "3";
		process.env.TUNEFORGE_GRID_RESOLUTION = "4";
		process.env.TUNEFORGE_RANDOM_SEED = "99";
		process.env.TUNEFORGE_DEFAULT_N = "25";

		const config = await loadConfig();

		expect(config).toEqual({
			acceleration: "processes",
			workers: 3,
			gridResolution: 4,
			randomSeed: 99,
			defaultN: 25,
		});
	});

	it("should fall back when a number does not parse", async () => {
		process.env.TUNEFORGE_GRID_RESOLUTION = "fine";

		const config = await loadConfig();

		expect(config.gridResolution).toBe(10);
	});
});
