import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { cpu1, cpuProcesses, cpuThreads, resolveWorkers } from "./acceleration.js";
import { tunerConfig } from "./config/env.js";

describe("acceleration", () => {
	describe("factories", () => {
		it("should leave the worker count unset unless given", () => {
			expect(cpu1()).toEqual({ type: "cpu1" });
			expect(cpuThreads()).toEqual({ type: "threads" });
			expect(cpuProcesses(3)).toEqual({ type: "processes", workers: 3 });
		});
	});

	describe("resolveWorkers", () => {
		it("should run cpu1 on one worker", () => {
			expect(resolveWorkers(cpu1())).toBe(1);
		});

		it("should honour an explicit worker count", () => {
			expect(resolveWorkers(cpuThreads(4))).toBe(4);
			expect(resolveWorkers(cpuProcesses(2))).toBe(2);
		});

		it("should never go below one worker", () => {
			expect(resolveWorkers(cpuThreads(0))).toBe(1);
		});

		it("should default to the configured worker count", () => {
			expect(resolveWorkers(cpuProcesses())).toBe(Math.max(1, tunerConfig.workers));
		});
	});

	describe("defaultAcceleration", () => {
		let originalEnv: NodeJS.ProcessEnv;

		beforeEach(() => {
			originalEnv = { ...process.env };
		});

		afterEach(() => {
			process.env = originalEnv;
		});

		async function load(value: string) {
			process.env.TUNEFORGE_ACCELERATION = value;
			vi.resetModules();
			const { defaultAcceleration } = await import("./acceleration.js");
			return defaultAcceleration;
		}

		it("should follow TUNEFORGE_ACCELERATION", async () => {
			expect((await load("cpu1"))()).toEqual({ type: "cpu1" });
			expect((await load("threads"))()).toEqual({ type: "threads" });
			expect((await load("processes"))()).toEqual({ type: "processes" });
		});

		it("should reject an unknown policy", async () => {
			const defaultAcceleration = await load("gpu");

			// Fresh module graph, so match on the error rather than its class
			expect(() => defaultAcceleration()).toThrow(
				'Unknown acceleration "gpu" in TUNEFORGE_ACCELERATION (expected cpu1, threads or processes)',
			);
		});
	});
});
