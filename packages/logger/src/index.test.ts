import { describe, expect, it } from "vitest";
import { createLogger, createNodeLogger, withSearchContext } from "./node.js";
import { DEFAULT_REDACT_PATHS, mergeRedactPaths } from "./redaction.js";

function captureDestination() {
	const lines: Record<string, unknown>[] = [];
	return {
		lines,
		write(msg: string) {
			lines.push(JSON.parse(msg));
		},
	};
}

describe("Logger Package", () => {
	describe("Redaction", () => {
		it("should return default paths when no custom paths provided", () => {
			expect(mergeRedactPaths()).toEqual(DEFAULT_REDACT_PATHS);
			expect(mergeRedactPaths([])).toEqual(DEFAULT_REDACT_PATHS);
		});

		it("should merge custom paths with defaults", () => {
			const paths = mergeRedactPaths(["dataset.connectionString"]);
			expect(paths).toContain("dataset.connectionString");
			expect(paths).toContain("*.apiKey");
		});

		it("should deduplicate paths", () => {
			const paths = mergeRedactPaths(["*.password"]);
			expect(paths.filter((p) => p === "*.password")).toHaveLength(1);
		});

		it("should censor credentials in log lines", () => {
			const dest = captureDestination();
			const logger = createNodeLogger({ service: "test", environment: "test" }, dest);

			logger.info({ msg: "evaluator ready", remote: { url: "http://eval.local", apiKey: "test-secret" } });

			expect(dest.lines[0].remote).toEqual({ url: "http://eval.local", apiKey: "[REDACTED]" });
		});
	});

	describe("Node Logger", () => {
		it("should create a logger with correct base context", () => {
			const logger = createNodeLogger({
				service: "test-service",
				environment: "test",
				base: { component: "test-comp" },
			});

			expect(logger.bindings()).toMatchObject({
				service: "test-service",
				environment: "test",
				component: "test-comp",
			});
		});

		it("should default to info level", () => {
			const logger = createNodeLogger({ service: "test", environment: "test" });
			expect(logger.level).toBe("info");
		});

		it("should respect custom log level", () => {
			const logger = createNodeLogger({ service: "test", environment: "test", level: "debug" });
			expect(logger.level).toBe("debug");
		});

		it("should include version when provided", () => {
			const logger = createNodeLogger({ service: "test", environment: "test", version: "1.2.3" });
			expect(logger.bindings()).toMatchObject({ version: "1.2.3" });
		});

		it("should write severity labels and drop pid/hostname", () => {
			const dest = captureDestination();
			const logger = createNodeLogger({ service: "test", environment: "test" }, dest);

			logger.warn({ msg: "supply running low" });

			expect(dest.lines).toHaveLength(1);
			expect(dest.lines[0]).toMatchObject({
				severity: "WARNING",
				service: "test",
				environment: "test",
				msg: "supply running low",
			});
			expect(dest.lines[0]).not.toHaveProperty("pid");
			expect(dest.lines[0]).not.toHaveProperty("hostname");
			expect(typeof dest.lines[0].time).toBe("string");
		});

		it("should suppress lines below the level", () => {
			const dest = captureDestination();
			const logger = createNodeLogger({ service: "test", environment: "test", level: "warn" }, dest);

			logger.info({ msg: "hidden" });
			logger.error({ msg: "shown" });

			expect(dest.lines.map((line) => line.msg)).toEqual(["shown"]);
		});
	});

	describe("Context Helpers", () => {
		it("should add search context with all fields", () => {
			const base = createNodeLogger({ service: "test", environment: "test" });
			const child = withSearchContext(base, {
				searchId: "search-1",
				strategy: "Grid",
				phase: "update",
			});

			expect(child.bindings()).toMatchObject({
				search_id: "search-1",
				strategy: "Grid",
				phase: "update",
			});
		});

		it("should omit missing search fields", () => {
			const base = createNodeLogger({ service: "test", environment: "test" });
			const child = withSearchContext(base, { strategy: "RandomSearch" });

			expect(child.bindings().strategy).toBe("RandomSearch");
			expect(child.bindings().search_id).toBeUndefined();
		});
	});

	describe("Component loggers", () => {
		it("should bind the component name", () => {
			const logger = createLogger({ component: "search-loop" });
			expect(logger.bindings()).toMatchObject({ component: "search-loop" });
		});

		it("should apply a per-component level override", () => {
			const logger = createLogger({ component: "dispatcher", level: "error" });
			expect(logger.level).toBe("error");
		});
	});
});
