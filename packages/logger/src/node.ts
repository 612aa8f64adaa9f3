import { envBool, envStr } from "@tuneforge/common";
import pino, { type DestinationStream } from "pino";
import { mergeRedactPaths } from "./redaction.js";
import type {
	ComponentLoggerOptions,
	Logger,
	LogLevel,
	NodeLoggerOptions,
	SearchContext,
} from "./types.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(value: string): value is LogLevel {
	return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a Pino logger for Node.js.
 *
 * Features:
 * - Uppercase severity levels
 * - ISO timestamps
 * - Credential redaction via Pino's built-in redaction
 * - Pretty printing in development
 * - Structured JSON elsewhere
 */
export function createNodeLogger(
	options: NodeLoggerOptions,
	destination?: DestinationStream,
): Logger {
	const {
		service,
		level = "info",
		environment = process.env.NODE_ENV || "development",
		version = process.env.npm_package_version,
		pretty = environment === "development",
		redactPaths,
		base = {},
		pinoOptions = {},
	} = options;

	// A caller-supplied destination always receives raw JSON
	const transport =
		pretty && !destination
			? {
					target: "pino-pretty",
					options: {
						colorize: true,
						translateTime: "SYS:standard",
						ignore: "pid,hostname",
						levelFirst: true,
						messageFormat: "{component} - {msg}",
					},
				}
			: undefined;

	const pinoConfig: pino.LoggerOptions = {
		level,
		formatters: {
			level(label: string) {
				const severityMap: Record<string, string> = {
					debug: "DEBUG",
					info: "INFO",
					warn: "WARNING",
					error: "ERROR",
				};
				return { severity: severityMap[label] || label.toUpperCase() };
			},
			bindings(bindings: pino.Bindings) {
				const { pid: _pid, hostname: _hostname, ...rest } = bindings;
				return {
					service,
					environment,
					...(version && { version }),
					...base,
					...rest,
				};
			},
		},
		timestamp: pino.stdTimeFunctions.isoTime,
		redact: {
			paths: [...mergeRedactPaths(redactPaths)],
			censor: "[REDACTED]",
		},
		...(transport && { transport }),
		...pinoOptions,
	};

	return destination ? pino(pinoConfig, destination) : pino(pinoConfig);
}

let rootLogger: Logger | undefined;

function getRootLogger(): Logger {
	if (!rootLogger) {
		const configured = envStr("TUNEFORGE_LOG_LEVEL", "info");
		rootLogger = createNodeLogger({
			service: "tuneforge",
			level: isLogLevel(configured) ? configured : "info",
			pretty: envBool("TUNEFORGE_PRETTY_LOGS", (process.env.NODE_ENV || "development") === "development"),
		});
	}
	return rootLogger;
}

/**
 * Child of the process-wide root logger, tagged with a component name.
 *
 * @example
 * ```ts
 * const logger = createLogger({ component: "search-loop" });
 * logger.info({ msg: "Batch dispatched", size: 8 });
 * ```
 */
export function createLogger(context: ComponentLoggerOptions = {}): Logger {
	const { level, ...bindings } = context;
	const child = getRootLogger().child(bindings);
	if (level) {
		child.level = level;
	}
	return child;
}

/**
 * Create a child logger bound to one search.
 *
 * @param logger - Parent logger
 * @param search - Search identifiers
 */
export function withSearchContext(logger: Logger, search: SearchContext): Logger {
	return logger.child({
		...(search.searchId && { search_id: search.searchId }),
		...(search.strategy && { strategy: search.strategy }),
		...(search.phase && { phase: search.phase }),
	});
}
