import type { Logger as PinoLogger, LoggerOptions as PinoOptions } from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface BaseLogContext {
	service?: string;
	component?: string;
	environment?: string;
	version?: string;
}

/**
 * Identifies one logical search (a fit plus the updates that extend it).
 */
export interface SearchContext {
	searchId?: string;
	strategy?: string;
	phase?: "fit" | "update";
}

export interface NodeLoggerOptions {
	/** Service name for all logs */
	service: string;
	/** Log level (default: 'info') */
	level?: LogLevel;
	/** Environment name */
	environment?: string;
	/** Service version */
	version?: string;
	/** Enable pretty printing (default: based on NODE_ENV) */
	pretty?: boolean;
	/** Additional redaction paths */
	redactPaths?: readonly string[];
	/** Base context to include in all logs */
	base?: Record<string, unknown>;
	/** Custom Pino options */
	pinoOptions?: Partial<PinoOptions>;
}

export interface ComponentLoggerOptions extends BaseLogContext {
	/** Override the root level for this component */
	level?: LogLevel;
}

export type Logger = PinoLogger;
