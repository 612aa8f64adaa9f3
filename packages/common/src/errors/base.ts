/**
 * Base error class for the tuneforge packages.
 *
 * All domain-specific errors should extend this class.
 *
 * @module @tuneforge/common/errors/base
 */

/**
 * Base error class for all tuneforge errors.
 *
 * Provides structured error handling with:
 * - Error codes for programmatic handling
 * - Cause chaining for root cause analysis
 * - Consistent serialization for logging
 *
 * @example
 * ```ts
 * throw new TuneforgeError("Search failed", "SEARCH_FAILED", originalError);
 * ```
 */
export class TuneforgeError extends Error {
	/**
	 * Error code for programmatic error handling.
	 * Use SCREAMING_SNAKE_CASE (e.g., "EVALUATION_FAILED").
	 */
	public readonly code: string;

	/**
	 * Timestamp when the error was created.
	 */
	public readonly timestamp: number;

	constructor(message: string, code: string, cause?: Error) {
		super(message, cause ? { cause } : undefined);
		this.name = "TuneforgeError";
		this.code = code;
		this.timestamp = Date.now();

		// Maintains proper stack trace for where error was thrown
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, this.constructor);
		}
	}

	/**
	 * Convert error to a plain object for logging/serialization.
	 * Stack traces are excluded.
	 */
	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			timestamp: this.timestamp,
			cause:
				this.cause instanceof Error
					? {
							name: this.cause.name,
							message: this.cause.message,
						}
					: undefined,
		};
	}

	/**
	 * Create a formatted string representation for logging.
	 */
	toLogString(): string {
		const parts = [`[${this.code}] ${this.message}`];

		if (this.cause instanceof Error) {
			parts.push(`  Caused by: ${this.cause.message}`);
		}

		return parts.join("\n");
	}
}
