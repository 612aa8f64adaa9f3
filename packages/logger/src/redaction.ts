/**
 * Pino Redaction Configuration
 *
 * Paths to redact from logs. Model hyperparameters and reports are logged
 * verbatim, so credentials carried by models or data loaders are censored.
 */

export const DEFAULT_REDACT_PATHS = [
	// Credentials attached to models or remote evaluators
	"*.apiKey",
	"*.api_key",
	"*.password",
	"*.secret",
	"*.token",
	"*.accessToken",

	// Whole credential objects
	"credentials.*",
	"secrets.*",
] as const;

export type RedactPath = (typeof DEFAULT_REDACT_PATHS)[number];

/**
 * Merge custom redaction paths with defaults
 */
export function mergeRedactPaths(customPaths?: readonly string[]): readonly string[] {
	if (!customPaths?.length) {
		return DEFAULT_REDACT_PATHS;
	}
	// Combine default and custom paths, removing duplicates
	const combined = new Set<string>([...DEFAULT_REDACT_PATHS, ...customPaths]);
	return Array.from(combined);
}
