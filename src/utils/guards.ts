/**
 * Runtime type guards for parsing untyped input
 */

/**
 * Check that a value is a plain (non-array) object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}
