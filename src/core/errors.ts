// CHANGE: Typed error ADT for the checker using Effect.Data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// INVARIANT: A divergence between outputs is an outcome, never an error
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Command line could not be interpreted.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class UsageError extends Data.TaggedError("Usage")<{
	readonly detail: string;
}> {}

/**
 * Filesystem operation error
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 * @complexity O(1)
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Configuration file is not valid JSON or has a field of the wrong type.
 *
 * @pure true (Data class)
 * @invariant path.length > 0 ∧ detail.length > 0
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = UsageError | FSError | ConfigError;

/**
 * One-line description of an application error.
 *
 * @pure true
 */
export function describeAppError(error: AppError): string {
	if (error._tag === "Usage") return `usage error: ${error.detail}`;
	if (error._tag === "Config") {
		return `invalid config ${error.path}: ${error.detail}`;
	}
	return error.path === undefined
		? `file error: ${error.detail}`
		: `file error: ${error.path}: ${error.detail}`;
}

/**
 * Message of a rejected promise or thrown value.
 *
 * @pure true
 */
export const causeMessage = <E>(cause: E): string =>
	cause instanceof Error ? cause.message : String(cause);
