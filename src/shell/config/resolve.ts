// CHANGE: Merge command line flags over config file values over defaults
// PURITY: CORE-compatible (no IO), lives beside the loaders it combines
// INVARIANT: flag > file > default for every option
// COMPLEXITY: O(1)

import type { CheckerOptions } from "../../core/models.js";
import type { CLIArgs } from "./cli.js";
import type { FileConfig } from "./loader.js";

export const DEFAULT_OPTIONS = {
	format: "text",
	name: "output",
	points: [],
} as const satisfies Pick<CheckerOptions, "format" | "name" | "points">;

/**
 * @pure true
 *
 * @example
 * ```ts
 * resolveOptions({ studentPath: "a", modelPath: "b" }, { format: "json" });
 * // { studentPath: "a", modelPath: "b", format: "json", name: "output", points: [] }
 * ```
 */
export function resolveOptions(
	cli: CLIArgs,
	file: FileConfig,
): CheckerOptions {
	const base: CheckerOptions = {
		studentPath: cli.studentPath,
		modelPath: cli.modelPath,
		format: cli.format ?? file.format ?? DEFAULT_OPTIONS.format,
		name: cli.name ?? file.name ?? DEFAULT_OPTIONS.name,
		points: cli.points ?? file.points ?? DEFAULT_OPTIONS.points,
	};
	// exactOptionalPropertyTypes: absence models "no --config"
	return cli.configPath === undefined
		? base
		: { ...base, configPath: cli.configPath };
}
