// CHANGE: Functional Core domain models (pure, immutable)
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit code for the checker process.
 *
 * @remarks
 * - 0: outputs match
 * - 1: outputs diverge
 * - 2: the check could not run (usage, file or config error)
 * - @invariant exitCode ∈ {0, 1, 2}
 */
export type ExitCode = 0 | 1 | 2;

export type OutputFormat = "text" | "json";

/**
 * Resolved options for one checker run.
 *
 * @property studentPath Path of the student output; "-" reads standard input
 * @property modelPath Path of the model output
 * @property configPath Explicit config file; when absent the default file is optional
 */
export interface CheckerOptions {
	readonly studentPath: string;
	readonly modelPath: string;
	readonly format: OutputFormat;
	readonly name: string;
	readonly points: ReadonlyArray<string>;
	readonly configPath?: string;
}
