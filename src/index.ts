// CHANGE: Public API entry point for library consumers
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces or APP entry points
// COMPLEXITY: O(1) - module resolution only

// ═══════════════════════════════════════════════════════════════════════════════
// COMPARISON (Pure Core)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Lockstep comparison of student output against model output.
 *
 * @example
 * ```typescript
 * import { compareOutput, formatOutcome } from "output-checker";
 *
 * const outcome = compareOutput("a\nb", "a\nc");
 * // ContentMismatch { column: 1, line: 2, student: "b", expected: "c", ... }
 * formatOutcome(outcome);
 * // Option.some("position: 1, line: 2, your output: 'b' , expected: 'c'")
 * ```
 *
 * @pure true
 */
export {
	compareOutput,
	compareOutputEffect,
} from "./core/compare/comparator.js";
export {
	type Diagnostic,
	describeDivergence,
	formatOutcome,
	toDiagnostic,
} from "./core/compare/format.js";
export {
	ComparisonOutcome,
	type Divergence,
	type DivergenceKind,
	isDivergence,
	isMatch,
	type Match,
} from "./core/compare/outcome.js";

// ═══════════════════════════════════════════════════════════════════════════════
// BYTE RENDERING
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type ByteSource,
	INVALID_RENDERING,
	isNonAsciiByte,
	NEWLINE_RENDERING,
	RENDERED_BYTE_MAX_LENGTH,
	renderByte,
	sanitizeBytes,
	sanitizeText,
	toBytes,
} from "./core/sanitize/render.js";

// ═══════════════════════════════════════════════════════════════════════════════
// HARNESS RESULTS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	type CheckSpec,
	checkOutput,
	type RunResult,
	type RunStatus,
	type TestResult,
	toRunResult,
	toTestResult,
} from "./core/harness/result.js";
export { computeExitCode } from "./core/decision.js";
export type { CheckerOptions, ExitCode, OutputFormat } from "./core/models.js";
export {
	type AppError,
	ConfigError,
	FSError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * @pure false - reads files, prints the report
 * @returns ExitCode (0 = match, 1 = divergence, 2 = could not check)
 */
export { checkEffect, runChecker } from "./app/runChecker.js";
export { main } from "./main.js";
