// CHANGE: Map comparison outcomes onto exercise test results
// PURITY: CORE
// INVARIANT: successful ↔ outcome is Match
// INVARIANT: points ≠ [] → successful
// INVARIANT: name and message are ASCII-only after sanitization
// COMPLEXITY: O(n) where n = |tests| (plus sanitization of text fields)

import { Option, pipe } from "effect";

import { compareOutput } from "../compare/comparator.js";
import { formatOutcome } from "../compare/format.js";
import { type ComparisonOutcome, isMatch } from "../compare/outcome.js";
import { type ByteSource, sanitizeText } from "../sanitize/render.js";

/**
 * Result of a single output check as consumed by an exercise harness.
 */
export interface TestResult {
	readonly name: string;
	readonly successful: boolean;
	/** Points awarded; empty unless the test passed. */
	readonly points: ReadonlyArray<string>;
	readonly message: string;
	readonly exception: ReadonlyArray<string>;
}

export type RunStatus = "PASSED" | "TESTS_FAILED";

/**
 * Aggregated result of a run.
 *
 * @property logs Free-form logs keyed by log kind
 */
export interface RunResult {
	readonly status: RunStatus;
	readonly testResults: ReadonlyArray<TestResult>;
	readonly logs: Readonly<Record<string, string>>;
}

/**
 * Identity of a check inside an exercise.
 */
export interface CheckSpec {
	readonly name: string;
	readonly points: ReadonlyArray<string>;
}

/**
 * @pure true
 */
export function toTestResult(
	spec: CheckSpec,
	outcome: ComparisonOutcome,
): TestResult {
	const successful = isMatch(outcome);
	const message = pipe(
		formatOutcome(outcome),
		Option.map(sanitizeText),
		Option.getOrElse(() => ""),
	);
	return {
		name: sanitizeText(spec.name),
		successful,
		points: successful ? [...spec.points] : [],
		message,
		exception: [],
	};
}

/**
 * Compares and maps in one step.
 *
 * @pure true
 *
 * @example
 * ```ts
 * checkOutput({ name: "prints greeting", points: ["1.1"] }, "hi\n", "hi\n");
 * // { name: "prints greeting", successful: true, points: ["1.1"], message: "", exception: [] }
 * ```
 */
export const checkOutput = (
	spec: CheckSpec,
	student: ByteSource,
	model: ByteSource,
): TestResult => toTestResult(spec, compareOutput(student, model));

/**
 * @pure true
 * @invariant status = "PASSED" ↔ ∀t ∈ testResults: t.successful
 */
export function toRunResult(
	testResults: ReadonlyArray<TestResult>,
	logs: Readonly<Record<string, string>> = {},
): RunResult {
	const status: RunStatus = testResults.every((t) => t.successful)
		? "PASSED"
		: "TESTS_FAILED";
	return { status, testResults, logs };
}
