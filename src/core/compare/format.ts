// CHANGE: Presentation of comparison outcomes, separate from comparison itself
// PURITY: CORE
// INVARIANT: describeDivergence(d).length > 0 for every divergence
// INVARIANT: Wording of the three messages is fixed; consumers parse it
// COMPLEXITY: O(1)

import { Option } from "effect";
import { match } from "ts-pattern";

import {
	type ComparisonOutcome,
	type Divergence,
	isDivergence,
} from "./outcome.js";

/**
 * Machine-readable form of an outcome.
 *
 * @property kind Outcome tag
 * @property message Default human-readable message; empty for a match
 */
export interface Diagnostic {
	readonly kind: ComparisonOutcome["_tag"];
	readonly column?: number;
	readonly line?: number;
	readonly student?: string;
	readonly expected?: string;
	readonly message: string;
}

/**
 * Default message for a divergence.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * describeDivergence(compareOutput("hello", "hello\n") as Divergence);
 * // "output correct until position: 6, line: 1, but shorter than expected. Next character should be '\n'"
 * ```
 */
export function describeDivergence(divergence: Divergence): string {
	return match(divergence)
		.with(
			{ _tag: "TooLong" },
			(d) =>
				`your output is longer than expected: character: '${d.student}', position: ${d.column}, line: ${d.line}`,
		)
		.with(
			{ _tag: "ContentMismatch" },
			(d) =>
				`position: ${d.column}, line: ${d.line}, your output: '${d.student}' , expected: '${d.expected}'`,
		)
		.with(
			{ _tag: "TooShort" },
			(d) =>
				`output correct until position: ${d.column}, line: ${d.line}, but shorter than expected. Next character should be '${d.expected}'`,
		)
		.exhaustive();
}

/**
 * Message for any outcome; `None` for a match.
 *
 * @pure true
 */
export const formatOutcome = (outcome: ComparisonOutcome): Option.Option<string> =>
	isDivergence(outcome)
		? Option.some(describeDivergence(outcome))
		: Option.none();

/**
 * Structured diagnostic; optional fields are omitted when the outcome
 * does not carry them.
 *
 * @pure true
 * @invariant kind = "Match" ↔ message = ""
 */
export function toDiagnostic(outcome: ComparisonOutcome): Diagnostic {
	return match(outcome)
		.with({ _tag: "Match" }, (): Diagnostic => ({ kind: "Match", message: "" }))
		.with(
			{ _tag: "TooLong" },
			(d): Diagnostic => ({
				kind: d._tag,
				column: d.column,
				line: d.line,
				student: d.student,
				message: describeDivergence(d),
			}),
		)
		.with(
			{ _tag: "ContentMismatch" },
			(d): Diagnostic => ({
				kind: d._tag,
				column: d.column,
				line: d.line,
				student: d.student,
				expected: d.expected,
				message: describeDivergence(d),
			}),
		)
		.with(
			{ _tag: "TooShort" },
			(d): Diagnostic => ({
				kind: d._tag,
				column: d.column,
				line: d.line,
				expected: d.expected,
				message: describeDivergence(d),
			}),
		)
		.exhaustive();
}
