// CHANGE: Lockstep comparison of student output against model output
// PURITY: CORE
// FORMAT THEOREM: compareOutput(s, m) = Match ↔ bytes(s) = bytes(m)
// INVARIANT: Reported column/line are computed from the student's newlines only
// INVARIANT: Exhausted model is reported as TooLong before any equality check at that index
// COMPLEXITY: O(k) where k = length of the common prefix

import { Effect } from "effect";

import {
	type ByteSource,
	NEWLINE_BYTE,
	renderByte,
	toBytes,
} from "../sanitize/render.js";
import { ComparisonOutcome } from "./outcome.js";

/**
 * Compares two outputs and describes the first point of divergence.
 *
 * @param student - Output produced by the program under test
 * @param model - Reference output
 *
 * @pure true
 * @precondition none; any byte values are accepted
 * @postcondition result is Match iff both byte sequences are identical
 * @complexity O(k) time, O(1) extra space (plus UTF-8 encoding of string inputs)
 *
 * @example
 * ```ts
 * compareOutput("hello!", "hello");
 * // TooLong { column: 6, line: 1, studentByte: 0x21, student: "!" }
 * ```
 */
export function compareOutput(
	student: ByteSource,
	model: ByteSource,
): ComparisonOutcome {
	const own = toBytes(student);
	const reference = toBytes(model);
	let column = 1;
	let line = 1;
	let index = 0;
	// `undefined` is the end marker of either sequence
	let studentByte = own[index];

	while (studentByte !== undefined) {
		const modelByte = reference[index];
		if (modelByte === undefined) {
			return ComparisonOutcome.TooLong({
				column,
				line,
				studentByte,
				student: renderByte(studentByte),
			});
		}
		if (studentByte !== modelByte) {
			return ComparisonOutcome.ContentMismatch({
				column,
				line,
				studentByte,
				modelByte,
				student: renderByte(studentByte),
				expected: renderByte(modelByte),
			});
		}
		if (studentByte === NEWLINE_BYTE) {
			line += 1;
			column = 0;
		}
		index += 1;
		column += 1;
		studentByte = own[index];
	}

	const nextModelByte = reference[index];
	if (nextModelByte !== undefined) {
		return ComparisonOutcome.TooShort({
			column,
			line,
			modelByte: nextModelByte,
			expected: renderByte(nextModelByte),
		});
	}
	return ComparisonOutcome.Match();
}

/**
 * {@link compareOutput} lifted into Effect for composition in the shell.
 *
 * @effect Effect<ComparisonOutcome, never, never>
 */
export const compareOutputEffect = (
	student: ByteSource,
	model: ByteSource,
): Effect.Effect<ComparisonOutcome> =>
	Effect.sync(() => compareOutput(student, model));
