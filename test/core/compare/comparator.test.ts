// CHANGE: Deterministic and property-based specs for the lockstep comparator
// FORMAT THEOREM: compareOutput(s, m) = Match ↔ s = m
// INVARIANT: Reported column/line = position reached by scanning the student prefix
// COMPLEXITY: O(n) per assertion

import { Effect, Equal } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	compareOutput,
	compareOutputEffect,
} from "../../../src/core/compare/comparator.js";
import { ComparisonOutcome } from "../../../src/core/compare/outcome.js";

const bytes = (...values: number[]): Uint8Array => Uint8Array.of(...values);

const concat = (...parts: Uint8Array[]): Uint8Array =>
	Uint8Array.from(parts.flatMap((part) => Array.from(part)));

/**
 * Column and line reached after consuming `prefix`.
 */
const positionAfter = (
	prefix: Uint8Array,
): { readonly column: number; readonly line: number } => {
	let column = 1;
	let line = 1;
	for (const byte of prefix) {
		if (byte === 0x0a) {
			line += 1;
			column = 1;
		} else {
			column += 1;
		}
	}
	return { column, line };
};

describe("compareOutput: concrete scenarios", () => {
	it("matches identical output", () => {
		expect(compareOutput("hello\n", "hello\n")).toEqual(
			ComparisonOutcome.Match(),
		);
	});

	it("reports a missing trailing newline as too short", () => {
		expect(compareOutput("hello", "hello\n")).toEqual(
			ComparisonOutcome.TooShort({
				column: 6,
				line: 1,
				modelByte: 0x0a,
				expected: "\\n",
			}),
		);
	});

	it("reports extra output as too long", () => {
		expect(compareOutput("hello!", "hello")).toEqual(
			ComparisonOutcome.TooLong({
				column: 6,
				line: 1,
				studentByte: 0x21,
				student: "!",
			}),
		);
	});

	it("counts lines from student newlines", () => {
		expect(compareOutput("a\nb", "a\nc")).toEqual(
			ComparisonOutcome.ContentMismatch({
				column: 1,
				line: 2,
				studentByte: 0x62,
				modelByte: 0x63,
				student: "b",
				expected: "c",
			}),
		);
	});

	it("renders a non-ASCII student byte as invalid", () => {
		expect(compareOutput(bytes(0xff), bytes(0x41))).toEqual(
			ComparisonOutcome.ContentMismatch({
				column: 1,
				line: 1,
				studentByte: 0xff,
				modelByte: 0x41,
				student: "(invalid)",
				expected: "A",
			}),
		);
	});

	it("compares strings through their UTF-8 bytes", () => {
		expect(compareOutput("ä", "a")).toEqual(
			ComparisonOutcome.ContentMismatch({
				column: 1,
				line: 1,
				studentByte: 0xc3,
				modelByte: 0x61,
				student: "(invalid)",
				expected: "a",
			}),
		);
	});

	it("yields structurally equal outcomes for equal inputs", () => {
		expect(
			Equal.equals(compareOutput("ab", "ac"), compareOutput("xb", "xc")),
		).toBe(true);
	});
});

describe("compareOutput: boundaries", () => {
	it("matches two empty outputs", () => {
		expect(compareOutput("", "")).toEqual(ComparisonOutcome.Match());
	});

	it("reports any output against an empty model as too long", () => {
		expect(compareOutput("x", "")).toEqual(
			ComparisonOutcome.TooLong({
				column: 1,
				line: 1,
				studentByte: 0x78,
				student: "x",
			}),
		);
	});

	it("reports empty output against a non-empty model as too short", () => {
		expect(compareOutput("", "a")).toEqual(
			ComparisonOutcome.TooShort({
				column: 1,
				line: 1,
				modelByte: 0x61,
				expected: "a",
			}),
		);
	});

	it("reports extra output at the start of a new line", () => {
		expect(compareOutput("a\nb", "a\n")).toEqual(
			ComparisonOutcome.TooLong({
				column: 1,
				line: 2,
				studentByte: 0x62,
				student: "b",
			}),
		);
	});

	it("reports missing output at the start of a new line", () => {
		expect(compareOutput("a\n", "a\nb")).toEqual(
			ComparisonOutcome.TooShort({
				column: 1,
				line: 2,
				modelByte: 0x62,
				expected: "b",
			}),
		);
	});

	it("renders a student newline where the model continues the line", () => {
		expect(compareOutput("a\n", "ab")).toEqual(
			ComparisonOutcome.ContentMismatch({
				column: 2,
				line: 1,
				studentByte: 0x0a,
				modelByte: 0x62,
				student: "\\n",
				expected: "b",
			}),
		);
	});

	it("tracks column and line across several lines", () => {
		expect(compareOutput("x\ny\nzA", "x\ny\nzB")).toMatchObject({
			_tag: "ContentMismatch",
			column: 2,
			line: 3,
		});
	});

	it("treats NUL as an ordinary byte", () => {
		expect(
			compareOutput(bytes(0x61, 0x00, 0x62), bytes(0x61, 0x00, 0x63)),
		).toMatchObject({ _tag: "ContentMismatch", column: 3, line: 1 });
	});
});

describe("compareOutput: properties", () => {
	const byteArray = fc.uint8Array({ maxLength: 40 });
	const lineHeavyArray = fc
		.array(fc.constantFrom(0x0a, 0x41, 0x62, 0xff, 0x00), { maxLength: 40 })
		.map((values) => Uint8Array.from(values));
	const nonEmpty = fc.uint8Array({ minLength: 1, maxLength: 10 });

	it("is reflexive for byte arrays and strings", () => {
		fc.assert(
			fc.property(byteArray, (value) => {
				expect(compareOutput(value, value)).toEqual(ComparisonOutcome.Match());
			}),
		);
		fc.assert(
			fc.property(fc.fullUnicodeString(), (value) => {
				expect(compareOutput(value, value)).toEqual(ComparisonOutcome.Match());
			}),
		);
	});

	it("reports a strict extension of the model as too long at the first extra byte", () => {
		fc.assert(
			fc.property(fc.oneof(byteArray, lineHeavyArray), nonEmpty, (model, extra) => {
				const outcome = compareOutput(concat(model, extra), model);
				expect(outcome).toMatchObject({
					_tag: "TooLong",
					studentByte: extra[0],
					...positionAfter(model),
				});
			}),
		);
	});

	it("reports a strict prefix of the model as too short naming the next byte", () => {
		fc.assert(
			fc.property(fc.oneof(byteArray, lineHeavyArray), nonEmpty, (student, extra) => {
				const outcome = compareOutput(student, concat(student, extra));
				expect(outcome).toMatchObject({
					_tag: "TooShort",
					modelByte: extra[0],
					...positionAfter(student),
				});
			}),
		);
	});

	it("reports the first differing byte at the position of the shared prefix", () => {
		const differingPair = fc
			.tuple(fc.integer({ min: 0, max: 255 }), fc.integer({ min: 1, max: 255 }))
			.map(([a, delta]) => [a, (a + delta) % 256] as const);
		fc.assert(
			fc.property(
				lineHeavyArray,
				differingPair,
				byteArray,
				byteArray,
				(prefix, [own, expected], studentTail, modelTail) => {
					const outcome = compareOutput(
						concat(prefix, bytes(own), studentTail),
						concat(prefix, bytes(expected), modelTail),
					);
					expect(outcome).toMatchObject({
						_tag: "ContentMismatch",
						studentByte: own,
						modelByte: expected,
						...positionAfter(prefix),
					});
				},
			),
		);
	});
});

describe("compareOutputEffect", () => {
	it("succeeds with the same outcome as the pure function", () => {
		expect(Effect.runSync(compareOutputEffect("ab", "ab"))).toEqual(
			ComparisonOutcome.Match(),
		);
	});
});
