// CHANGE: Structured comparison outcome as an Effect tagged enum
// PURITY: CORE
// INVARIANT: Outcomes are immutable values compared structurally, discriminated by `_tag`
// INVARIANT: column ≥ 1 ∧ line ≥ 1 for every divergence
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Result of comparing student output with model output.
 *
 * - `Match`: byte-for-byte identical over the full length
 * - `TooLong`: model exhausted while student still has bytes
 * - `ContentMismatch`: first position where the raw bytes differ
 * - `TooShort`: student exhausted while model still has bytes
 *
 * `student` and `expected` hold the rendered characters; the raw bytes are
 * kept next to them for consumers that need the exact value.
 */
export type ComparisonOutcome = Data.TaggedEnum<{
	Match: {};
	TooLong: {
		readonly column: number;
		readonly line: number;
		readonly studentByte: number;
		readonly student: string;
	};
	ContentMismatch: {
		readonly column: number;
		readonly line: number;
		readonly studentByte: number;
		readonly modelByte: number;
		readonly student: string;
		readonly expected: string;
	};
	TooShort: {
		readonly column: number;
		readonly line: number;
		readonly modelByte: number;
		readonly expected: string;
	};
}>;

export const ComparisonOutcome = Data.taggedEnum<ComparisonOutcome>();

export type Match = Data.TaggedEnum.Value<ComparisonOutcome, "Match">;

/**
 * Every outcome that carries a diagnostic.
 */
export type Divergence = Exclude<ComparisonOutcome, Match>;

export type DivergenceKind = Divergence["_tag"];

/**
 * @pure true
 * @complexity O(1)
 */
export const isMatch = (outcome: ComparisonOutcome): outcome is Match =>
	outcome._tag === "Match";

/**
 * @pure true
 * @complexity O(1)
 */
export const isDivergence = (
	outcome: ComparisonOutcome,
): outcome is Divergence => outcome._tag !== "Match";
