// CHANGE: Pure decision function mapping a comparison outcome to an exit code
// PURITY: CORE
// FORMAT THEOREM: ∀o ∈ Outcome: computeExitCode(o) = 0 ↔ o = Match
// INVARIANT: No side effects, deterministic mapping Outcome → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";

import { type ComparisonOutcome, isMatch } from "./compare/outcome.js";
import type { ExitCode } from "./models.js";

/**
 * Computes process exit code from a comparison outcome (pure function).
 *
 * @returns 0 for a match, 1 for any divergence
 *
 * @pure true
 * @invariant exitCode ∈ {0,1}
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode(compareOutput("a", "a")); // 0
 * computeExitCode(compareOutput("a", "b")); // 1
 * ```
 */
export const computeExitCode = (outcome: ComparisonOutcome): 0 | 1 =>
	isMatch(outcome) ? 0 : 1;

/**
 * Exit code for a run that could not compare anything.
 */
export const FAILURE_EXIT_CODE: ExitCode = 2;

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	outcome: ComparisonOutcome,
): Effect.Effect<ExitCode> => pipe(outcome, computeExitCode, Effect.succeed);
