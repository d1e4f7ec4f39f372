// CHANGE: main.ts as a thin APP delegator
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without side effects beyond console output
// COMPLEXITY: O(1)

import { Effect } from "effect";

import { runChecker } from "./app/runChecker.js";
import type { ExitCode } from "./core/models.js";
import { FAILURE_EXIT_CODE } from "./core/decision.js";
import { parseCLIArgs } from "./shell/config/index.js";
import { printAppError } from "./shell/output/index.js";

/**
 * Program for the given arguments: usage errors are reported and mapped
 * to exit code 2, like every other application error.
 *
 * @effect Effect<ExitCode, never>
 */
export const mainEffect = (
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<ExitCode> =>
	parseCLIArgs(args).pipe(
		Effect.flatMap((cliArgs) => runChecker(cliArgs)),
		Effect.catchAll((error) =>
			printAppError(error).pipe(Effect.as(FAILURE_EXIT_CODE)),
		),
	);

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @returns ExitCode (0 | 1 | 2)
 */
export function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(mainEffect(args));
}
