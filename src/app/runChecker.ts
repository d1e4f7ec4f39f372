// CHANGE: Application layer orchestration (APP) separated from SHELL and CORE
// PURITY: APP (no process.exit; composes SHELL effects around the pure comparator)
// EFFECT: Effect<ExitCode, AppError>
// INVARIANT: Returns ExitCode as value; no termination side effects
// COMPLEXITY: O(n + m) where n = |student|, m = |model|

import * as path from "node:path";
import type { Readable } from "node:stream";

import { Effect } from "effect";

import { compareOutput } from "../core/compare/comparator.js";
import { computeExitCode, FAILURE_EXIT_CODE } from "../core/decision.js";
import { type AppError, UsageError } from "../core/errors.js";
import { buildReport } from "../core/format/report.js";
import type { CheckerOptions, ExitCode } from "../core/models.js";
import {
	type CLIArgs,
	loadCheckerConfig,
	resolveOptions,
} from "../shell/config/index.js";
import {
	readOutput,
	STDIN_MODEL_REJECTED,
	STDIN_PATH,
} from "../shell/io/read.js";
import { printAppError, printReport } from "../shell/output/index.js";

/**
 * Collaborators that tests replace.
 *
 * @property cwd Base for relative paths and for the default config file
 * @property stdin Stream read for a student path of "-"
 */
export interface CheckerEnvironment {
	readonly cwd: string;
	readonly stdin: Readable;
}

const defaultEnvironment = (): CheckerEnvironment => ({
	cwd: process.cwd(),
	stdin: process.stdin,
});

const locate = (env: CheckerEnvironment, filePath: string): string =>
	filePath === STDIN_PATH ? filePath : path.resolve(env.cwd, filePath);

/**
 * Reads both outputs, compares them and prints the report.
 *
 * @effect Effect<ExitCode, AppError>
 * @invariant result ∈ {0, 1}; failures stay in the error channel
 * @invariant modelPath = "-" → UsageError before anything is read
 */
export function checkEffect(
	options: CheckerOptions,
	env: CheckerEnvironment = defaultEnvironment(),
): Effect.Effect<ExitCode, AppError> {
	return Effect.gen(function* () {
		if (options.modelPath === STDIN_PATH) {
			return yield* Effect.fail(new UsageError({ detail: STDIN_MODEL_REJECTED }));
		}
		const [student, model] = yield* Effect.all([
			readOutput(locate(env, options.studentPath), env.stdin),
			readOutput(locate(env, options.modelPath), env.stdin),
		]);
		const outcome = compareOutput(student, model);
		const report = buildReport(
			{ name: options.name, points: options.points },
			outcome,
		);
		yield* printReport(report, options.format);
		return computeExitCode(outcome);
	});
}

/**
 * Full run from parsed command line: config, inputs, comparison, output.
 * Application errors are printed and mapped to exit code 2.
 *
 * @effect Effect<ExitCode, never>
 */
export function runChecker(
	args: CLIArgs,
	env: CheckerEnvironment = defaultEnvironment(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const file = yield* loadCheckerConfig(args.configPath, env.cwd);
		return yield* checkEffect(resolveOptions(args, file), env);
	}).pipe(
		Effect.catchAll((error) =>
			printAppError(error).pipe(Effect.as(FAILURE_EXIT_CODE)),
		),
	);
}
