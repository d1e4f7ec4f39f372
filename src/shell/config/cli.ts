// CHANGE: Command line parsing for the checker
// PURITY: SHELL (reads process.argv when no argument list is given)
// EFFECT: Effect<CLIArgs, UsageError>
// INVARIANT: Exactly two positional arguments: student path, model path
// COMPLEXITY: O(n) where n = |args|

import { Effect } from "effect";

import { UsageError } from "../../core/errors.js";
import type { OutputFormat } from "../../core/models.js";
import { STDIN_MODEL_REJECTED, STDIN_PATH } from "../io/read.js";

/**
 * Options as given on the command line; unset flags stay absent so that
 * config file values can fill them.
 */
export interface CLIArgs {
	readonly studentPath: string;
	readonly modelPath: string;
	readonly format?: OutputFormat;
	readonly name?: string;
	readonly points?: ReadonlyArray<string>;
	readonly configPath?: string;
}

type CLIFlags = Omit<CLIArgs, "studentPath" | "modelPath">;

interface ArgState {
	readonly positionals: ReadonlyArray<string>;
	readonly flags: CLIFlags;
}

interface ArgStep {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

type ValueFlagHandler = (flags: CLIFlags, value: string) => CLIFlags;

export const USAGE =
	"usage: output-checker <student> <model> [--json] [--format text|json] [--name <test>] [--points <a,b>] [--config <path>]";

/**
 * Splits a comma-separated points list, dropping empty entries.
 *
 * @pure true
 */
export function parsePoints(raw: string): ReadonlyArray<string> {
	return raw
		.split(",")
		.map((p) => p.trim())
		.filter((p) => p.length > 0);
}

const isOutputFormat = (value: string): value is OutputFormat =>
	value === "text" || value === "json";

// INVARIANT: only the listed flags resolve to a handler, whatever the argument text
const valueHandlers: ReadonlyMap<string, ValueFlagHandler> = new Map<
	string,
	ValueFlagHandler
>([
	["--name", (flags, value) => ({ ...flags, name: value })],
	["--points", (flags, value) => ({ ...flags, points: parsePoints(value) })],
	["--config", (flags, value) => ({ ...flags, configPath: value })],
]);

const withFlags = (
	state: ArgState,
	flags: CLIFlags,
	skipNext: boolean,
): ArgStep => ({ state: { ...state, flags }, skipNext });

function processArgument(
	state: ArgState,
	arg: string,
	next: string | undefined,
): Effect.Effect<ArgStep, UsageError> {
	if (arg === "--json") {
		return Effect.succeed(
			withFlags(state, { ...state.flags, format: "json" }, false),
		);
	}
	if (arg === "--format") {
		if (next === undefined || !isOutputFormat(next)) {
			return Effect.fail(
				new UsageError({ detail: "--format expects 'text' or 'json'" }),
			);
		}
		return Effect.succeed(
			withFlags(state, { ...state.flags, format: next }, true),
		);
	}
	const handler = valueHandlers.get(arg);
	if (handler !== undefined) {
		if (next === undefined) {
			return Effect.fail(new UsageError({ detail: `${arg} expects a value` }));
		}
		return Effect.succeed(withFlags(state, handler(state.flags, next), true));
	}
	// "-" is a positional (standard input), anything else starting with "-" is not
	if (arg.startsWith("-") && arg !== STDIN_PATH) {
		return Effect.fail(new UsageError({ detail: `unknown option ${arg}` }));
	}
	return Effect.succeed({
		state: { ...state, positionals: [...state.positionals, arg] },
		skipNext: false,
	});
}

/**
 * Parses checker arguments.
 *
 * @param args Arguments without the node executable and script path
 *
 * @example
 * ```ts
 * // Command: output-checker out.txt expected.txt --json --points 1.1,1.2
 * Effect.runSync(parseCLIArgs());
 * // { studentPath: "out.txt", modelPath: "expected.txt", format: "json", points: ["1.1", "1.2"] }
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Effect.Effect<CLIArgs, UsageError> {
	return Effect.gen(function* () {
		let state: ArgState = { positionals: [], flags: {} };
		for (let i = 0; i < args.length; i++) {
			const arg: string = args.at(i) ?? "";
			if (arg.length === 0) continue;
			const result = yield* processArgument(state, arg, args.at(i + 1));
			state = result.state;
			if (result.skipNext) i++;
		}

		const [studentPath, modelPath, ...extra] = state.positionals;
		if (studentPath === undefined || modelPath === undefined) {
			return yield* Effect.fail(
				new UsageError({ detail: `expected <student> and <model>\n${USAGE}` }),
			);
		}
		if (modelPath === STDIN_PATH) {
			return yield* Effect.fail(
				new UsageError({ detail: STDIN_MODEL_REJECTED }),
			);
		}
		if (extra.length > 0) {
			return yield* Effect.fail(
				new UsageError({ detail: `unexpected argument ${extra.join(" ")}` }),
			);
		}

		return { studentPath, modelPath, ...state.flags };
	});
}
