// CHANGE: Load checker defaults from output-checker.config.json
// PURITY: SHELL (filesystem read)
// EFFECT: Effect<FileConfig, FSError | ConfigError>
// INVARIANT: Missing default file → {} ; explicit file must exist and be valid
// COMPLEXITY: O(n) where n = |file|

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { causeMessage, ConfigError, FSError } from "../../core/errors.js";
import type { OutputFormat } from "../../core/models.js";

export const DEFAULT_CONFIG_FILE = "output-checker.config.json";

/**
 * Values a config file may set. Every field is optional.
 */
export interface FileConfig {
	readonly format?: OutputFormat;
	readonly name?: string;
	readonly points?: ReadonlyArray<string>;
}

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isArray(value: JSONValue): value is ReadonlyArray<JSONValue> {
	return Array.isArray(value);
}

const isOutputFormat = (value: JSONValue): value is OutputFormat =>
	value === "text" || value === "json";

/**
 * Validates a parsed config document.
 *
 * @returns the config, or a description of the first invalid field
 *
 * @pure true
 * @invariant result is FileConfig ↔ every present field has the documented type
 */
export function validateConfig(value: JSONValue): FileConfig | string {
	if (!isJSONObject(value)) return "expected a JSON object";

	let config: FileConfig = {};
	const { format, name, points } = value;

	if (format !== undefined) {
		if (!isOutputFormat(format)) return "format must be 'text' or 'json'";
		config = { ...config, format };
	}
	if (name !== undefined) {
		if (!isString(name)) return "name must be a string";
		config = { ...config, name };
	}
	if (points !== undefined) {
		const labels = isArray(points) ? points.filter(isString) : [];
		if (!isArray(points) || labels.length !== points.length) {
			return "points must be an array of strings";
		}
		config = { ...config, points: labels };
	}
	return config;
}

const readConfigText = (configPath: string): Effect.Effect<string, FSError> =>
	Effect.tryPromise({
		try: () => fs.promises.readFile(configPath, "utf8"),
		catch: (error) =>
			new FSError({
				detail: causeMessage(error),
				path: configPath,
			}),
	});

const parseConfigText = (
	configPath: string,
	raw: string,
): Effect.Effect<FileConfig, ConfigError> =>
	Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: causeMessage(error),
			}),
	}).pipe(
		Effect.flatMap((parsed): Effect.Effect<FileConfig, ConfigError> => {
			const validated = validateConfig(parsed);
			return typeof validated === "string"
				? Effect.fail(new ConfigError({ path: configPath, detail: validated }))
				: Effect.succeed(validated);
		}),
	);

/**
 * Loads the checker config file.
 *
 * @param explicitPath Path given with `--config`; the file must then exist
 * @param cwd Directory searched for {@link DEFAULT_CONFIG_FILE}
 *
 * @example
 * ```json
 * { "format": "json", "name": "prints the table", "points": ["2.1"] }
 * ```
 */
export function loadCheckerConfig(
	explicitPath?: string,
	cwd: string = process.cwd(),
): Effect.Effect<FileConfig, FSError | ConfigError> {
	if (explicitPath !== undefined) {
		const resolved = path.resolve(cwd, explicitPath);
		return readConfigText(resolved).pipe(
			Effect.flatMap((raw) => parseConfigText(resolved, raw)),
		);
	}
	const defaultPath = path.resolve(cwd, DEFAULT_CONFIG_FILE);
	// existence is checked when the effect runs, not when it is built
	return Effect.suspend(
		(): Effect.Effect<FileConfig, FSError | ConfigError> =>
			fs.existsSync(defaultPath)
				? readConfigText(defaultPath).pipe(
						Effect.flatMap((raw) => parseConfigText(defaultPath, raw)),
					)
				: Effect.succeed({}),
	);
}
