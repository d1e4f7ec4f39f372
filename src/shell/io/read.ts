// CHANGE: Read raw outputs as bytes, never decoded
// PURITY: SHELL (filesystem / stdin)
// EFFECT: Effect<Uint8Array, FSError>
// INVARIANT: Bytes are returned unchanged; no newline or encoding normalization
// COMPLEXITY: O(n) where n = |file|

import * as fs from "node:fs";
import type { Readable } from "node:stream";
import { buffer } from "node:stream/consumers";

import { Effect } from "effect";

import { causeMessage, FSError } from "../../core/errors.js";

/**
 * Path that selects standard input.
 */
export const STDIN_PATH = "-";

/**
 * Usage detail for a model path of {@link STDIN_PATH}; one stream cannot feed both outputs.
 */
export const STDIN_MODEL_REJECTED = "only <student> may be read from stdin";

/**
 * Reads a whole stream into memory.
 *
 * @effect Effect<Uint8Array, FSError>
 */
export const readStream = (
	stream: Readable,
	label = "<stdin>",
): Effect.Effect<Uint8Array, FSError> =>
	Effect.tryPromise({
		try: () => buffer(stream),
		catch: (error) => new FSError({ detail: causeMessage(error), path: label }),
	});

/**
 * Reads one output file, or standard input for {@link STDIN_PATH}.
 *
 * @param stdin Stream used for "-"
 */
export function readOutput(
	filePath: string,
	stdin: Readable = process.stdin,
): Effect.Effect<Uint8Array, FSError> {
	if (filePath === STDIN_PATH) return readStream(stdin);
	return Effect.tryPromise({
		try: () => fs.promises.readFile(filePath),
		catch: (error) =>
			new FSError({ detail: causeMessage(error), path: filePath }),
	});
}
