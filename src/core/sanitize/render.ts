// CHANGE: Byte-level rendering and sanitization for diagnostics
// PURITY: CORE
// INVARIANT: ∀b ∈ [0, 255]: |renderByte(b)| ≤ RENDERED_BYTE_MAX_LENGTH
// INVARIANT: output of renderByte / sanitizeText contains only ASCII code units
// COMPLEXITY: O(1) per byte, O(n) per text

/**
 * Line feed byte (0x0A).
 */
export const NEWLINE_BYTE = 0x0a;

/**
 * Mask of the bit that separates ASCII (0x00-0x7F) from non-ASCII bytes.
 */
export const HIGH_BIT_MASK = 0x80;

/**
 * Rendering of a newline byte: backslash followed by `n`.
 */
export const NEWLINE_RENDERING = "\\n";

/**
 * Rendering of every byte with the high bit set.
 */
export const INVALID_RENDERING = "(invalid)";

/**
 * Replacement used by {@link sanitizeText} and {@link sanitizeBytes}.
 */
export const SANITIZED_REPLACEMENT = "?";

/**
 * Upper bound for one rendered byte: a 16-byte buffer minus its terminator.
 */
export const RENDERED_BYTE_MAX_LENGTH = 15;

const REPLACEMENT_BYTE = SANITIZED_REPLACEMENT.charCodeAt(0);

const encoder = new TextEncoder();

/**
 * Input accepted wherever raw output is compared or sanitized.
 * Strings are taken as their UTF-8 encoding.
 */
export type ByteSource = string | Uint8Array;

/**
 * Normalizes a {@link ByteSource} to bytes.
 *
 * @pure true
 * @invariant typeof source === "string" → result = utf8(source)
 * @complexity O(n)
 */
export function toBytes(source: ByteSource): Uint8Array {
	return typeof source === "string" ? encoder.encode(source) : source;
}

/**
 * Checks whether a byte has the high bit set.
 *
 * @pure true
 * @complexity O(1)
 */
export function isNonAsciiByte(byte: number): boolean {
	return (byte & HIGH_BIT_MASK) !== 0;
}

/**
 * Renders one raw byte for a single-line diagnostic.
 *
 * Values outside 0..255 are reduced to their low byte first, so the
 * function is total over `number`.
 *
 * @pure true
 * @invariant renderByte(0x0A) = "\\n"
 * @invariant b ≥ 0x80 → renderByte(b) = "(invalid)"
 * @invariant otherwise renderByte(b) = String.fromCharCode(b)
 * @invariant |renderByte(b)| ≤ RENDERED_BYTE_MAX_LENGTH
 * @complexity O(1)
 *
 * @example
 * ```ts
 * renderByte(0x41); // "A"
 * renderByte(0x0a); // "\\n"
 * renderByte(0xff); // "(invalid)"
 * ```
 */
export function renderByte(byte: number): string {
	const value = byte & 0xff;
	if (value === NEWLINE_BYTE) return NEWLINE_RENDERING;
	if (isNonAsciiByte(value)) return INVALID_RENDERING;
	return String.fromCharCode(value);
}

/**
 * Returns a copy of `bytes` with every high-bit byte replaced by `?`.
 *
 * @pure true
 * @invariant result.length = bytes.length
 * @complexity O(n)
 */
export function sanitizeBytes(bytes: Uint8Array): Uint8Array {
	return bytes.map((byte) => (isNonAsciiByte(byte) ? REPLACEMENT_BYTE : byte));
}

/**
 * Replaces every non-ASCII byte of the UTF-8 encoding of `text` with `?`.
 * A character encoded as k bytes becomes k question marks.
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * sanitizeText("naïve"); // "na??ve"
 * ```
 */
export function sanitizeText(text: string): string {
	let result = "";
	for (const byte of sanitizeBytes(toBytes(text))) {
		result += String.fromCharCode(byte);
	}
	return result;
}
