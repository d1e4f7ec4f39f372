// CHANGE: Unit and property tests for byte rendering and sanitization
// INVARIANT: ∀b ∈ [0, 255]: renderByte(b) is ASCII and |renderByte(b)| ≤ 15

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import {
	INVALID_RENDERING,
	isNonAsciiByte,
	RENDERED_BYTE_MAX_LENGTH,
	renderByte,
	sanitizeBytes,
	sanitizeText,
	toBytes,
} from "../../../src/core/sanitize/render.js";

describe("renderByte", () => {
	it("renders newline as backslash followed by n", () => {
		expect(renderByte(0x0a)).toBe("\\n");
		expect(renderByte(0x0a)).toHaveLength(2);
	});

	it("renders printable ASCII verbatim", () => {
		expect(renderByte(0x41)).toBe("A");
		expect(renderByte(0x20)).toBe(" ");
		expect(renderByte(0x7e)).toBe("~");
	});

	it("renders non-printable ASCII verbatim as a single character", () => {
		expect(renderByte(0x00)).toBe("\u0000");
		expect(renderByte(0x09)).toBe("\t");
		expect(renderByte(0x7f)).toBe("\u007f");
	});

	it("renders every high-bit byte as the invalid placeholder", () => {
		expect(renderByte(0x80)).toBe("(invalid)");
		expect(renderByte(0xc3)).toBe("(invalid)");
		expect(renderByte(0xff)).toBe("(invalid)");
	});

	it("reduces values outside the byte range to their low byte", () => {
		expect(renderByte(0x141)).toBe("A");
		expect(renderByte(-1)).toBe(INVALID_RENDERING);
	});

	it("follows the three-way rule over the whole byte domain", () => {
		fc.assert(
			fc.property(fc.integer({ min: 0, max: 255 }), (byte) => {
				const expected =
					byte === 0x0a
						? "\\n"
						: byte >= 0x80
							? "(invalid)"
							: String.fromCharCode(byte);
				expect(renderByte(byte)).toBe(expected);
			}),
		);
	});

	it("never exceeds the rendering bound", () => {
		for (let byte = 0; byte <= 0xff; byte += 1) {
			expect(renderByte(byte).length).toBeLessThanOrEqual(
				RENDERED_BYTE_MAX_LENGTH,
			);
		}
	});
});

describe("isNonAsciiByte", () => {
	it("splits the byte range at 0x80", () => {
		expect(isNonAsciiByte(0x7f)).toBe(false);
		expect(isNonAsciiByte(0x80)).toBe(true);
	});
});

describe("toBytes", () => {
	it("encodes strings as UTF-8", () => {
		expect(Array.from(toBytes("é"))).toEqual([0xc3, 0xa9]);
	});

	it("passes byte arrays through unchanged", () => {
		const bytes = Uint8Array.of(1, 2, 3);
		expect(toBytes(bytes)).toBe(bytes);
	});
});

describe("sanitizeBytes", () => {
	it("replaces high-bit bytes with '?' in a copy", () => {
		const input = Uint8Array.of(0x41, 0xff, 0x0a);
		const result = sanitizeBytes(input);
		expect(Array.from(result)).toEqual([0x41, 0x3f, 0x0a]);
		expect(Array.from(input)).toEqual([0x41, 0xff, 0x0a]);
	});
});

describe("sanitizeText", () => {
	it("keeps ASCII text unchanged", () => {
		expect(sanitizeText("plain text\n")).toBe("plain text\n");
	});

	it("replaces each encoded byte of a non-ASCII character", () => {
		expect(sanitizeText("naïve")).toBe("na??ve");
		expect(sanitizeText("€")).toBe("???");
	});

	it("always yields ASCII-only text", () => {
		fc.assert(
			fc.property(fc.fullUnicodeString(), (text) => {
				const codes = Array.from(sanitizeText(text), (ch) => ch.charCodeAt(0));
				expect(codes.every((code) => code < 0x80)).toBe(true);
			}),
		);
	});
});
