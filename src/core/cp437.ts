/**
 * Code Page 437 glyph lookup.
 *
 * The blueprint markup was authored for a CP437 console: raw control bytes in
 * the files and numeric `RenderString` values both mean CP437 glyphs.
 *
 * @module core/cp437
 */
import { readFileSync } from "fs";
import { getBundledPath } from "../utils/path.js";

let GLYPHS: ReadonlyArray<string> | undefined;

function loadGlyphs(): ReadonlyArray<string> {
	const raw: unknown = JSON.parse(readFileSync(getBundledPath("data", "cp437.json"), "utf-8"));
	if (
		!raw ||
		typeof raw !== "object" ||
		!("glyphs" in raw) ||
		!Array.isArray(raw.glyphs) ||
		raw.glyphs.length !== 256
	) {
		throw new Error("data/cp437.json must hold a 256 entry 'glyphs' array");
	}
	const glyphs: string[] = raw.glyphs.map((glyph: unknown) => String(glyph));
	return Object.freeze(glyphs);
}

/**
 * Unicode glyph for a CP437 code point (0-255).
 * @throws RangeError for code points outside the table
 */
export function cp437ToUnicode(code: number): string {
	if (!Number.isInteger(code) || code < 0 || code > 255) {
		throw new RangeError(`${code} is not a Code Page 437 code point`);
	}
	GLYPHS ??= loadGlyphs();
	return GLYPHS[code];
}
