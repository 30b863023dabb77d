/**
 * Color code palette.
 *
 * Maps the one letter color codes used in blueprint markup (`r`, `W`, `y`,
 * ...) plus `transparent` to concrete RGBA values. The table itself is
 * static data supplied by the caller, see `package/palette`.
 *
 * @module core/palette
 */
import type { DiagnosticLog } from "./diagnostics.js";
import { UnknownColorCodeError } from "./errors.js";

export type Rgba = readonly [number, number, number, number];

export type Palette = ReadonlyMap<string, Rgba>;

export const TRANSPARENT = "transparent";

const OPAQUE_BLACK: Rgba = Object.freeze([0, 0, 0, 255]);

function isChannel(value: unknown): value is number {
	return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

/**
 * Build a palette from `code → [r, g, b]` or `code → [r, g, b, a]` entries.
 * @throws TypeError for an entry that is not 3 or 4 channels in 0-255
 */
export function createPalette(entries: Readonly<Record<string, unknown>>): Palette {
	const palette = new Map<string, Rgba>();
	for (const [code, value] of Object.entries(entries)) {
		if (
			!Array.isArray(value) ||
			(value.length !== 3 && value.length !== 4) ||
			!value.every(isChannel)
		) {
			throw new TypeError(
				`Palette entry "${code}" must be [r, g, b] or [r, g, b, a] with channels 0-255`
			);
		}
		const [r, g, b, a = 255] = value;
		palette.set(code, Object.freeze([r, g, b, a]));
	}
	return palette;
}

/**
 * Normalize a color reference such as `&W` or `W^k` to its bare code.
 */
export function colorCode(reference: string): string {
	return reference.split("^", 1)[0].replace(/^&/, "");
}

export interface ColorLookup {
	palette: Palette;
	/** Code used for unknown codes. */
	fallback: string;
	diagnostics?: DiagnosticLog;
	blueprint?: string;
}

/**
 * Resolve a color reference. Unknown codes are reported as
 * {@link UnknownColorCodeError} and replaced by the fallback code.
 */
export function lookupColor(reference: string, lookup: ColorLookup): Rgba {
	const code = colorCode(reference);
	const color = lookup.palette.get(code);
	if (color) return color;
	lookup.diagnostics?.record({
		blueprint: lookup.blueprint,
		context: "render",
		error: new UnknownColorCodeError(code),
	});
	return lookup.palette.get(lookup.fallback) ?? OPAQUE_BLACK;
}
