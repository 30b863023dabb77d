/**
 * Package: palette - color code table loader
 *
 * Reads the palette YAML (`data/palette.yaml` by default) mapping each color
 * code to `[r, g, b]` or `[r, g, b, a]`.
 *
 * @example
 * import { loadPalette } from './package/palette.js';
 * const palette = await loadPalette();
 * palette.get("R"); // [215, 66, 0, 255]
 *
 * @module package/palette
 */
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import { createPalette, TRANSPARENT, type Palette } from "../core/palette.js";
import { getDataPath } from "../utils/path.js";

function isMapping(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Build a palette from parsed YAML.
 * @throws TypeError when the document is not a mapping of valid entries
 */
export function parsePalette(document: unknown, source = "palette"): Palette {
	if (!isMapping(document)) {
		throw new TypeError(`${source} must be a mapping of color codes`);
	}
	const palette = createPalette(document);
	if (!palette.has(TRANSPARENT)) {
		logger.warn(`${source} has no "${TRANSPARENT}" entry`);
	}
	return palette;
}

export async function loadPalette(path: string = getDataPath("palette.yaml")): Promise<Palette> {
	const content = await readFile(path, "utf-8");
	const palette = parsePalette(YAML.load(content), path);
	logger.debug(`Loaded ${palette.size} palette colors from ${path}`);
	return palette;
}
