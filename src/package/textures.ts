/**
 * Package: textures - base image sources for the tile compositor
 *
 * {@link TextureDirectory} reads PNG base images from a directory on disk,
 * repairing the few path spellings found in markup that do not match the
 * files. {@link MemoryGlyphSource} serves images held in memory.
 *
 * @example
 * import { TextureDirectory } from './package/textures.js';
 * const glyphs = new TextureDirectory("Textures");
 * glyphs.load("creatures/sw_snapjaw.bmp"); // reads Textures/Creatures/sw_snapjaw.bmp
 *
 * @module package/textures
 */
import { readFileSync } from "fs";
import { join } from "path";
import logger from "../logger.js";
import { decodePng, type GlyphSource, type RgbaImage } from "../core/compositor.js";

const BROKEN_PREFIX = "assets_content_textures";

/**
 * Repair a base image path as written in markup.
 *
 * @example
 * fixTexturePath("assets_content_textures_creatures_sw_snapjaw.bmp")
 * // "Creatures/sw_snapjaw.bmp"
 */
export function fixTexturePath(path: string): string {
	let fixed = path;
	if (fixed.toLowerCase().startsWith(BROKEN_PREFIX)) {
		fixed = fixed.slice(BROKEN_PREFIX.length + 1).replace("_", "/");
	}
	return fixed.charAt(0).toUpperCase() + fixed.slice(1);
}

function isMissingFile(error: unknown): boolean {
	return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class TextureDirectory implements GlyphSource {
	readonly directory: string;
	private readonly cache = new Map<string, RgbaImage | undefined>();

	constructor(directory: string) {
		this.directory = directory;
	}

	load(path: string): RgbaImage | undefined {
		const fixed = fixTexturePath(path);
		if (this.cache.has(fixed)) return this.cache.get(fixed);
		const image = this.read(fixed);
		this.cache.set(fixed, image);
		return image;
	}

	private read(path: string): RgbaImage | undefined {
		const fullPath = join(this.directory, path);
		let buffer: Buffer;
		try {
			buffer = readFileSync(fullPath);
		} catch (error) {
			if (!isMissingFile(error)) throw error;
			logger.debug(`Base image not found: ${fullPath}`);
			return undefined;
		}
		try {
			return decodePng(buffer);
		} catch (error) {
			logger.warn(`Could not decode ${fullPath} as PNG`, { error: String(error) });
			return undefined;
		}
	}
}

export class MemoryGlyphSource implements GlyphSource {
	private readonly images: ReadonlyMap<string, RgbaImage>;

	constructor(images: Iterable<readonly [string, RgbaImage]>) {
		this.images = new Map(images);
	}

	load(path: string): RgbaImage | undefined {
		return this.images.get(path);
	}
}
