/**
 * Tile compositor.
 *
 * Base images are tricolor masks:
 *
 * | source pixel               | becomes                                  |
 * | -------------------------- | ---------------------------------------- |
 * | opaque black `0,0,0`       | tile color                               |
 * | opaque white `255,255,255` | detail color                             |
 * | alpha 0                    | background color                         |
 * | anything else              | tile/detail mix weighted by the red byte |
 *
 * Overlays are recolored the same way over a transparent background and
 * blended source-over onto the base, in declaration order. The same inputs
 * always produce the same bytes.
 *
 * @module core/compositor
 */
import { PNG } from "pngjs";
import { DiagnosticLog, type Diagnostic } from "./diagnostics.js";
import { MissingGlyphError } from "./errors.js";
import { lookupColor, TRANSPARENT, type ColorLookup, type Palette, type Rgba } from "./palette.js";
import type { RenderAttributes } from "./properties.js";

export const TILE_WIDTH = 16;
export const TILE_HEIGHT = 24;

/**
 * Row-major RGBA pixels, four bytes per pixel.
 */
export interface RgbaImage {
	readonly width: number;
	readonly height: number;
	readonly data: Uint8Array;
}

/**
 * Supplies base images by the path used in markup (`Creatures/sw_snapjaw.bmp`).
 */
export interface GlyphSource {
	load(path: string): RgbaImage | undefined;
}

export interface CompositeOptions {
	palette: Palette;
	glyphs: GlyphSource;
	/** Code used when a color code is unknown. Defaults to `y`. */
	fallbackColor?: string;
	tileWidth?: number;
	tileHeight?: number;
	diagnostics?: DiagnosticLog;
	/** Blueprint id attached to diagnostics. */
	blueprint?: string;
}

export interface CompositeResult {
	image: RgbaImage;
	/** Anomalies met while compositing this tile. */
	diagnostics: ReadonlyArray<Diagnostic>;
	/** False when the base image was missing and a blank tile was returned. */
	complete: boolean;
}

export function blankImage(width: number, height: number): RgbaImage {
	return { width, height, data: new Uint8Array(width * height * 4) };
}

function isPixel(
	data: Uint8Array,
	offset: number,
	r: number,
	g: number,
	b: number,
	a: number
): boolean {
	return (
		data[offset] === r &&
		data[offset + 1] === g &&
		data[offset + 2] === b &&
		data[offset + 3] === a
	);
}

/**
 * Recolor a tricolor mask.
 */
export function recolor(
	base: RgbaImage,
	tile: Rgba,
	detail: Rgba,
	background: Rgba
): RgbaImage {
	const data = new Uint8Array(base.data.length);
	for (let offset = 0; offset < data.length; offset += 4) {
		let pixel: Rgba;
		if (isPixel(base.data, offset, 0, 0, 0, 255)) {
			pixel = tile;
		} else if (isPixel(base.data, offset, 255, 255, 255, 255)) {
			pixel = detail;
		} else if (base.data[offset + 3] === 0) {
			pixel = background;
		} else {
			const weight = base.data[offset] / 255;
			const mix = (channel: number): number =>
				Math.trunc(
					Math.abs(
						(tile[channel] - detail[channel]) * weight +
							Math.min(tile[channel], detail[channel])
					)
				);
			pixel = [mix(0), mix(1), mix(2), 255];
		}
		data.set(pixel, offset);
	}
	return { width: base.width, height: base.height, data };
}

/**
 * Blend `source` over `target` in place, aligned at the top left corner.
 */
export function blendOver(target: RgbaImage, source: RgbaImage): void {
	const width = Math.min(target.width, source.width);
	const height = Math.min(target.height, source.height);
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const s = (y * source.width + x) * 4;
			const t = (y * target.width + x) * 4;
			const sa = source.data[s + 3];
			if (sa === 0) continue;
			const ta = target.data[t + 3];
			const outA = sa + Math.round((ta * (255 - sa)) / 255);
			for (let channel = 0; channel < 3; channel++) {
				target.data[t + channel] = Math.round(
					(source.data[s + channel] * sa * 255 +
						target.data[t + channel] * ta * (255 - sa)) /
						(outA * 255)
				);
			}
			target.data[t + 3] = outA;
		}
	}
}

/**
 * Enlarge an image by an integer factor without smoothing.
 * @throws RangeError for a factor that is not a positive integer
 */
export function scaleNearest(image: RgbaImage, factor: number): RgbaImage {
	if (!Number.isInteger(factor) || factor < 1) {
		throw new RangeError(`Scale factor must be a positive integer, got ${factor}`);
	}
	const width = image.width * factor;
	const height = image.height * factor;
	const data = new Uint8Array(width * height * 4);
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const from = (Math.floor(y / factor) * image.width + Math.floor(x / factor)) * 4;
			data.set(image.data.subarray(from, from + 4), (y * width + x) * 4);
		}
	}
	return { width, height, data };
}

export function encodePng(image: RgbaImage): Buffer {
	const png = new PNG({ width: image.width, height: image.height });
	png.data = Buffer.from(image.data);
	return PNG.sync.write(png);
}

export function decodePng(buffer: Buffer): RgbaImage {
	const png = PNG.sync.read(buffer);
	return { width: png.width, height: png.height, data: new Uint8Array(png.data) };
}

/**
 * Render one tile from resolved render attributes.
 */
export function composite(
	render: RenderAttributes,
	options: CompositeOptions
): CompositeResult {
	const diagnostics = options.diagnostics ?? new DiagnosticLog();
	const before = diagnostics.size;
	const lookup: ColorLookup = {
		palette: options.palette,
		fallback: options.fallbackColor ?? "y",
		diagnostics,
		blueprint: options.blueprint,
	};
	const missing = (glyph: string): void =>
		diagnostics.record({
			blueprint: options.blueprint,
			context: "render",
			error: new MissingGlyphError(glyph),
		});

	const base = render.tile !== undefined ? options.glyphs.load(render.tile) : undefined;
	if (!base) {
		missing(render.tile ?? "(no tile)");
		return {
			image: blankImage(
				options.tileWidth ?? TILE_WIDTH,
				options.tileHeight ?? TILE_HEIGHT
			),
			diagnostics: diagnostics.all().slice(before),
			complete: false,
		};
	}

	const image = recolor(
		base,
		lookupColor(render.tileColor, lookup),
		lookupColor(render.detailColor, lookup),
		lookupColor(render.backgroundColor, lookup)
	);
	const clear = lookupColor(TRANSPARENT, lookup);
	for (const overlay of render.overlays) {
		const layer = options.glyphs.load(overlay.tile);
		if (!layer) {
			missing(overlay.tile);
			continue;
		}
		blendOver(
			image,
			recolor(
				layer,
				lookupColor(overlay.color, lookup),
				lookupColor(overlay.detailColor ?? TRANSPARENT, lookup),
				clear
			)
		);
	}
	return { image, diagnostics: diagnostics.all().slice(before), complete: true };
}
