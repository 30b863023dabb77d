import { suite, test } from "node:test";
import assert from "node:assert";
import {
	blendOver,
	composite,
	decodePng,
	encodePng,
	recolor,
	scaleNearest,
	type GlyphSource,
	type RgbaImage,
} from "./compositor.js";
import { DiagnosticLog } from "./diagnostics.js";
import { MissingGlyphError, UnknownColorCodeError } from "./errors.js";
import { colorCode, createPalette, lookupColor } from "./palette.js";
import type { RenderAttributes } from "./properties.js";

const PALETTE = createPalette({
	r: [166, 74, 46],
	y: [177, 201, 195],
	transparent: [15, 64, 63, 0],
});

function image(width: number, height: number, ...pixels: number[][]): RgbaImage {
	return { width, height, data: Uint8Array.from(pixels.flat()) };
}

function glyphs(images: Record<string, RgbaImage>): GlyphSource {
	return { load: (path) => images[path] };
}

function render(overrides: Partial<RenderAttributes> = {}): RenderAttributes {
	return {
		tile: "base.png",
		tileColor: "r",
		detailColor: "y",
		backgroundColor: "transparent",
		overlays: [],
		...overrides,
	};
}

const BASE = image(
	4,
	1,
	[0, 0, 0, 255],
	[255, 255, 255, 255],
	[0, 0, 0, 0],
	[255, 0, 0, 255]
);

suite("core/compositor.ts", () => {
	suite("palette", () => {
		test("should default alpha to opaque", () => {
			assert.deepStrictEqual(PALETTE.get("r"), [166, 74, 46, 255]);
			assert.deepStrictEqual(PALETTE.get("transparent"), [15, 64, 63, 0]);
		});

		test("should reject malformed entries", () => {
			assert.throws(() => createPalette({ x: [1, 2] }), TypeError);
			assert.throws(() => createPalette({ x: [1, 2, 256] }), TypeError);
		});

		test("should normalize color references", () => {
			assert.strictEqual(colorCode("&W^k"), "W");
			assert.strictEqual(colorCode("y"), "y");
		});

		test("should fall back for unknown codes and record a diagnostic", () => {
			const diagnostics = new DiagnosticLog();
			const color = lookupColor("Q", { palette: PALETTE, fallback: "y", diagnostics, blueprint: "X" });
			assert.deepStrictEqual(color, [177, 201, 195, 255]);
			const [entry] = diagnostics.ofKind(UnknownColorCodeError);
			assert.strictEqual(entry.blueprint, "X");
			assert.ok(entry.error instanceof UnknownColorCodeError);
			assert.strictEqual(entry.error.code, "Q");
		});

		test("should use opaque black when the fallback is unknown too", () => {
			assert.deepStrictEqual(lookupColor("Q", { palette: PALETTE, fallback: "Z" }), [0, 0, 0, 255]);
		});
	});

	suite("recolor()", () => {
		test("should map the three mask colors and tint the rest", () => {
			const result = recolor(BASE, [166, 74, 46, 255], [177, 201, 195, 255], [15, 64, 63, 0]);
			assert.deepStrictEqual(
				Array.from(result.data),
				[166, 74, 46, 255, 177, 201, 195, 255, 15, 64, 63, 0, 155, 53, 103, 255]
			);
		});

		test("should take the darker channel for a red byte of zero", () => {
			const result = recolor(image(1, 1, [0, 0, 0, 128]), [166, 74, 46, 255], [177, 201, 195, 255], [0, 0, 0, 0]);
			assert.deepStrictEqual(Array.from(result.data), [166, 74, 46, 255]);
		});
	});

	suite("blendOver()", () => {
		test("should blend a translucent source over an opaque target", () => {
			const target = image(1, 1, [0, 0, 0, 255]);
			blendOver(target, image(1, 1, [255, 255, 255, 128]));
			assert.deepStrictEqual(Array.from(target.data), [128, 128, 128, 255]);
		});

		test("should skip fully transparent source pixels", () => {
			const target = image(1, 1, [10, 20, 30, 255]);
			blendOver(target, image(1, 1, [255, 255, 255, 0]));
			assert.deepStrictEqual(Array.from(target.data), [10, 20, 30, 255]);
		});
	});

	suite("scaleNearest()", () => {
		test("should repeat each pixel", () => {
			const scaled = scaleNearest(image(2, 1, [1, 2, 3, 4], [5, 6, 7, 8]), 2);
			assert.strictEqual(scaled.width, 4);
			assert.strictEqual(scaled.height, 2);
			assert.deepStrictEqual(
				Array.from(scaled.data),
				[1, 2, 3, 4, 1, 2, 3, 4, 5, 6, 7, 8, 5, 6, 7, 8, 1, 2, 3, 4, 1, 2, 3, 4, 5, 6, 7, 8, 5, 6, 7, 8]
			);
		});

		test("should reject fractional factors", () => {
			assert.throws(() => scaleNearest(BASE, 1.5), RangeError);
			assert.throws(() => scaleNearest(BASE, 0), RangeError);
		});
	});

	suite("composite()", () => {
		test("should recolor the base image", () => {
			const result = composite(render(), { palette: PALETTE, glyphs: glyphs({ "base.png": BASE }) });
			assert.ok(result.complete);
			assert.deepStrictEqual(result.diagnostics, []);
			assert.deepStrictEqual(
				Array.from(result.image.data),
				[166, 74, 46, 255, 177, 201, 195, 255, 15, 64, 63, 0, 155, 53, 103, 255]
			);
		});

		test("should blend overlays in order", () => {
			const overlay = image(2, 1, [0, 0, 0, 255], [0, 0, 0, 0]);
			const result = composite(
				render({
					tile: "dot.png",
					overlays: [{ name: "Crown", tile: "crown.png", color: "y" }],
				}),
				{
					palette: PALETTE,
					glyphs: glyphs({ "dot.png": image(2, 1, [0, 0, 0, 255], [0, 0, 0, 255]), "crown.png": overlay }),
				}
			);
			assert.deepStrictEqual(
				Array.from(result.image.data),
				[177, 201, 195, 255, 166, 74, 46, 255]
			);
		});

		test("should return a blank tile when the base image is missing", () => {
			const diagnostics = new DiagnosticLog();
			const result = composite(render({ tile: "gone.png" }), {
				palette: PALETTE,
				glyphs: glyphs({}),
				diagnostics,
				blueprint: "Ghost",
			});
			assert.strictEqual(result.complete, false);
			assert.strictEqual(result.image.width, 16);
			assert.strictEqual(result.image.height, 24);
			assert.ok(result.image.data.every((byte) => byte === 0));
			assert.strictEqual(result.diagnostics.length, 1);
			const error = result.diagnostics[0].error;
			assert.ok(error instanceof MissingGlyphError);
			assert.strictEqual(error.glyph, "gone.png");
			assert.strictEqual(diagnostics.forBlueprint("Ghost").length, 1);
		});

		test("should skip a missing overlay and report it", () => {
			const result = composite(
				render({ overlays: [{ name: "Crown", tile: "crown.png", color: "y" }] }),
				{ palette: PALETTE, glyphs: glyphs({ "base.png": BASE }) }
			);
			assert.ok(result.complete);
			assert.strictEqual(result.diagnostics.length, 1);
			assert.strictEqual(result.image.data[0], 166);
		});

		test("should use the fallback color for unknown codes", () => {
			const result = composite(render({ tileColor: "Q" }), {
				palette: PALETTE,
				glyphs: glyphs({ "base.png": BASE }),
			});
			assert.deepStrictEqual(Array.from(result.image.data.subarray(0, 4)), [177, 201, 195, 255]);
			assert.strictEqual(result.diagnostics.length, 1);
			assert.ok(result.diagnostics[0].error instanceof UnknownColorCodeError);
		});

		test("should produce identical PNG bytes for identical inputs", () => {
			const options = { palette: PALETTE, glyphs: glyphs({ "base.png": BASE }) };
			const first = encodePng(composite(render(), options).image);
			const second = encodePng(composite(render(), options).image);
			assert.ok(first.equals(second));
		});
	});

	suite("PNG", () => {
		test("should decode what it encodes", () => {
			const decoded = decodePng(encodePng(BASE));
			assert.strictEqual(decoded.width, 4);
			assert.strictEqual(decoded.height, 1);
			assert.deepStrictEqual(Array.from(decoded.data), Array.from(BASE.data));
		});
	});
});
