/**
 * Public entry point of the blueprint engine.
 *
 * @module index
 */
export * from "./core/errors.js";
export { DiagnosticLog, type Diagnostic } from "./core/diagnostics.js";
export { repairMarkup, type RepairCounts, type RepairResult } from "./core/repair.js";
export {
	loadBlueprints,
	DEFAULT_MARKUP_OPTIONS,
	type BlueprintRecord,
	type Fragment,
	type MarkupOptions,
} from "./core/loader.js";
export { buildTree, BlueprintNode, type BlueprintTree, type CharacterIndex } from "./core/tree.js";
export { FragmentTable, mergeChain, mergeRecord, type MergedFragment } from "./core/inheritance.js";
export { DiceBag } from "./core/dicebag.js";
export { SValue } from "./core/svalue.js";
export {
	conjugate,
	stripColors,
	substitutePlaceholders,
	type GenderTable,
	type PronounSet,
} from "./core/text.js";
export {
	PROPERTY_NAMES,
	type ModEntry,
	type PropertyName,
	type PropertyValues,
	type RenderAttributes,
	type RenderOverlay,
} from "./core/properties.js";
export { PropertyResolver, type ResolvedProperties, type ResolverOptions } from "./core/resolver.js";
export { createPalette, type Palette, type Rgba } from "./core/palette.js";
export {
	composite,
	decodePng,
	encodePng,
	scaleNearest,
	type CompositeResult,
	type GlyphSource,
	type RgbaImage,
} from "./core/compositor.js";
export {
	loadDataset,
	renderTile,
	type Dataset,
	type DatasetInput,
	type DatasetOptions,
	type SourceFile,
} from "./core/dataset.js";
export { loadConfig, type Config } from "./package/config.js";
export { loadPalette } from "./package/palette.js";
export { loadGenders } from "./package/genders.js";
export { MemoryGlyphSource, TextureDirectory } from "./package/textures.js";
