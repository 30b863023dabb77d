/**
 * Dataset entry point.
 *
 * {@link loadDataset} is the one way to build the object model: every source
 * file is repaired and parsed, all records are linked into a single tree, and
 * a {@link PropertyResolver} is attached. The load is all or nothing; any
 * load-severity error aborts it. The returned {@link Dataset} is frozen and
 * is passed around explicitly.
 *
 * @example
 * ```typescript
 * const dataset = loadDataset(
 *   { files: [{ path: "ObjectBlueprints.xml", content }], version: "2.0.206" },
 *   { genders }
 * );
 * const snapjaw = dataset.index.get("Snapjaw");
 * if (snapjaw) dataset.resolver.resolve(snapjaw, "pronouns");
 * ```
 *
 * @module core/dataset
 */
import logger from "../logger.js";
import { composite, scaleNearest, type CompositeResult, type GlyphSource } from "./compositor.js";
import { DiagnosticLog } from "./diagnostics.js";
import { MalformedSourceError } from "./errors.js";
import {
	DEFAULT_MARKUP_OPTIONS,
	loadBlueprints,
	type BlueprintRecord,
	type MarkupOptions,
} from "./loader.js";
import { TRANSPARENT, type Palette } from "./palette.js";
import type { RenderAttributes } from "./properties.js";
import { repairMarkup, type RepairCounts } from "./repair.js";
import { PropertyResolver } from "./resolver.js";
import type { GenderTable } from "./text.js";
import { buildTree, type BlueprintNode, type CharacterIndex } from "./tree.js";

export interface SourceFile {
	/** Name used in locations and error messages. */
	path: string;
	/** Raw file content; bytes are read as UTF-8. */
	content: string | Uint8Array;
}

export interface DatasetInput {
	files: ReadonlyArray<SourceFile>;
	/** Version string of the installation the files came from. */
	version: string;
}

export interface DatasetOptions {
	genders: GenderTable;
	defaultGender?: string;
	markup?: MarkupOptions;
	diagnostics?: DiagnosticLog;
}

export interface SourceSummary {
	readonly path: string;
	readonly repairs: number;
	readonly counts: Readonly<RepairCounts>;
	readonly blueprints: number;
}

export interface Dataset {
	readonly root: BlueprintNode;
	readonly index: CharacterIndex;
	readonly resolver: PropertyResolver;
	readonly version: string;
	/** Total repairs over every source file. */
	readonly repairs: number;
	readonly sources: ReadonlyArray<SourceSummary>;
	readonly diagnostics: DiagnosticLog;
}

export interface RenderTileOptions {
	palette: Palette;
	glyphs: GlyphSource;
	fallbackColor?: string;
	tileWidth?: number;
	tileHeight?: number;
	/** Integer enlargement factor. Defaults to 1. */
	scale?: number;
}

const strictDecoder = new TextDecoder("utf-8", { fatal: true });
const lenientDecoder = new TextDecoder("utf-8");

/**
 * Decode a source as UTF-8, pointing at the first byte sequence that is not.
 */
function decodeSource(file: SourceFile): string {
	if (typeof file.content === "string") return file.content;
	try {
		return strictDecoder.decode(file.content);
	} catch (error) {
		if (!(error instanceof TypeError)) throw error;
		const text = lenientDecoder.decode(file.content);
		const before = text.slice(0, Math.max(text.indexOf("\uFFFD"), 0)).split("\n");
		throw new MalformedSourceError(
			{ source: file.path, line: before.length, column: before[before.length - 1].length + 1 },
			"invalid UTF-8"
		);
	}
}

const NO_RENDER: RenderAttributes = Object.freeze({
	tileColor: "y",
	detailColor: TRANSPARENT,
	backgroundColor: TRANSPARENT,
	overlays: Object.freeze([]),
});

/**
 * Build a dataset from raw source files.
 *
 * @throws MalformedSourceError when a file is not UTF-8 or cannot be repaired
 *   into well-formed markup
 * @throws DuplicateBlueprintError when an id is declared twice, in one file or across files
 * @throws UnresolvedParentError, CyclicInheritanceError, NoRootError or
 *   MultipleRootsError when the records do not form a single tree
 */
export function loadDataset(input: DatasetInput, options: DatasetOptions): Dataset {
	const markupOptions = options.markup ?? DEFAULT_MARKUP_OPTIONS;
	const records: BlueprintRecord[] = [];
	const sources: SourceSummary[] = [];
	let repairs = 0;

	for (const file of input.files) {
		const text = decodeSource(file);
		const repaired = repairMarkup(text, file.path);
		const loaded = loadBlueprints(repaired.markup, file.path, markupOptions);
		records.push(...loaded);
		repairs += repaired.repairs;
		logger.debug(`Repaired ${file.path}`, { ...repaired.counts, repairs: repaired.repairs });
		sources.push(
			Object.freeze({
				path: file.path,
				repairs: repaired.repairs,
				counts: Object.freeze({ ...repaired.counts }),
				blueprints: loaded.length,
			})
		);
	}

	const { root, index } = buildTree(records);
	const diagnostics = options.diagnostics ?? new DiagnosticLog();
	const resolver = new PropertyResolver({
		index,
		genders: options.genders,
		defaultGender: options.defaultGender,
		diagnostics,
	});
	logger.info(`Loaded ${index.size} blueprints from ${input.files.length} file(s)`, {
		version: input.version,
		repairs,
	});
	return Object.freeze({
		root,
		index,
		resolver,
		version: input.version,
		repairs,
		sources: Object.freeze(sources),
		diagnostics,
	});
}

/**
 * Composite the tile of one blueprint. A blueprint without a `Render` part
 * gets a blank tile and a missing glyph diagnostic.
 */
export function renderTile(
	dataset: Dataset,
	node: BlueprintNode,
	options: RenderTileOptions
): CompositeResult {
	const render = dataset.resolver.resolve(node, "render") ?? NO_RENDER;
	const result = composite(render, {
		palette: options.palette,
		glyphs: options.glyphs,
		fallbackColor: options.fallbackColor,
		tileWidth: options.tileWidth,
		tileHeight: options.tileHeight,
		diagnostics: dataset.diagnostics,
		blueprint: node.id,
	});
	const scale = options.scale ?? 1;
	return scale === 1 ? result : { ...result, image: scaleNearest(result.image, scale) };
}
