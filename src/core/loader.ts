/**
 * Blueprint loader.
 *
 * Parses repaired markup into {@link BlueprintRecord}s. Each `object`
 * element directly under the document root is one blueprint; its child
 * elements are fragments. Fragment kinds the engine has no special meaning
 * for are kept verbatim so they can still be merged and queried.
 *
 * ```xml
 * <objects>
 *   <object Name="Bandage" Inherits="Item">
 *     <part Name="Render" Tile="Items/sw_hit.bmp" DetailColor="R" />
 *     <tag Name="AlwaysStack" Value="Yes" />
 *     <inventoryobject Blueprint="Gauze" Number="2" />
 *   </object>
 * </objects>
 * ```
 *
 * @module core/loader
 */
import type { QualifiedTag, Tag } from "sax";
import logger from "../logger.js";
import type { AttributeRecord } from "../utils/types.js";
import {
	DuplicateBlueprintError,
	MalformedSourceError,
	type SourceLocation,
} from "./errors.js";
import { strictParser } from "./repair.js";

export interface Fragment {
	/** Element name: `part`, `stat`, `tag`, `xtag`, or anything else. */
	readonly kind: string;
	readonly name: string;
	readonly attributes: AttributeRecord;
}

export interface BlueprintRecord {
	readonly id: string;
	readonly parentId?: string;
	/** Every fragment except tags, in declaration order. */
	readonly fragments: ReadonlyArray<Fragment>;
	/** Flag markers (`tag` elements), in declaration order. */
	readonly tags: ReadonlyArray<Fragment>;
	/** The blueprint's markup exactly as it appears after repair. */
	readonly rawSource: string;
	readonly location: SourceLocation;
}

export interface MarkupOptions {
	/** Element name that declares a blueprint. */
	objectElement: string;
	idAttribute: string;
	parentAttribute: string;
}

export const DEFAULT_MARKUP_OPTIONS: Readonly<MarkupOptions> = Object.freeze({
	objectElement: "object",
	idAttribute: "Name",
	parentAttribute: "Inherits",
});

const XTAG_PREFIX = "xtag";

interface PendingRecord {
	id: string;
	parentId?: string;
	start: number;
	location: SourceLocation;
	fragments: Map<string, { kind: string; name: string; attributes: Record<string, string> }>;
	tags: Map<string, { kind: string; name: string; attributes: Record<string, string> }>;
}

function readAttributes(tag: Tag | QualifiedTag): Record<string, string> {
	const attributes: Record<string, string> = {};
	for (const [key, value] of Object.entries(tag.attributes)) {
		attributes[key] = typeof value === "string" ? value : value.value;
	}
	return attributes;
}

/**
 * Decide a fragment's kind and name from its element, removing the naming
 * attribute from `attributes`.
 */
function identifyFragment(
	element: string,
	attributes: Record<string, string>
): { kind: string; name: string } {
	if ("Name" in attributes) {
		const name = attributes.Name;
		delete attributes.Name;
		return { kind: element, name };
	}
	if (element.startsWith(XTAG_PREFIX) && element.length > XTAG_PREFIX.length) {
		return { kind: XTAG_PREFIX, name: element.slice(XTAG_PREFIX.length) };
	}
	if ("Blueprint" in attributes) {
		const name = attributes.Blueprint;
		delete attributes.Blueprint;
		return { kind: element, name };
	}
	return { kind: element, name: "" };
}

function freezeFragments(
	fragments: PendingRecord["fragments"]
): ReadonlyArray<Fragment> {
	return Object.freeze(
		Array.from(fragments.values()).map((fragment) =>
			Object.freeze({
				kind: fragment.kind,
				name: fragment.name,
				attributes: Object.freeze(fragment.attributes),
			})
		)
	);
}

/**
 * Index records by id.
 * @throws DuplicateBlueprintError when two records share an id
 */
export function indexRecords(
	records: Iterable<BlueprintRecord>
): Map<string, BlueprintRecord> {
	const index = new Map<string, BlueprintRecord>();
	for (const record of records) {
		const previous = index.get(record.id);
		if (previous) {
			throw new DuplicateBlueprintError(
				record.id,
				previous.location,
				record.location
			);
		}
		index.set(record.id, record);
	}
	return index;
}

/**
 * Parse well-formed (repaired) markup into blueprint records.
 *
 * @param markup Output of the repair stage
 * @param source File name used in locations and errors
 * @throws MalformedSourceError for a blueprint without an id
 * @throws DuplicateBlueprintError for an id declared twice in this file
 */
export function loadBlueprints(
	markup: string,
	source: string,
	options: MarkupOptions = DEFAULT_MARKUP_OPTIONS
): BlueprintRecord[] {
	const parser = strictParser(markup, source);
	const records: BlueprintRecord[] = [];
	let depth = 0;
	let pending: PendingRecord | undefined;
	let skipped = 0;
	// start offsets only grow, so line numbers are counted incrementally
	let countedTo = 0;
	let line = 1;
	const lineAt = (offset: number): number => {
		for (let i = countedTo; i < offset; i++) {
			if (markup.charCodeAt(i) === 10) line++;
		}
		countedTo = offset;
		return line;
	};

	parser.onopentag = (tag) => {
		depth++;
		if (depth === 2) {
			if (tag.name !== options.objectElement) {
				skipped++;
				return;
			}
			const attributes = readAttributes(tag);
			const start = markup.lastIndexOf(`<${tag.name}`, parser.position - 1);
			const location: SourceLocation = {
				source,
				line: lineAt(start),
				column: start - markup.lastIndexOf("\n", start - 1),
			};
			const id = attributes[options.idAttribute];
			if (!id) {
				throw new MalformedSourceError(
					location,
					`<${tag.name}> has no ${options.idAttribute} attribute`,
					markup.slice(start, parser.position)
				);
			}
			const parentId = attributes[options.parentAttribute];
			pending = {
				id,
				parentId: parentId ? parentId : undefined,
				start,
				location,
				fragments: new Map(),
				tags: new Map(),
			};
			return;
		}
		if (depth === 3 && pending) {
			const attributes = readAttributes(tag);
			const { kind, name } = identifyFragment(tag.name, attributes);
			const target = kind === "tag" ? pending.tags : pending.fragments;
			const key = `${kind}\u0000${name}`;
			const existing = target.get(key);
			if (existing) {
				// a repeated fragment extends the earlier one
				Object.assign(existing.attributes, attributes);
			} else {
				target.set(key, { kind, name, attributes });
			}
		}
	};

	parser.onclosetag = () => {
		if (depth === 2 && pending) {
			records.push(
				Object.freeze({
					id: pending.id,
					...(pending.parentId !== undefined ? { parentId: pending.parentId } : {}),
					fragments: freezeFragments(pending.fragments),
					tags: freezeFragments(pending.tags),
					rawSource: markup.slice(pending.start, parser.position),
					location: pending.location,
				})
			);
			pending = undefined;
		}
		depth--;
	};

	parser.write(markup).close();
	indexRecords(records);
	logger.debug(`Loaded ${records.length} blueprint(s) from ${source}`, {
		source,
		blueprints: records.length,
		skippedElements: skipped,
	});
	return records;
}
