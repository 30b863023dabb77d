/**
 * Property catalogue.
 *
 * Every queryable property is a {@link PropertyDefinition}: a pure function
 * of the blueprint's merged fragments (through a {@link PropertyContext}) and a
 * fallback used when the raw value cannot be read as the property's type.
 * Properties that do not apply to a blueprint resolve to `undefined`.
 *
 * A blueprint counts as a character when it has a `Brain` part.
 *
 * @example
 * ```typescript
 * resolver.resolve(snapjaw, "hp");          // "15"
 * resolver.resolve(sword, "damageaverage"); // 3.5
 * ```
 *
 * @module core/properties
 */
import { cp437ToUnicode } from "./cp437.js";
import { DiceBag } from "./dicebag.js";
import { PropertyTypeError, UnresolvedPlaceholderError, type BlueprintError } from "./errors.js";
import { DELETE_VALUE, type FragmentTable } from "./inheritance.js";
import { colorCode, TRANSPARENT } from "./palette.js";
import { parseLevel, SValue } from "./svalue.js";
import type { BlueprintNode } from "./tree.js";
import {
	parseColorString,
	PRONOUN_KEYS,
	stripColors,
	substitutePlaceholders,
	type GenderTable,
	type PronounSet,
} from "./text.js";

export interface FactionStanding {
	readonly faction: string;
	readonly value: number;
}

export interface InventoryEntry {
	readonly blueprint: string;
	readonly count: number;
	/** Percent chance the entry is present. */
	readonly chance: number;
}

export interface MutationEntry {
	readonly name: string;
	readonly level: number;
}

export interface ModEntry {
	readonly name: string;
	readonly tier: number;
}

export interface StatBonus {
	readonly stat: string;
	readonly boost: number;
}

export interface RenderOverlay {
	readonly name: string;
	readonly tile: string;
	readonly color: string;
	readonly detailColor?: string;
}

/**
 * Everything the tile compositor needs. Colors are bare palette codes.
 */
export interface RenderAttributes {
	readonly tile?: string;
	readonly renderString?: string;
	readonly colorString?: string;
	readonly tileColor: string;
	readonly detailColor: string;
	readonly backgroundColor: string;
	readonly overlays: ReadonlyArray<RenderOverlay>;
}

export type Demeanor = "docile" | "neutral" | "aggressive";

export interface PropertyValues {
	id: string;
	inheritingfrom: string | undefined;
	inheritancepath: string;
	title: string;
	displayname: string;
	description: string | undefined;
	gender: string | undefined;
	pronouns: Readonly<PronounSet> | undefined;
	flags: ReadonlyArray<string>;
	level: number | undefined;
	lv: string | undefined;
	tier: number | undefined;
	hp: string | undefined;
	av: number | undefined;
	dv: number | undefined;
	ma: number | undefined;
	quickness: number | undefined;
	movespeed: number | undefined;
	acid: number | undefined;
	cold: number | undefined;
	electric: number | undefined;
	heat: number | undefined;
	strength: string | undefined;
	agility: string | undefined;
	toughness: string | undefined;
	intelligence: string | undefined;
	willpower: string | undefined;
	ego: string | undefined;
	damage: string | undefined;
	damageaverage: number | undefined;
	pv: number | undefined;
	maxpv: number | undefined;
	elementaldamage: string | undefined;
	elementaltype: string | undefined;
	tohit: number | undefined;
	weaponskill: string | undefined;
	accuracy: number | undefined;
	shots: number | undefined;
	maxammo: number | undefined;
	weight: number | undefined;
	commerce: number | undefined;
	complexity: number | undefined;
	bits: string | undefined;
	mods: ReadonlyArray<ModEntry> | undefined;
	modcount: number | undefined;
	faction: ReadonlyArray<FactionStanding> | undefined;
	reputationbonus: ReadonlyArray<FactionStanding> | undefined;
	statbonuses: ReadonlyArray<StatBonus> | undefined;
	inventory: ReadonlyArray<InventoryEntry> | undefined;
	mutations: ReadonlyArray<MutationEntry> | undefined;
	skills: ReadonlyArray<string> | undefined;
	usesslots: ReadonlyArray<string> | undefined;
	wornon: string | undefined;
	twohanded: boolean | undefined;
	solid: boolean | undefined;
	isoccluding: boolean | undefined;
	hidden: number | undefined;
	lightradius: number | undefined;
	savemodifier: string | undefined;
	savemodifieramt: number | undefined;
	corpse: string | undefined;
	corpsechance: number | undefined;
	demeanor: Demeanor | undefined;
	role: string | undefined;
	aquatic: boolean | undefined;
	colorstr: string | undefined;
	renderstr: string | undefined;
	render: RenderAttributes | undefined;
}

export type PropertyName = keyof PropertyValues;

/**
 * Read access to one blueprint during a property computation.
 */
export interface PropertyContext {
	readonly node: BlueprintNode;
	readonly fragments: FragmentTable;
	readonly genders: GenderTable;
	readonly defaultGender: string;
	attr(kind: string, name: string, attribute: string): string | undefined;
	part(name: string, attribute: string): string | undefined;
	stat(name: string, attribute: string): string | undefined;
	/** The tag's `Value`, or undefined when absent or valueless. */
	tag(name: string): string | undefined;
	has(kind: string, name?: string): boolean;
	isSpecified(kind: string, name?: string, attribute?: string): boolean;
	inheritsFrom(id: string): boolean;
	/** Another property of the same blueprint. */
	get<K extends PropertyName>(name: K): PropertyValues[K];
	/** The context of another blueprint, by id. */
	lookup(id: string): PropertyContext | undefined;
	/** Record a recoverable anomaly without failing the property. */
	report(error: BlueprintError): void;
}

export interface PropertyDefinition<T> {
	readonly summary: string;
	readonly fallback: T;
	compute(context: PropertyContext): T;
}

// ---------------------------------------------------------------------------
// conversions

const INTEGER = /^\s*[+-]?\d+\s*$/;
const DECIMAL = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)\s*$/;

export function toInteger(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	if (!INTEGER.test(raw)) throw new PropertyTypeError("integer", raw);
	return Number(raw);
}

export function toDecimal(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	if (!DECIMAL.test(raw)) throw new PropertyTypeError("decimal", raw);
	return Number(raw);
}

export function toBoolean(raw: string | undefined): boolean | undefined {
	if (raw === undefined) return undefined;
	const lowered = raw.trim().toLowerCase();
	if (lowered === "true") return true;
	if (lowered === "false") return false;
	throw new PropertyTypeError("boolean", raw);
}

function splitList(raw: string): string[] {
	return raw
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

// ---------------------------------------------------------------------------
// helpers shared by several properties

const SPECIAL_INVENTORY_PREFIXES = "*#@";
const BIT_TRANSLATION: Readonly<Record<string, string>> = Object.freeze({
	G: "B",
	R: "A",
	C: "D",
	B: "C",
});
const GAS_GLYPH = "▓";

interface ElementalMod {
	readonly part: string;
	readonly element: string;
	/** Damage range as multiples of the mod tier. */
	readonly low: number;
	readonly high: number;
}

const ELEMENTAL_MODS: ReadonlyArray<ElementalMod> = Object.freeze([
	{ part: "ModFlaming", element: "Fire", low: 0.8, high: 1.2 },
	{ part: "ModFreezing", element: "Cold", low: 0.8, high: 1.2 },
	{ part: "ModElectrified", element: "Electric", low: 1, high: 1.5 },
]);
const PROJECTILE_LOADERS = [
	"BioAmmoLoader",
	"AmmoArrow",
	"MagazineAmmoLoader",
	"EnergyAmmoLoader",
	"LiquidAmmoLoader",
] as const;

type AttributeName = "Strength" | "Agility" | "Toughness" | "Intelligence" | "Willpower" | "Ego";
type Element = "Acid" | "Cold" | "Electric" | "Heat";

function isCharacter(context: PropertyContext): boolean {
	return context.has("part", "Brain");
}

function levelOf(context: PropertyContext): number {
	return context.get("level") ?? 1;
}

function attributeValue(
	context: PropertyContext,
	attribute: AttributeName
): string | undefined {
	if (isCharacter(context)) {
		const sValue = context.stat(attribute, "sValue");
		let value =
			sValue !== undefined
				? new SValue(sValue, levelOf(context)).toString()
				: context.stat(attribute, "Value");
		const boost = context.stat(attribute, "Boost");
		if (value !== undefined && boost) value += `+${boost}`;
		return value;
	}
	if (context.has("part", "Armor")) {
		return context.part("Armor", attribute);
	}
	return undefined;
}

/**
 * Average of a character's attribute roll; minions get 80%.
 */
function attributeAverage(
	context: PropertyContext,
	attribute: AttributeName
): number | undefined {
	const sValue = context.stat(attribute, "sValue");
	const value = context.stat(attribute, "Value");
	let average: number;
	if (sValue !== undefined) {
		const parsed = new SValue(sValue, levelOf(context));
		average = (parsed.low + parsed.high) / 2;
	} else if (value !== undefined) {
		average = new DiceBag(value).average();
	} else {
		return undefined;
	}
	average += toInteger(context.stat(attribute, "Boost")) ?? 0;
	const scale = context.get("role") === "Minion" ? 0.8 : 1;
	return Math.trunc(average * scale);
}

/**
 * Modifier of the average roll: one point per two over or under 16.
 */
function attributeModifier(context: PropertyContext, attribute: AttributeName): number {
	const average = attributeAverage(context, attribute);
	return average === undefined ? 0 : Math.floor((average - 16) / 2);
}

/**
 * Elemental resistance of a character, or the one granted by armor.
 */
function resistance(context: PropertyContext, element: Element): number | undefined {
	if (context.has("part", "Armor")) {
		return toInteger(context.part("Armor", element === "Electric" ? "Elec" : element));
	}
	return toInteger(context.stat(`${element}Resistance`, "Value"));
}

function resistanceProperty(element: Element): PropertyDefinition<number | undefined> {
	return {
		summary: `${element} resistance or weakness of equipment or a character`,
		fallback: undefined,
		compute: (context) => resistance(context, element),
	};
}

function requiredTier(context: PropertyContext, part: string): number {
	const tier = toInteger(context.part(part, "Tier"));
	if (tier === undefined) throw new PropertyTypeError("integer", `${part}.Tier`, "missing");
	return tier;
}

/**
 * The elemental mod declared by this blueprint, if any.
 */
function elementalMod(context: PropertyContext): ElementalMod | undefined {
	return ELEMENTAL_MODS.find((mod) => context.isSpecified("part", mod.part));
}

/**
 * The blueprint a missile weapon or arrow fires.
 */
function projectileOf(context: PropertyContext): PropertyContext | undefined {
	if (!context.has("part", "MissileWeapon") && !context.isSpecified("part", "AmmoArrow")) {
		return undefined;
	}
	for (const loader of PROJECTILE_LOADERS) {
		const id = context.part(loader, "ProjectileObject");
		if (id) {
			const projectile = context.lookup(id);
			if (!projectile) {
				throw new PropertyTypeError("blueprint reference", id, "no such blueprint");
			}
			return projectile;
		}
	}
	return undefined;
}

/**
 * Carried blueprints that resolve, skipping population markers like `*Junk 1`.
 */
function carriedItems(context: PropertyContext): PropertyContext[] {
	const items: PropertyContext[] = [];
	for (const entry of context.get("inventory") ?? []) {
		const item = context.lookup(entry.blueprint);
		if (item && !isCharacter(item)) items.push(item);
	}
	return items;
}

function parseStandings(
	context: PropertyContext,
	raw: string,
	pattern: RegExp,
	defaultValue?: string
): FactionStanding[] {
	const standings: FactionStanding[] = [];
	for (const entry of splitList(raw)) {
		const match = pattern.exec(entry);
		const value = match ? match[2] : defaultValue;
		const faction = match ? match[1] : entry;
		const parsed = toInteger(value);
		if (parsed === undefined) {
			context.report(new PropertyTypeError("faction standing", entry));
			continue;
		}
		standings.push(Object.freeze({ faction, value: parsed }));
	}
	return standings;
}

function parsePronounSet(raw: string): PronounSet | undefined {
	const parts = raw.split("/").map((part) => part.trim());
	if (parts.length < PRONOUN_KEYS.length || parts.some((part) => part.length === 0)) {
		return undefined;
	}
	const [subjective, objective, possessive, substantivePossessive, reflexive] = parts;
	return {
		subjective,
		objective,
		possessive,
		substantivePossessive,
		reflexive,
		plural: subjective.toLowerCase() === "they",
	};
}

function describe(context: PropertyContext): string | undefined {
	const short = context.part("Description", "Short");
	let text: string | undefined;
	if (short === "A hideous specimen.") {
		return undefined;
	} else if (context.has("intproperty", "GenotypeBasedDescription")) {
		text =
			`[True kin]\n${context.attr("property", "TrueManDescription", "Value") ?? ""}\n\n` +
			`[Mutant]\n${context.attr("property", "MutantDescription", "Value") ?? ""}`;
	} else if (short) {
		const mark = context.part("Description", "Mark");
		text = mark ? `${short}\n\n${mark}` : short;
	}
	if (text === undefined) return undefined;
	const postfix = context.part("BonusPostfix", "Postfix");
	if (postfix) text += `\n\n${postfix}`;
	return text;
}

interface PaintedTile {
	readonly tile: string;
	readonly tileColor: string;
	readonly detailColor: string | undefined;
	readonly backgroundColor: string | undefined;
}

/**
 * First entry of a `PaintedWall` or `PaintedFence` tag, unless deleted.
 */
function paintPath(context: PropertyContext, tag: string): string | undefined {
	const value = context.tag(tag);
	if (!value || value === DELETE_VALUE) return undefined;
	return value.split(",")[0];
}

/**
 * Fence tiles: a `k` detail color means the background carries the
 * secondary color.
 */
function paintFence(
	context: PropertyContext,
	path: string,
	color: string,
	detail: string | undefined
): PaintedTile {
	let tileColor = color;
	let detailColor = detail;
	let backgroundColor: string | undefined;
	if (color.includes("^")) {
		const [foreground, background] = color.split("^");
		tileColor = foreground;
		if (detail === "k") {
			detailColor = TRANSPARENT;
			backgroundColor = background;
		} else if (background !== "k") {
			backgroundColor = background;
		}
	}

	let name = path;
	if (context.has("part", "HydraulicPowerTransmission")) {
		if (context.part("HydraulicPowerTransmission", "TileEffects") === "true") {
			const powered = context.part("HydraulicPowerTransmission", "TileAppendWhenPowered");
			const unbroken = context.part("HydraulicPowerTransmission", "TileAppendWhenUnbroken");
			if (powered && unbroken) name += powered + unbroken;
			if (!context.part("HydraulicPowerTransmission", "TileAnimateSuppressWhenUnbroken")) {
				name += "_1";
			}
		}
	}
	if (context.part("MechanicalPowerTransmission", "TileEffects") === "true") {
		name += "_1";
	}
	const atlas = context.tag("PaintedFenceAtlas") || "Tiles/";
	const extension = context.tag("PaintedFenceExtension") || ".bmp";
	return { tile: `${atlas}${name}_nsew${extension}`, tileColor, detailColor, backgroundColor };
}

function paintWall(
	context: PropertyContext,
	path: string,
	color: string,
	detail: string | undefined
): PaintedTile {
	let detailColor = detail;
	let backgroundColor: string | undefined;
	const caret = color.indexOf("^");
	if (caret >= 0 && (detail === undefined || detail === "k")) {
		if (detail === "k") detailColor = TRANSPARENT;
		backgroundColor = color.slice(caret + 1);
	}
	const atlas = context.tag("PaintedWallAtlas") || "Tiles/";
	const declared = context.tag("PaintedWallExtension");
	const extension = declared && context.node.id !== "Dirt" ? declared : ".bmp";
	return {
		tile: `${atlas}${path}-00000000${extension}`,
		tileColor: color,
		detailColor,
		backgroundColor,
	};
}

function renderAttributes(context: PropertyContext): RenderAttributes | undefined {
	const fence = paintPath(context, "PaintedFence");
	const wall = paintPath(context, "PaintedWall");
	if (!context.has("part", "Render") && fence === undefined && wall === undefined) {
		return undefined;
	}
	const colorString = context.get("colorstr");
	let tile = context.part("Render", "Tile");
	let tileColor = context.part("Render", "TileColor");
	let detailColor = context.part("Render", "DetailColor");
	let backgroundColor: string = TRANSPARENT;

	// fences win over walls
	const color = tileColor || colorString || "";
	let painted: PaintedTile | undefined;
	if (fence !== undefined) painted = paintFence(context, fence, color, detailColor);
	else if (wall !== undefined) painted = paintWall(context, wall, color, detailColor);

	if (painted) {
		tile = painted.tile;
		tileColor = painted.tileColor;
		detailColor = painted.detailColor;
		if (painted.backgroundColor) backgroundColor = colorCode(painted.backgroundColor);
	} else if (tileColor === undefined && colorString !== undefined) {
		const { foreground, background } = parseColorString(colorString);
		tileColor = foreground;
		if (background) backgroundColor = background;
	}
	if (!painted && context.has("part", "Walltrap")) {
		const warm = parseColorString(context.part("Walltrap", "WarmColor") ?? "");
		tileColor = warm.foreground ?? "r";
		backgroundColor = warm.background ?? "g";
		detailColor = TRANSPARENT;
	}

	const overlays = context.fragments.ofKind("overlay").flatMap((overlay): RenderOverlay[] => {
		const tile = overlay.attributes.get("Tile");
		if (!tile) return [];
		const detail = overlay.attributes.get("DetailColor");
		return [
			Object.freeze({
				name: overlay.name,
				tile,
				color: colorCode(overlay.attributes.get("Color") ?? "y"),
				...(detail ? { detailColor: colorCode(detail) } : {}),
			}),
		];
	});

	const renderString = context.get("renderstr");
	return Object.freeze({
		...(tile ? { tile } : {}),
		...(renderString !== undefined ? { renderString } : {}),
		...(colorString !== undefined ? { colorString } : {}),
		tileColor: tileColor ? colorCode(tileColor) : "y",
		detailColor: detailColor ? colorCode(detailColor) : TRANSPARENT,
		backgroundColor,
		overlays: Object.freeze(overlays),
	});
}

// ---------------------------------------------------------------------------
// catalogue

function attributeProperty(
	attribute: AttributeName
): PropertyDefinition<string | undefined> {
	return {
		summary: `${attribute} of a character, or the ${attribute} bonus of armor`,
		fallback: undefined,
		compute: (context) => attributeValue(context, attribute),
	};
}

export const PROPERTIES: { readonly [K in PropertyName]: PropertyDefinition<PropertyValues[K]> } = {
	id: {
		summary: "Unique blueprint id",
		fallback: "",
		compute: (context) => context.node.id,
	},
	inheritingfrom: {
		summary: "Id of the parent blueprint; undefined only for the root",
		fallback: undefined,
		compute: (context) => context.node.parent?.id,
	},
	inheritancepath: {
		summary: "Ids from the root down to this blueprint",
		fallback: "",
		compute: (context) => context.node.inheritancePath(),
	},
	title: {
		summary: "Display name with color codes kept",
		fallback: "",
		compute: (context) => {
			for (const builder of context.fragments.ofKind("builder")) {
				const forced = builder.attributes.get("ForceName");
				if (forced) return forced;
			}
			return context.part("Render", "DisplayName") ?? context.node.id;
		},
	},
	displayname: {
		summary: "Display name with color codes removed",
		fallback: "",
		compute: (context) => {
			const name = context.part("Render", "DisplayName");
			return name === undefined ? "" : stripColors(name);
		},
	},
	description: {
		summary: "Short description with grammar placeholders filled in",
		fallback: undefined,
		compute: (context) => {
			const text = describe(context);
			if (text === undefined) return undefined;
			return substitutePlaceholders(text, context.get("pronouns"), (placeholder) =>
				context.report(new UnresolvedPlaceholderError(placeholder))
			);
		},
	},
	gender: {
		summary: "Value of the Gender tag",
		fallback: undefined,
		compute: (context) => context.tag("Gender"),
	},
	pronouns: {
		summary: "Pronoun set from the PronounSet tag, else from the gender table",
		fallback: undefined,
		compute: (context) => {
			const declared = context.tag("PronounSet");
			if (declared !== undefined) {
				const set = parsePronounSet(declared);
				if (!set) {
					throw new PropertyTypeError("pronoun set", declared, "expected five '/' separated forms");
				}
				return Object.freeze(set);
			}
			const gender = context.get("gender") ?? context.defaultGender;
			const set = context.genders.get(gender);
			if (!set) {
				throw new PropertyTypeError("gender", gender, "not in the gender table");
			}
			return set;
		},
	},
	flags: {
		summary: "Names of every tag in force",
		fallback: Object.freeze([]),
		compute: (context) =>
			Object.freeze(context.fragments.ofKind("tag").map((tag) => tag.name)),
	},
	level: {
		summary: "Level, the lower bound when given as a range",
		fallback: undefined,
		compute: (context) => {
			const raw = context.stat("Level", "sValue") ?? context.stat("Level", "Value");
			return raw === undefined ? undefined : parseLevel(raw);
		},
	},
	lv: {
		summary: "Level as written, which may be a range such as 18-29",
		fallback: undefined,
		compute: (context) => context.stat("Level", "sValue") ?? context.stat("Level", "Value"),
	},
	tier: {
		summary: "Declared Tier tag, else the highest tinker bit, else level / 5",
		fallback: undefined,
		compute: (context) => {
			if (!context.isSpecified("tag", "Tier")) {
				if (context.isSpecified("part", "TinkerItem", "Bits")) {
					const last = (context.part("TinkerItem", "Bits") ?? "").slice(-1);
					return /^\d$/.test(last) ? Number(last) : 0;
				}
				const level = context.get("level");
				if (level !== undefined) return Math.floor(level / 5);
			}
			return toInteger(context.tag("Tier"));
		},
	},
	hp: {
		summary: "Hitpoints, as an sValue or a number",
		fallback: undefined,
		compute: (context) =>
			context.stat("Hitpoints", "sValue") ?? context.stat("Hitpoints", "Value"),
	},
	av: {
		summary: "Armor value of armor or a shield, or a character's AV including carried armor",
		fallback: undefined,
		compute: (context) => {
			if (isCharacter(context)) {
				let av = toInteger(context.stat("AV", "Value")) ?? 0;
				for (const item of carriedItems(context)) av += item.get("av") ?? 0;
				return av;
			}
			return (
				toInteger(context.part("Shield", "AV")) ?? toInteger(context.part("Armor", "AV"))
			);
		},
	},
	dv: {
		summary: "Dodge value modifier of armor or a shield, or a character's DV",
		fallback: undefined,
		compute: (context) => {
			if (context.has("part", "Shield")) return toInteger(context.part("Shield", "DV"));
			if (context.has("part", "Armor")) return toInteger(context.part("Armor", "DV"));
			if (!isCharacter(context)) return undefined;
			if (toBoolean(context.part("Brain", "Mobile")) === false) return -10;
			let dv = 6 + (toInteger(context.stat("DV", "Value")) ?? 0);
			if (context.has("skill", "Acrobatics_Dodge")) dv += 2;
			if (context.has("skill", "Acrobatics_Tumble")) dv += 1;
			dv += attributeModifier(context, "Agility");
			for (const item of carriedItems(context)) dv += item.get("dv") ?? 0;
			return dv;
		},
	},
	ma: {
		summary: "Mental armor of a character",
		fallback: undefined,
		compute: (context) => {
			if (context.has("part", "MentalShield") || !isCharacter(context)) return undefined;
			return (
				4 +
				(toInteger(context.stat("MA", "Value")) ?? 0) +
				attributeModifier(context, "Willpower")
			);
		},
	},
	quickness: {
		summary: "Speed of a creature",
		fallback: undefined,
		compute: (context) =>
			context.inheritsFrom("Creature") ? toInteger(context.stat("Speed", "Value")) : undefined,
	},
	movespeed: {
		summary: "Move speed of a creature",
		fallback: undefined,
		compute: (context) =>
			context.inheritsFrom("Creature") ? toInteger(context.stat("MoveSpeed", "Value")) : undefined,
	},
	acid: resistanceProperty("Acid"),
	cold: resistanceProperty("Cold"),
	electric: resistanceProperty("Electric"),
	heat: resistanceProperty("Heat"),
	strength: attributeProperty("Strength"),
	agility: attributeProperty("Agility"),
	toughness: attributeProperty("Toughness"),
	intelligence: attributeProperty("Intelligence"),
	willpower: attributeProperty("Willpower"),
	ego: attributeProperty("Ego"),
	damage: {
		summary: "Damage dice of a melee, thrown or missile weapon",
		fallback: undefined,
		compute: (context) => {
			let damage: string | undefined;
			if (context.has("part", "MeleeWeapon")) {
				damage = context.part("MeleeWeapon", "BaseDamage");
			}
			if (context.has("part", "Gaslight")) {
				damage = context.part("Gaslight", "ChargedDamage");
			}
			if (context.isSpecified("part", "ThrownWeapon")) {
				damage = context.isSpecified("part", "GeomagneticDisk")
					? context.part("GeomagneticDisk", "Damage")
					: context.part("ThrownWeapon", "Damage");
			}
			return projectileOf(context)?.part("Projectile", "BaseDamage") ?? damage;
		},
	},
	damageaverage: {
		summary: "Average roll of the damage dice",
		fallback: undefined,
		compute: (context) => {
			const damage = context.get("damage");
			return damage === undefined ? undefined : new DiceBag(damage).average();
		},
	},
	pv: {
		summary: "Penetration value: 4 plus any bonus",
		fallback: undefined,
		compute: (context) => {
			const projectile = projectileOf(context)?.part("Projectile", "BasePenetration");
			if (projectile !== undefined) return (toInteger(projectile) ?? 0) + 4;
			if (!context.has("part", "MeleeWeapon")) return undefined;
			const bonus =
				context.part("Gaslight", "ChargedPenetrationBonus") ??
				context.part("MeleeWeapon", "PenBonus");
			return 4 + (toInteger(bonus) ?? 0);
		},
	},
	maxpv: {
		summary: "Penetration with the full strength bonus",
		fallback: undefined,
		compute: (context) => {
			if (context.isSpecified("part", "ThrownWeapon")) {
				return toInteger(context.part("ThrownWeapon", "Penetration")) ?? 1;
			}
			const pv = context.get("pv");
			if (pv === undefined) return undefined;
			return pv + (toInteger(context.part("MeleeWeapon", "MaxStrengthBonus")) ?? 0);
		},
	},
	elementaldamage: {
		summary: "Elemental damage dealt, as a range",
		fallback: undefined,
		compute: (context) => {
			const mod = elementalMod(context);
			if (!mod) return context.part("MeleeWeapon", "ElementalDamage");
			const tier = requiredTier(context, mod.part);
			return `${Math.trunc(tier * mod.low)}-${Math.trunc(tier * mod.high)}`;
		},
	},
	elementaltype: {
		summary: "Kind of elemental damage dealt",
		fallback: undefined,
		compute: (context) => elementalMod(context)?.element ?? context.part("MeleeWeapon", "Element"),
	},
	tohit: {
		summary: "Bonus or penalty to hit",
		fallback: undefined,
		compute: (context) => {
			if (context.has("part", "Armor")) return toInteger(context.part("Armor", "ToHit"));
			if (context.isSpecified("part", "MeleeWeapon")) {
				return toInteger(context.part("MeleeWeapon", "HitBonus"));
			}
			return undefined;
		},
	},
	weaponskill: {
		summary: "Skill tree used to wield the object",
		fallback: undefined,
		compute: (context) => {
			if (context.has("part", "Shield")) return "Shield";
			if (context.has("part", "Projectile")) return undefined;
			let skill = context.part("MeleeWeapon", "Skill");
			skill = context.part("MissileWeapon", "Skill") ?? skill;
			if (context.has("part", "Gaslight")) skill = context.part("Gaslight", "ChargedSkill");
			return skill;
		},
	},
	accuracy: {
		summary: "Missile weapon accuracy",
		fallback: undefined,
		compute: (context) => toInteger(context.part("MissileWeapon", "WeaponAccuracy")),
	},
	shots: {
		summary: "Projectiles fired per action",
		fallback: undefined,
		compute: (context) => toInteger(context.part("MissileWeapon", "ShotsPerAction")),
	},
	maxammo: {
		summary: "Magazine size",
		fallback: undefined,
		compute: (context) => toInteger(context.part("MagazineAmmoLoader", "MaxAmmo")),
	},
	weight: {
		summary: "Weight of anything that is not a character",
		fallback: undefined,
		compute: (context) =>
			isCharacter(context) ? undefined : toInteger(context.part("Physics", "Weight")),
	},
	commerce: {
		summary: "Trade value",
		fallback: undefined,
		compute: (context) => toDecimal(context.part("Commerce", "Value")),
	},
	complexity: {
		summary: "Examiner complexity, when positive or the object can be built",
		fallback: undefined,
		compute: (context) => {
			const complexity = toInteger(context.part("Examiner", "Complexity")) ?? 0;
			if (complexity > 0 || context.part("TinkerItem", "CanBuild") === "true") {
				return complexity;
			}
			return undefined;
		},
	},
	bits: {
		summary: "Tinkering bits recovered on disassembly, in their displayed letters",
		fallback: undefined,
		compute: (context) => {
			if (!context.has("part", "TinkerItem")) return undefined;
			if (
				context.part("TinkerItem", "CanDisassemble") === "false" &&
				context.part("TinkerItem", "CanBuild") === "false"
			) {
				return undefined;
			}
			const bits = context.part("TinkerItem", "Bits");
			return bits?.replace(/[GRCB]/g, (bit) => BIT_TRANSLATION[bit] ?? bit);
		},
	},
	mods: {
		summary: "Item mods with their tiers, from AddMod and from Mod parts",
		fallback: undefined,
		compute: (context) => {
			const mods: ModEntry[] = [];
			const names = context.part("AddMod", "Mods");
			if (names !== undefined) {
				const listed = names.split(",");
				const tiers = context.part("AddMod", "Tiers")?.split(",");
				const count = tiers ? Math.min(listed.length, tiers.length) : listed.length;
				for (let i = 0; i < count; i++) {
					const tier = tiers ? toInteger(tiers[i]) ?? 1 : 1;
					mods.push(Object.freeze({ name: listed[i], tier }));
				}
			}
			for (const part of context.fragments.ofKind("part")) {
				if (!part.name.startsWith("Mod")) continue;
				const tier = toInteger(part.attributes.get("Tier")) ?? 1;
				mods.push(Object.freeze({ name: part.name, tier }));
			}
			return mods.length > 0 ? Object.freeze(mods) : undefined;
		},
	},
	modcount: {
		summary: "Number of mods on the item",
		fallback: undefined,
		compute: (context) => {
			let count = context.part("AddMod", "Mods")?.split(",").length ?? 0;
			for (const part of context.fragments.ofKind("part")) {
				if (part.name.startsWith("Mod")) count++;
			}
			return count > 0 ? count : undefined;
		},
	},
	faction: {
		summary: "Faction loyalties from `Factions=\"Joppa-100,Barathrumites-50\"`",
		fallback: undefined,
		compute: (context) => {
			const raw = context.part("Brain", "Factions");
			if (!raw) return undefined;
			return Object.freeze(parseStandings(context, raw, /^(.+?)-(-?\d+)$/));
		},
	},
	reputationbonus: {
		summary: "Reputation granted by the object",
		fallback: undefined,
		compute: (context) => {
			const raw = context.part("AddsRep", "Faction");
			if (!context.has("part", "AddsRep") || raw === undefined) return undefined;
			return Object.freeze(
				parseStandings(context, raw, /^(.+?):(-?\d+)$/, context.part("AddsRep", "Value"))
			);
		},
	},
	statbonuses: {
		summary: "Boosts declared on stats",
		fallback: undefined,
		compute: (context) => {
			const bonuses: StatBonus[] = [];
			for (const stat of context.fragments.ofKind("stat")) {
				const boost = toInteger(stat.attributes.get("Boost"));
				if (boost !== undefined) bonuses.push(Object.freeze({ stat: stat.name, boost }));
			}
			return bonuses.length > 0 ? Object.freeze(bonuses) : undefined;
		},
	},
	inventory: {
		summary: "Starting inventory",
		fallback: undefined,
		compute: (context) => {
			const entries = context.fragments.ofKind("inventoryobject");
			if (entries.length === 0) return undefined;
			return Object.freeze(
				entries
					.filter((entry) => !SPECIAL_INVENTORY_PREFIXES.includes(entry.name.charAt(0)))
					.map((entry) =>
						Object.freeze({
							blueprint: entry.name,
							count: toInteger(entry.attributes.get("Number")) ?? 1,
							chance: toInteger(entry.attributes.get("Chance")) ?? 100,
						})
					)
			);
		},
	},
	mutations: {
		summary: "Mutations with their levels",
		fallback: undefined,
		compute: (context) => {
			const mutations = context.fragments.ofKind("mutation");
			if (mutations.length === 0) return undefined;
			return Object.freeze(
				mutations.map((mutation) =>
					Object.freeze({
						name: mutation.name + (mutation.attributes.get("GasObject") ?? ""),
						level: toInteger(mutation.attributes.get("Level")) ?? 0,
					})
				)
			);
		},
	},
	skills: {
		summary: "Skill names",
		fallback: undefined,
		compute: (context) => {
			const skills = context.fragments.ofKind("skill");
			return skills.length > 0 ? Object.freeze(skills.map((skill) => skill.name)) : undefined;
		},
	},
	usesslots: {
		summary: "Body slots taken up when equipped",
		fallback: undefined,
		compute: (context) => {
			const slots = context.tag("UsesSlots");
			return slots === undefined ? undefined : Object.freeze(splitList(slots));
		},
	},
	wornon: {
		summary: "Body slot the item is equipped to",
		fallback: undefined,
		compute: (context) =>
			context.part("Armor", "WornOn") ?? context.part("Shield", "WornOn"),
	},
	twohanded: {
		summary: "Whether a weapon takes both hands",
		fallback: undefined,
		compute: (context) => {
			if (!context.has("part", "MeleeWeapon") && !context.has("part", "MissileWeapon")) {
				return undefined;
			}
			const slots = context.tag("UsesSlots");
			if (slots && slots !== "Hand") return undefined;
			return (
				context.part("Physics", "bUsesTwoSlots") !== undefined ||
				context.part("Physics", "UsesTwoSlots") !== undefined
			);
		},
	},
	solid: {
		summary: "Whether the object blocks movement",
		fallback: undefined,
		compute: (context) => toBoolean(context.part("Physics", "Solid")),
	},
	isoccluding: {
		summary: "True when the object blocks line of sight",
		fallback: undefined,
		compute: (context) =>
			toBoolean(context.part("Render", "Occluding")) === true ? true : undefined,
	},
	hidden: {
		summary: "Search difficulty of a hidden object",
		fallback: undefined,
		compute: (context) => toInteger(context.part("Hidden", "Difficulty")),
	},
	lightradius: {
		summary: "Radius of emitted light",
		fallback: undefined,
		compute: (context) => toInteger(context.part("LightSource", "Radius")),
	},
	savemodifier: {
		summary: "Kind of saving throw the object modifies",
		fallback: undefined,
		compute: (context) => context.part("SaveModifier", "Vs"),
	},
	savemodifieramt: {
		summary: "Amount of the saving throw modifier",
		fallback: undefined,
		compute: (context) =>
			context.part("SaveModifier", "Vs") === undefined
				? undefined
				: toInteger(context.part("SaveModifier", "Amount")),
	},
	corpse: {
		summary: "Corpse blueprint dropped, when the chance is positive",
		fallback: undefined,
		compute: (context) => {
			const chance = toInteger(context.part("Corpse", "CorpseChance"));
			return chance !== undefined && chance > 0
				? context.part("Corpse", "CorpseBlueprint")
				: undefined;
		},
	},
	corpsechance: {
		summary: "Percent chance to drop a corpse, when positive",
		fallback: undefined,
		compute: (context) => {
			const chance = toInteger(context.part("Corpse", "CorpseChance"));
			return chance !== undefined && chance > 0 ? chance : undefined;
		},
	},
	demeanor: {
		summary: "Docile, neutral or aggressive",
		fallback: undefined,
		compute: (context) => {
			if (!isCharacter(context)) return undefined;
			const calm = toBoolean(context.part("Brain", "Calm"));
			if (calm !== undefined) return calm ? "docile" : "neutral";
			const hostile = toBoolean(context.part("Brain", "Hostile"));
			if (hostile !== undefined) return hostile ? "aggressive" : "neutral";
			return undefined;
		},
	},
	role: {
		summary: "Assigned role such as Brute, Minion or Uncommon",
		fallback: undefined,
		compute: (context) => context.attr("property", "Role", "Value"),
	},
	aquatic: {
		summary: "Whether a character must stay submerged",
		fallback: undefined,
		compute: (context) =>
			isCharacter(context) ? toBoolean(context.part("Brain", "Aquatic")) : undefined,
	},
	colorstr: {
		summary: "Text mode color string",
		fallback: undefined,
		compute: (context) =>
			context.part("Render", "ColorString") ?? context.part("Gas", "ColorString"),
	},
	renderstr: {
		summary: "Text mode glyph; numeric strings are Code Page 437 code points",
		fallback: undefined,
		compute: (context) => {
			const raw = context.part("Render", "RenderString");
			if (raw !== undefined && raw.length > 1) {
				const code = toInteger(raw);
				if (code === undefined || code < 0 || code > 255) {
					throw new PropertyTypeError("Code Page 437 code point", raw);
				}
				return cp437ToUnicode(code);
			}
			if (context.has("part", "Gas")) return GAS_GLYPH;
			return raw;
		},
	},
	render: {
		summary: "Tile, colors and overlays for the tile compositor",
		fallback: undefined,
		compute: renderAttributes,
	},
};

export function isPropertyName(name: string): name is PropertyName {
	return Object.hasOwn(PROPERTIES, name);
}

export const PROPERTY_NAMES: ReadonlyArray<PropertyName> = Object.freeze(
	Object.keys(PROPERTIES).filter(isPropertyName)
);
