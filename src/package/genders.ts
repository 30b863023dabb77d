/**
 * Package: genders - grammatical gender table loader
 *
 * Reads the gender YAML (`data/genders.yaml` by default): one entry per
 * gender name with its five pronoun forms and whether verbs take the plural.
 *
 * ```yaml
 * male:
 *   subjective: he
 *   objective: him
 *   possessive: his
 *   substantivePossessive: his
 *   reflexive: himself
 *   plural: false
 * ```
 *
 * @module package/genders
 */
import { readFile } from "fs/promises";
import YAML from "js-yaml";
import logger from "../logger.js";
import type { GenderTable, PronounKey, PronounSet } from "../core/text.js";
import { getDataPath } from "../utils/path.js";

function isMapping(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readPronounSet(gender: string, entry: unknown): PronounSet {
	if (!isMapping(entry)) {
		throw new TypeError(`Gender "${gender}" must be a mapping of pronoun forms`);
	}
	const forms = entry;
	const form = (key: PronounKey): string => {
		const value = forms[key];
		if (typeof value !== "string" || value.length === 0) {
			throw new TypeError(`Gender "${gender}" is missing the ${key} form`);
		}
		return value;
	};
	return {
		subjective: form("subjective"),
		objective: form("objective"),
		possessive: form("possessive"),
		substantivePossessive: form("substantivePossessive"),
		reflexive: form("reflexive"),
		plural: entry.plural === true,
	};
}

/**
 * Build a gender table from parsed YAML.
 * @throws TypeError for an entry without all five pronoun forms
 */
export function parseGenders(document: unknown): GenderTable {
	if (!isMapping(document)) {
		throw new TypeError("Gender table must be a mapping of gender names");
	}
	const table = new Map<string, Readonly<PronounSet>>();
	for (const [gender, entry] of Object.entries(document)) {
		table.set(gender, Object.freeze(readPronounSet(gender, entry)));
	}
	return table;
}

export async function loadGenders(path: string = getDataPath("genders.yaml")): Promise<GenderTable> {
	const content = await readFile(path, "utf-8");
	const genders = parseGenders(YAML.load(content));
	logger.debug(`Loaded ${genders.size} genders from ${path}`);
	return genders;
}
