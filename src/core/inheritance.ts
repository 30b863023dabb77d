/**
 * Fragment merge rules.
 *
 * A blueprint's effective fragments are its ancestors' fragments with its own
 * declarations applied on top, root first. Per attribute:
 *
 * - override (default): the nearest declaring blueprint wins, and attributes
 *   a redeclared fragment leaves out are still inherited;
 * - `*delete`: removes the attribute along with everything inherited for it;
 *   on a tag's `Value` it removes the whole tag;
 * - `*noinherit`: descendants that do not redeclare the attribute lose the
 *   whole fragment;
 * - additive: once a fragment lists an attribute in `Additive="A,B"`, later
 *   declarations of it accumulate onto the value in force (integers add up,
 *   anything else is joined with commas).
 *
 * `<removepart Name="X" />` drops the inherited part `X`.
 *
 * @module core/inheritance
 */
import type { BlueprintRecord, Fragment } from "./loader.js";

export const DELETE_VALUE = "*delete";
export const NOINHERIT_VALUE = "*noinherit";
export const ADDITIVE_ATTRIBUTE = "Additive";
export const REMOVE_PART_KIND = "removepart";

export interface MergedFragment {
	readonly kind: string;
	readonly name: string;
	readonly attributes: ReadonlyMap<string, string>;
	/** Attributes that accumulate rather than override. */
	readonly additive: ReadonlySet<string>;
	/** Nearest blueprint that declared this fragment. */
	readonly declaredBy: string;
}

interface MutableFragment {
	kind: string;
	name: string;
	attributes: Map<string, string>;
	additive: Set<string>;
	declaredBy: string;
}

const INTEGER = /^[+-]?\d+$/;

function accumulate(previous: string, next: string): string {
	if (previous === "") return next;
	if (INTEGER.test(previous) && INTEGER.test(next)) {
		return String(Number(previous) + Number(next));
	}
	return `${previous},${next}`;
}

function splitList(value: string | undefined): string[] {
	if (!value) return [];
	return value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
}

/**
 * The merged fragments of one blueprint, grouped by kind then name, in the
 * order they were first declared along the chain.
 */
export class FragmentTable {
	private readonly kinds = new Map<string, Map<string, MutableFragment>>();

	get(kind: string, name: string): MergedFragment | undefined {
		return this.kinds.get(kind)?.get(name);
	}

	has(kind: string, name?: string): boolean {
		const named = this.kinds.get(kind);
		if (!named) return false;
		return name === undefined ? named.size > 0 : named.has(name);
	}

	attribute(kind: string, name: string, attribute: string): string | undefined {
		return this.kinds.get(kind)?.get(name)?.attributes.get(attribute);
	}

	ofKind(kind: string): MergedFragment[] {
		return Array.from(this.kinds.get(kind)?.values() ?? []);
	}

	get size(): number {
		let size = 0;
		for (const named of this.kinds.values()) size += named.size;
		return size;
	}

	clone(): FragmentTable {
		const copy = new FragmentTable();
		for (const [kind, named] of this.kinds) {
			const target = new Map<string, MutableFragment>();
			for (const [name, fragment] of named) {
				target.set(name, {
					kind: fragment.kind,
					name: fragment.name,
					attributes: new Map(fragment.attributes),
					additive: new Set(fragment.additive),
					declaredBy: fragment.declaredBy,
				});
			}
			copy.kinds.set(kind, target);
		}
		return copy;
	}

	/** @internal */
	delete(kind: string, name: string): void {
		this.kinds.get(kind)?.delete(name);
	}

	/** @internal */
	entries(): Array<MutableFragment> {
		const result: MutableFragment[] = [];
		for (const named of this.kinds.values()) result.push(...named.values());
		return result;
	}

	/** @internal */
	ensure(kind: string, name: string, declaredBy: string): MutableFragment {
		let named = this.kinds.get(kind);
		if (!named) {
			named = new Map();
			this.kinds.set(kind, named);
		}
		let fragment = named.get(name);
		if (!fragment) {
			fragment = {
				kind,
				name,
				attributes: new Map(),
				additive: new Set(),
				declaredBy,
			};
			named.set(name, fragment);
		}
		fragment.declaredBy = declaredBy;
		return fragment;
	}
}

function declares(
	record: BlueprintRecord,
	kind: string,
	name: string,
	attribute: string
): boolean {
	const fragments = kind === "tag" ? record.tags : record.fragments;
	return fragments.some(
		(fragment) =>
			fragment.kind === kind &&
			fragment.name === name &&
			attribute in fragment.attributes
	);
}

function applyFragment(
	table: FragmentTable,
	fragment: Fragment,
	declaredBy: string
): void {
	if (fragment.kind === "tag" && fragment.attributes.Value === DELETE_VALUE) {
		table.delete(fragment.kind, fragment.name);
		return;
	}
	const target = table.ensure(fragment.kind, fragment.name, declaredBy);
	for (const attribute of splitList(fragment.attributes[ADDITIVE_ATTRIBUTE])) {
		target.additive.add(attribute);
	}
	for (const [attribute, value] of Object.entries(fragment.attributes)) {
		if (attribute === ADDITIVE_ATTRIBUTE) continue;
		if (value === DELETE_VALUE) {
			target.attributes.delete(attribute);
			continue;
		}
		const previous = target.attributes.get(attribute);
		if (target.additive.has(attribute) && previous !== undefined) {
			target.attributes.set(attribute, accumulate(previous, value));
		} else {
			target.attributes.set(attribute, value);
		}
	}
}

/**
 * Apply one blueprint's declarations on top of its parent's merged table.
 * `inherited` is left untouched.
 */
export function mergeRecord(
	inherited: FragmentTable | undefined,
	record: BlueprintRecord
): FragmentTable {
	const table = inherited ? inherited.clone() : new FragmentTable();

	if (inherited) {
		for (const fragment of table.entries()) {
			for (const [attribute, value] of fragment.attributes) {
				if (
					value === NOINHERIT_VALUE &&
					!declares(record, fragment.kind, fragment.name, attribute)
				) {
					table.delete(fragment.kind, fragment.name);
					break;
				}
			}
		}
	}

	for (const fragment of record.fragments) {
		if (fragment.kind === REMOVE_PART_KIND) {
			table.delete("part", fragment.name);
		}
	}

	for (const fragment of [...record.fragments, ...record.tags]) {
		if (fragment.kind === REMOVE_PART_KIND) continue;
		applyFragment(table, fragment, record.id);
	}
	return table;
}

/**
 * Merge a whole chain, root first.
 */
export function mergeChain(chain: ReadonlyArray<BlueprintRecord>): FragmentTable {
	let table: FragmentTable | undefined;
	for (const record of chain) {
		table = mergeRecord(table, record);
	}
	return table ?? new FragmentTable();
}
