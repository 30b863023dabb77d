/**
 * Inheritance tree builder.
 *
 * Turns the flat record list into a single-rooted tree of
 * {@link BlueprintNode}s plus the id → node {@link CharacterIndex}. Parents may
 * be declared after their children, so every node is created first and the
 * parent links are resolved in a second pass.
 *
 * @module core/tree
 */
import logger from "../logger.js";
import {
	CyclicInheritanceError,
	MultipleRootsError,
	NoRootError,
	UnresolvedParentError,
} from "./errors.js";
import { indexRecords, type BlueprintRecord, type Fragment } from "./loader.js";

export const INHERITANCE_SEPARATOR = "➜";

export class BlueprintNode {
	readonly record: BlueprintRecord;
	private _parent: BlueprintNode | undefined;
	private readonly _children: BlueprintNode[] = [];

	constructor(record: BlueprintRecord) {
		this.record = record;
	}

	get id(): string {
		return this.record.id;
	}

	/** Upward reference only; the tree owns its nodes through `children`. */
	get parent(): BlueprintNode | undefined {
		return this._parent;
	}

	get children(): ReadonlyArray<BlueprintNode> {
		return this._children;
	}

	get isRoot(): boolean {
		return this._parent === undefined;
	}

	get depth(): number {
		let depth = 0;
		for (let node = this._parent; node; node = node._parent) depth++;
		return depth;
	}

	/**
	 * Ancestors from the parent upward to the root.
	 */
	ancestors(): BlueprintNode[] {
		const result: BlueprintNode[] = [];
		for (let node = this._parent; node; node = node._parent) result.push(node);
		return result;
	}

	/**
	 * The inheritance chain from the root down to this node, inclusive.
	 */
	chain(): BlueprintNode[] {
		return [this, ...this.ancestors()].reverse();
	}

	/**
	 * True if this node is `id` or inherits from it.
	 */
	inheritsFrom(id: string): boolean {
		for (let node: BlueprintNode | undefined = this; node; node = node._parent) {
			if (node.id === id) return true;
		}
		return false;
	}

	/**
	 * @example "Object➜PhysicalObject➜Creature➜Snapjaw"
	 */
	inheritancePath(): string {
		return this.chain()
			.map((node) => node.id)
			.join(INHERITANCE_SEPARATOR);
	}

	/**
	 * Whether this blueprint itself (not an ancestor) declares the fragment,
	 * or the attribute on that fragment when `attribute` is given.
	 */
	isSpecified(kind: string, name?: string, attribute?: string): boolean {
		const fragments: ReadonlyArray<Fragment> =
			kind === "tag" ? this.record.tags : this.record.fragments;
		return fragments.some(
			(fragment) =>
				fragment.kind === kind &&
				(name === undefined || fragment.name === name) &&
				(attribute === undefined || attribute in fragment.attributes)
		);
	}

	/**
	 * Depth-first walk over this node and every descendant, in child order.
	 */
	*descendants(): Generator<BlueprintNode> {
		yield this;
		for (const child of this._children) yield* child.descendants();
	}

	/** @internal used by {@link buildTree} while linking */
	setParent(parent: BlueprintNode): void {
		this._parent = parent;
	}

	/** @internal used by {@link buildTree} once linking succeeded */
	addChild(child: BlueprintNode): void {
		this._children.push(child);
	}

	toString(): string {
		return `BlueprintNode(${this.id})`;
	}
}

/**
 * O(1) blueprint lookup by id. Built once and never modified.
 */
export type CharacterIndex = ReadonlyMap<string, BlueprintNode>;

export interface BlueprintTree {
	readonly root: BlueprintNode;
	readonly index: CharacterIndex;
}

function findCycle(start: BlueprintNode): string[] | undefined {
	const cycle = [start.id];
	for (let node = start.parent; node; node = node.parent) {
		cycle.push(node.id);
		if (node === start) return cycle;
	}
	return undefined;
}

/**
 * Link records into a tree.
 *
 * @throws DuplicateBlueprintError when two records share an id
 * @throws UnresolvedParentError when a parent id has no record
 * @throws CyclicInheritanceError when the parent links loop
 * @throws NoRootError / MultipleRootsError unless exactly one record has no parent
 */
export function buildTree(records: ReadonlyArray<BlueprintRecord>): BlueprintTree {
	// first pass: one node per record
	const recordIndex = indexRecords(records);
	const index = new Map<string, BlueprintNode>();
	for (const [id, record] of recordIndex) {
		index.set(id, new BlueprintNode(record));
	}

	// second pass: parent links, checking for a loop as each link is added
	const roots: BlueprintNode[] = [];
	for (const node of index.values()) {
		const parentId = node.record.parentId;
		if (parentId === undefined) {
			roots.push(node);
			continue;
		}
		const parent = index.get(parentId);
		if (!parent) {
			throw new UnresolvedParentError(node.id, parentId);
		}
		node.setParent(parent);
		const cycle = findCycle(node);
		if (cycle) {
			throw new CyclicInheritanceError(cycle);
		}
	}

	if (roots.length === 0) throw new NoRootError();
	if (roots.length > 1) throw new MultipleRootsError(roots.map((node) => node.id));

	for (const node of index.values()) {
		node.parent?.addChild(node);
	}

	const root = roots[0];
	logger.debug(`Built blueprint tree rooted at ${root.id}`, {
		root: root.id,
		blueprints: index.size,
	});
	return Object.freeze({ root, index });
}
