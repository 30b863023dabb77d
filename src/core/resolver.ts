/**
 * Property resolution engine.
 *
 * {@link PropertyResolver} answers `(blueprint, property)` queries against a
 * built tree. Merged fragment tables are computed once per blueprint, each
 * from its parent's table, and every resolved value is stored per blueprint
 * for the resolver's lifetime. The tree is immutable, so nothing is ever
 * invalidated; a new dataset means a new resolver.
 *
 * A raw value that cannot be read as its property's type does not fail the
 * query: the {@link PropertyTypeError} goes to the diagnostics log and the
 * property's fallback is stored instead.
 *
 * @example
 * ```typescript
 * const resolver = new PropertyResolver({ index, genders });
 * const snapjaw = index.get("Snapjaw");
 * if (snapjaw) resolver.resolve(snapjaw, "hp");
 * resolver.stats.computations; // 1
 * ```
 *
 * @module core/resolver
 */
import { DiagnosticLog } from "./diagnostics.js";
import { PropertyTypeError, UnknownPropertyError, type BlueprintError } from "./errors.js";
import { mergeRecord, type FragmentTable } from "./inheritance.js";
import {
	isPropertyName,
	PROPERTIES,
	PROPERTY_NAMES,
	type PropertyContext,
	type PropertyDefinition,
	type PropertyName,
	type PropertyValues,
} from "./properties.js";
import type { GenderTable } from "./text.js";
import type { BlueprintNode, CharacterIndex } from "./tree.js";

export const DEFAULT_GENDER = "neuter";

export interface ResolverOptions {
	index: CharacterIndex;
	genders: GenderTable;
	/** Gender assumed when a blueprint has no Gender tag. */
	defaultGender?: string;
	diagnostics?: DiagnosticLog;
}

export interface ResolverStats {
	/** Property computations actually run (cache misses). */
	computations: number;
	/** Blueprint records merged into fragment tables. */
	merges: number;
	/** Queries answered from the cache. */
	hits: number;
}

type PropertyCache = { -readonly [K in PropertyName]?: { value: PropertyValues[K] } };

export type ResolvedProperties = Partial<PropertyValues>;

class ResolutionContext implements PropertyContext {
	readonly node: BlueprintNode;
	private readonly resolver: PropertyResolver;
	private readonly property: PropertyName;

	constructor(resolver: PropertyResolver, node: BlueprintNode, property: PropertyName) {
		this.resolver = resolver;
		this.node = node;
		this.property = property;
	}

	get fragments(): FragmentTable {
		return this.resolver.fragmentsOf(this.node);
	}

	get genders(): GenderTable {
		return this.resolver.genders;
	}

	get defaultGender(): string {
		return this.resolver.defaultGender;
	}

	attr(kind: string, name: string, attribute: string): string | undefined {
		return this.fragments.attribute(kind, name, attribute);
	}

	part(name: string, attribute: string): string | undefined {
		return this.attr("part", name, attribute);
	}

	stat(name: string, attribute: string): string | undefined {
		return this.attr("stat", name, attribute);
	}

	tag(name: string): string | undefined {
		return this.attr("tag", name, "Value");
	}

	has(kind: string, name?: string): boolean {
		return this.fragments.has(kind, name);
	}

	isSpecified(kind: string, name?: string, attribute?: string): boolean {
		return this.node.isSpecified(kind, name, attribute);
	}

	inheritsFrom(id: string): boolean {
		return this.node.inheritsFrom(id);
	}

	get<K extends PropertyName>(name: K): PropertyValues[K] {
		return this.resolver.resolve(this.node, name);
	}

	lookup(id: string): PropertyContext | undefined {
		const node = this.resolver.index.get(id);
		return node ? new ResolutionContext(this.resolver, node, this.property) : undefined;
	}

	report(error: BlueprintError): void {
		this.resolver.diagnostics.record({
			blueprint: this.node.id,
			context: this.property,
			error,
		});
	}
}

export class PropertyResolver {
	readonly index: CharacterIndex;
	readonly genders: GenderTable;
	readonly defaultGender: string;
	readonly diagnostics: DiagnosticLog;
	readonly stats: ResolverStats = { computations: 0, merges: 0, hits: 0 };
	private readonly tables = new WeakMap<BlueprintNode, FragmentTable>();
	private readonly values = new WeakMap<BlueprintNode, PropertyCache>();
	private readonly inProgress = new Set<string>();

	constructor(options: ResolverOptions) {
		this.index = options.index;
		this.genders = options.genders;
		this.defaultGender = options.defaultGender ?? DEFAULT_GENDER;
		this.diagnostics = options.diagnostics ?? new DiagnosticLog();
	}

	/**
	 * Merged fragments of `node`, built root first from the parent's table.
	 */
	fragmentsOf(node: BlueprintNode): FragmentTable {
		const cached = this.tables.get(node);
		if (cached) return cached;
		const inherited = node.parent ? this.fragmentsOf(node.parent) : undefined;
		const table = mergeRecord(inherited, node.record);
		this.stats.merges++;
		this.tables.set(node, table);
		return table;
	}

	resolve<K extends PropertyName>(node: BlueprintNode, name: K): PropertyValues[K] {
		let cache = this.values.get(node);
		if (!cache) {
			cache = {};
			this.values.set(node, cache);
		}
		const cached = cache[name];
		if (cached) {
			this.stats.hits++;
			return cached.value;
		}
		const value = this.compute(node, name);
		cache[name] = { value };
		return value;
	}

	/**
	 * Resolve a property named at run time.
	 * @throws UnknownPropertyError when `name` is not in the catalogue
	 */
	resolveByName(node: BlueprintNode, name: string): PropertyValues[PropertyName] {
		if (!isPropertyName(name)) throw new UnknownPropertyError(name);
		return this.resolve(node, name);
	}

	/**
	 * Resolve every catalogue property. Failures become diagnostics and
	 * fallbacks, so this never throws for bad data.
	 */
	resolveAll(node: BlueprintNode): ResolvedProperties {
		const resolved: ResolvedProperties = {};
		for (const name of PROPERTY_NAMES) {
			assign(resolved, name, this.resolve(node, name));
		}
		return resolved;
	}

	private compute<K extends PropertyName>(node: BlueprintNode, name: K): PropertyValues[K] {
		const definition: PropertyDefinition<PropertyValues[K]> = PROPERTIES[name];
		const key = `${node.id}\u0000${name}`;
		if (this.inProgress.has(key)) {
			throw new PropertyTypeError("non-circular value", `${node.id}.${name}`, "depends on itself");
		}
		this.stats.computations++;
		this.inProgress.add(key);
		try {
			return definition.compute(new ResolutionContext(this, node, name));
		} catch (error) {
			if (!(error instanceof PropertyTypeError)) throw error;
			this.diagnostics.record({ blueprint: node.id, context: name, error });
			return definition.fallback;
		} finally {
			this.inProgress.delete(key);
		}
	}
}

function assign<K extends PropertyName>(
	target: ResolvedProperties,
	name: K,
	value: PropertyValues[K]
): void {
	target[name] = value;
}
