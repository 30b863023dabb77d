/**
 * Core errors module.
 *
 * Every failure the engine can report is a {@link BlueprintError}. The
 * `severity` tells callers how far the failure reaches:
 *
 * - `load`: the whole dataset load is aborted (a partial inheritance tree
 *   cannot be trusted).
 * - `query`: only the single resolution call fails.
 * - `diagnostic`: never thrown past the engine; recorded in a
 *   {@link DiagnosticLog} while resolution continues with a fallback.
 *
 * @module core/errors
 */

export type ErrorSeverity = "load" | "query" | "diagnostic";

/**
 * Position of a construct inside a source file. Lines and columns are 1-based.
 */
export interface SourceLocation {
	source: string;
	line: number;
	column: number;
}

export function formatLocation(location: SourceLocation): string {
	return `${location.source}:${location.line}:${location.column}`;
}

export abstract class BlueprintError extends Error {
	abstract readonly severity: ErrorSeverity;

	constructor(message: string) {
		super(message);
		this.name = new.target.name;
	}
}

// ---------------------------------------------------------------------------
// fatal to load

export class MalformedSourceError extends BlueprintError {
	readonly severity = "load";
	readonly location: SourceLocation;
	readonly fragment: string;

	constructor(location: SourceLocation, detail: string, fragment = "") {
		super(`Malformed markup at ${formatLocation(location)}: ${detail}`);
		this.location = location;
		this.fragment = fragment;
	}
}

export class DuplicateBlueprintError extends BlueprintError {
	readonly severity = "load";
	readonly id: string;
	readonly first: SourceLocation;
	readonly second: SourceLocation;

	constructor(id: string, first: SourceLocation, second: SourceLocation) {
		super(
			`Blueprint "${id}" is declared twice (${formatLocation(
				first
			)} and ${formatLocation(second)})`
		);
		this.id = id;
		this.first = first;
		this.second = second;
	}
}

export class CyclicInheritanceError extends BlueprintError {
	readonly severity = "load";
	/** Blueprint ids along the cycle; the first id is repeated at the end. */
	readonly cycle: ReadonlyArray<string>;

	constructor(cycle: ReadonlyArray<string>) {
		super(`Cyclic inheritance: ${cycle.join(" ➜ ")}`);
		this.cycle = cycle;
	}
}

export class UnresolvedParentError extends BlueprintError {
	readonly severity = "load";
	readonly id: string;
	readonly parentId: string;

	constructor(id: string, parentId: string) {
		super(`Blueprint "${id}" inherits from unknown blueprint "${parentId}"`);
		this.id = id;
		this.parentId = parentId;
	}
}

export class MultipleRootsError extends BlueprintError {
	readonly severity = "load";
	readonly roots: ReadonlyArray<string>;

	constructor(roots: ReadonlyArray<string>) {
		super(`Expected a single root blueprint, found ${roots.length}: ${roots.join(", ")}`);
		this.roots = roots;
	}
}

export class NoRootError extends BlueprintError {
	readonly severity = "load";

	constructor() {
		super("No root blueprint: every blueprint declares a parent");
	}
}

// ---------------------------------------------------------------------------
// fatal to query

export class UnknownPropertyError extends BlueprintError {
	readonly severity = "query";
	readonly property: string;

	constructor(property: string) {
		super(`Unknown property "${property}"`);
		this.property = property;
	}
}

// ---------------------------------------------------------------------------
// recoverable, collected as diagnostics

export class PropertyTypeError extends BlueprintError {
	readonly severity = "diagnostic";
	readonly expected: string;
	readonly raw: string;

	constructor(expected: string, raw: string, detail?: string) {
		super(
			`Cannot read "${raw}" as ${expected}${detail ? ` (${detail})` : ""}`
		);
		this.expected = expected;
		this.raw = raw;
	}
}

export class UnresolvedPlaceholderError extends BlueprintError {
	readonly severity = "diagnostic";
	readonly placeholder: string;

	constructor(placeholder: string) {
		super(`Unresolved text placeholder ${placeholder}`);
		this.placeholder = placeholder;
	}
}

export class UnknownColorCodeError extends BlueprintError {
	readonly severity = "diagnostic";
	readonly code: string;

	constructor(code: string) {
		super(`Unknown color code "${code}"`);
		this.code = code;
	}
}

export class MissingGlyphError extends BlueprintError {
	readonly severity = "diagnostic";
	readonly glyph: string;

	constructor(glyph: string) {
		super(`Base image "${glyph}" is not available`);
		this.glyph = glyph;
	}
}
