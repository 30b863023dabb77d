/**
 * Core diagnostics module.
 *
 * Recoverable anomalies (bad property values, unresolved placeholders,
 * unknown color codes, missing glyph images) are collected here instead of
 * being thrown, so one blueprint's problem never stops a batch over many.
 *
 * @module core/diagnostics
 */
import logger from "../logger.js";
import { BlueprintError } from "./errors.js";

export interface Diagnostic {
	/** Blueprint the anomaly belongs to, when there is one. */
	blueprint?: string;
	/** Property or render step that produced it. */
	context: string;
	error: BlueprintError;
}

export class DiagnosticLog {
	private readonly entries: Diagnostic[] = [];

	record(diagnostic: Diagnostic): void {
		this.entries.push(diagnostic);
		logger.warn(diagnostic.error.message, {
			blueprint: diagnostic.blueprint,
			context: diagnostic.context,
			kind: diagnostic.error.name,
		});
	}

	get size(): number {
		return this.entries.length;
	}

	all(): ReadonlyArray<Diagnostic> {
		return this.entries;
	}

	forBlueprint(id: string): Diagnostic[] {
		return this.entries.filter((entry) => entry.blueprint === id);
	}

	ofKind<E extends BlueprintError>(
		kind: abstract new (...args: never[]) => E
	): Diagnostic[] {
		return this.entries.filter((entry) => entry.error instanceof kind);
	}
}
