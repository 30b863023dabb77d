/**
 * Stat values (`sValue`): comma separated dice terms summed together, where
 * `(t)`, `(t-1)` and `(t+1)` stand for the blueprint's tier.
 *
 * @example
 * ```typescript
 * const strength = new SValue("16,1d3,(t-1)d2", 5);
 * strength.low;  // 18
 * strength.high; // 21
 * ```
 *
 * @module core/svalue
 */
import { DiceBag } from "./dicebag.js";
import { PropertyTypeError } from "./errors.js";

const TIER_TOKEN = /\(t([+-]\d+)?\)/g;

/**
 * Tier for a level: one tier per five levels, starting at 1.
 */
export function tierForLevel(level: number): number {
	return Math.floor(level / 5) + 1;
}

/**
 * Levels are occasionally written as ranges such as `18-29`; the lower bound
 * is used.
 * @throws PropertyTypeError when no leading integer can be read
 */
export function parseLevel(raw: string): number {
	const match = /^\s*(\d+)/.exec(raw);
	if (!match) {
		throw new PropertyTypeError("level", raw);
	}
	return Number(match[1]);
}

export class SValue {
	readonly raw: string;
	readonly level: number;
	readonly tier: number;
	readonly terms: ReadonlyArray<DiceBag>;
	readonly low: number;
	readonly high: number;

	/**
	 * @throws PropertyTypeError when a term is not a dice string
	 */
	constructor(raw: string, level = 1) {
		this.raw = raw;
		this.level = level;
		this.tier = tierForLevel(level);
		const expanded = raw.replace(TIER_TOKEN, (_token, delta?: string) =>
			String(this.tier + (delta ? Number(delta) : 0))
		);
		const terms = expanded
			.split(",")
			.filter((term) => term.trim().length > 0)
			.map((term) => new DiceBag(term));
		if (terms.length === 0) {
			throw new PropertyTypeError("sValue", raw, "no terms");
		}
		this.terms = Object.freeze(terms);
		this.low = terms.reduce((sum, term) => sum + term.minimum(), 0);
		this.high = terms.reduce((sum, term) => sum + term.maximum(), 0);
	}

	/**
	 * `"17"` when the value is fixed, `"17-19"` otherwise.
	 */
	toString(): string {
		return this.low === this.high ? `${this.low}` : `${this.low}-${this.high}`;
	}
}
