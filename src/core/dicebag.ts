/**
 * Dice strings such as `1d4`, `3d6+1-2d2` or `17`.
 *
 * Plain numbers are treated as dice with one side, so `7` is `7d1`.
 *
 * @example
 * ```typescript
 * const bag = new DiceBag("3d2-1");
 * bag.average(); // 3.5
 * bag.minimum(); // 2
 * bag.maximum(); // 5
 * ```
 *
 * @module core/dicebag
 */
import { PropertyTypeError } from "./errors.js";

export const MAX_DICE = 5000;
export const MAX_SIDES = 500;

const VALID_CHARACTERS = /^[\d\sd+-]+$/;
const REPEATED_OPERATORS = /\+{2,}|-[-+]+/;
const SEGMENT = /[+-]?[^+-]+/g;
const DIE_ROLL = /^([+-]?\d+)d(\d+)$/;
const DIE_BONUS = /^[+-]?\d+$/;

export interface Die {
	/** Negative for dice that are subtracted. */
	readonly quantity: number;
	readonly sides: number;
}

function makeDie(raw: string, quantity: number, sides: number): Die {
	if (Math.abs(quantity) > MAX_DICE) {
		throw new PropertyTypeError(
			"dice string",
			raw,
			`${Math.abs(quantity)} is too many dice to roll`
		);
	}
	if (sides < 1) {
		throw new PropertyTypeError(
			"dice string",
			raw,
			`${sides} is too low for the number of sides on a die`
		);
	}
	if (sides > MAX_SIDES) {
		throw new PropertyTypeError(
			"dice string",
			raw,
			`${sides} is too high for the number of sides on a die`
		);
	}
	return Object.freeze({ quantity, sides });
}

export class DiceBag {
	readonly diceString: string;
	readonly dice: ReadonlyArray<Die>;

	/**
	 * @throws PropertyTypeError when the string is not a dice string or a die is out of range
	 */
	constructor(diceString: string) {
		if (!VALID_CHARACTERS.test(diceString)) {
			throw new PropertyTypeError(
				"dice string",
				diceString,
				"only digits, 'd', '+', '-' and spaces are allowed"
			);
		}
		const compact = diceString.replace(/\s+/g, "");
		if (REPEATED_OPERATORS.test(compact)) {
			throw new PropertyTypeError(
				"dice string",
				diceString,
				"operators cannot follow each other"
			);
		}
		const segments = compact.match(SEGMENT) ?? [];
		if (segments.join("") !== compact) {
			throw new PropertyTypeError("dice string", diceString, "dangling operator");
		}

		const dice: Die[] = [];
		for (const segment of segments) {
			const roll = DIE_ROLL.exec(segment);
			if (roll) {
				dice.push(makeDie(diceString, Number(roll[1]), Number(roll[2])));
			} else if (DIE_BONUS.test(segment)) {
				dice.push(makeDie(diceString, Number(segment), 1));
			} else {
				throw new PropertyTypeError(
					"dice string",
					diceString,
					`${segment} must be a number or (number)d(number)`
				);
			}
		}
		this.diceString = compact;
		this.dice = Object.freeze(dice);
	}

	average(): number {
		let total = 0;
		for (const die of this.dice) total += (die.quantity * (1 + die.sides)) / 2;
		return total;
	}

	minimum(): number {
		let total = 0;
		for (const die of this.dice) {
			total += die.quantity >= 0 ? die.quantity : die.quantity * die.sides;
		}
		return total;
	}

	maximum(): number {
		let total = 0;
		for (const die of this.dice) {
			total += die.quantity >= 0 ? die.quantity * die.sides : die.quantity;
		}
		return total;
	}

	/**
	 * Roll every die once.
	 * @param random Source of uniform numbers in [0, 1)
	 */
	shake(random: () => number = Math.random): number {
		let total = 0;
		for (const die of this.dice) {
			const sign = Math.sign(die.quantity);
			for (let i = 0; i < Math.abs(die.quantity); i++) {
				total += sign * (Math.floor(random() * die.sides) + 1);
			}
		}
		return total;
	}

	toString(): string {
		return this.diceString;
	}
}
