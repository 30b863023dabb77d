import { suite, test } from "node:test";
import assert from "node:assert";
import { parseLevel, SValue, tierForLevel } from "./svalue.js";
import { PropertyTypeError } from "./errors.js";

suite("core/svalue.ts", () => {
	suite("tierForLevel()", () => {
		test("should advance one tier every five levels", () => {
			assert.strictEqual(tierForLevel(0), 1);
			assert.strictEqual(tierForLevel(4), 1);
			assert.strictEqual(tierForLevel(5), 2);
			assert.strictEqual(tierForLevel(29), 6);
		});
	});

	suite("parseLevel()", () => {
		test("should read the lower bound of a range", () => {
			assert.strictEqual(parseLevel("18-29"), 18);
			assert.strictEqual(parseLevel("7"), 7);
		});

		test("should reject text without a leading number", () => {
			assert.throws(() => parseLevel("high"), PropertyTypeError);
		});
	});

	suite("SValue", () => {
		test("should sum terms at tier 1", () => {
			const value = new SValue("16,1d3,(t-1)d2", 1);
			assert.strictEqual(value.tier, 1);
			assert.strictEqual(value.low, 17);
			assert.strictEqual(value.high, 19);
			assert.strictEqual(value.toString(), "17-19");
		});

		test("should substitute the tier for the level", () => {
			const value = new SValue("16,1d3,(t-1)d2", 5);
			assert.strictEqual(value.tier, 2);
			assert.strictEqual(value.low, 18);
			assert.strictEqual(value.high, 21);
		});

		test("should accept dice terms with modifiers", () => {
			const value = new SValue("12,1d4-1");
			assert.strictEqual(value.toString(), "12-15");
		});

		test("should expand a bare tier token", () => {
			const value = new SValue("(t)d100");
			assert.strictEqual(value.low, 1);
			assert.strictEqual(value.high, 100);
		});

		test("should print a fixed value once", () => {
			assert.strictEqual(new SValue("(t+1)", 10).toString(), "4");
		});

		test("should reject a value without terms", () => {
			assert.throws(() => new SValue(",,"), PropertyTypeError);
		});

		test("should reject a malformed term", () => {
			assert.throws(() => new SValue("16,abc"), PropertyTypeError);
		});
	});
});
