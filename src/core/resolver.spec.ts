import { suite, test } from "node:test";
import assert from "node:assert";
import { loadBlueprints } from "./loader.js";
import { buildTree } from "./tree.js";
import { DEFAULT_GENDER, PropertyResolver } from "./resolver.js";
import { UnknownPropertyError } from "./errors.js";
import { PROPERTY_NAMES } from "./properties.js";
import type { GenderTable, PronounSet } from "./text.js";

const MALE: PronounSet = {
	subjective: "he",
	objective: "him",
	possessive: "his",
	substantivePossessive: "his",
	reflexive: "himself",
	plural: false,
};

const GENDERS: GenderTable = new Map([["male", MALE]]);

const MARKUP = `<objects>
	<object Name="Object" />
	<object Name="Creature" Inherits="Object" />
	<object Name="Snapjaw" Inherits="Creature">
		<part Name="Brain" />
		<part Name="Description" Short="=pronouns.Subjective= =verb:bark= at =pronouns.objective=self." />
		<tag Name="Gender" Value="male" />
	</object>
	<object Name="Weapon" Inherits="Object">
		<part Name="MeleeWeapon" BaseDamage="1d2" />
	</object>
	<object Name="IronSword" Inherits="Weapon" />
</objects>`;

function fixture() {
	const { index } = buildTree(loadBlueprints(MARKUP, "test.xml"));
	const resolver = new PropertyResolver({ index, genders: GENDERS });
	const node = (id: string) => {
		const found = index.get(id);
		assert.ok(found, `missing fixture ${id}`);
		return found;
	};
	return { resolver, node };
}

suite("core/resolver.ts", () => {
	suite("PropertyResolver", () => {
		test("should substitute the male pronoun through an empty parent", () => {
			const { resolver, node } = fixture();
			assert.strictEqual(resolver.resolve(node("Snapjaw"), "description"), "He barks at himself.");
			assert.strictEqual(resolver.diagnostics.size, 0);
		});

		test("should inherit damage rather than use a default", () => {
			const { resolver, node } = fixture();
			assert.strictEqual(resolver.resolve(node("IronSword"), "damage"), "1d2");
		});

		test("should compute each property once", () => {
			const { resolver, node } = fixture();
			const sword = node("IronSword");
			const first = resolver.resolve(sword, "damage");
			assert.deepStrictEqual(resolver.stats, { computations: 1, merges: 3, hits: 0 });
			const second = resolver.resolve(sword, "damage");
			assert.strictEqual(second, first);
			assert.deepStrictEqual(resolver.stats, { computations: 1, merges: 3, hits: 1 });
		});

		test("should reuse a parent's merged table", () => {
			const { resolver, node } = fixture();
			resolver.resolve(node("IronSword"), "damage");
			resolver.resolve(node("Weapon"), "damage");
			assert.strictEqual(resolver.stats.merges, 3);
			assert.strictEqual(resolver.stats.computations, 2);
		});

		test("should return the same object for structured values", () => {
			const { resolver, node } = fixture();
			const snapjaw = node("Snapjaw");
			assert.strictEqual(resolver.resolve(snapjaw, "pronouns"), MALE);
			assert.strictEqual(resolver.resolve(snapjaw, "flags"), resolver.resolve(snapjaw, "flags"));
		});

		test("should keep separate resolvers apart", () => {
			const first = fixture();
			const second = fixture();
			first.resolver.resolve(first.node("IronSword"), "damage");
			assert.strictEqual(second.resolver.stats.computations, 0);
		});

		test("should resolve names given at run time", () => {
			const { resolver, node } = fixture();
			assert.strictEqual(resolver.resolveByName(node("IronSword"), "damage"), "1d2");
			assert.throws(
				() => resolver.resolveByName(node("IronSword"), "sharpness"),
				(error: unknown) => {
					assert.ok(error instanceof UnknownPropertyError);
					assert.strictEqual(error.property, "sharpness");
					assert.strictEqual(error.severity, "query");
					return true;
				}
			);
		});

		test("should resolve the whole catalogue", () => {
			const { resolver, node } = fixture();
			const all = resolver.resolveAll(node("Snapjaw"));
			assert.deepStrictEqual(Object.keys(all), [...PROPERTY_NAMES]);
			assert.strictEqual(all.id, "Snapjaw");
			assert.strictEqual(all.inheritancepath, "Object➜Creature➜Snapjaw");
			assert.strictEqual(all.damage, undefined);
		});

		test("should default to the neuter gender", () => {
			const { resolver } = fixture();
			assert.strictEqual(resolver.defaultGender, DEFAULT_GENDER);
			assert.strictEqual(DEFAULT_GENDER, "neuter");
		});

		test("should record a missing default gender as a diagnostic", () => {
			const { resolver, node } = fixture();
			assert.strictEqual(resolver.resolve(node("IronSword"), "pronouns"), undefined);
			const [entry] = resolver.diagnostics.forBlueprint("IronSword");
			assert.strictEqual(entry.context, "pronouns");
			assert.strictEqual(entry.error.message, 'Cannot read "neuter" as gender (not in the gender table)');
		});
	});
});
