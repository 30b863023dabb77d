import { suite, test } from "node:test";
import assert from "node:assert";
import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
	createPalette,
	DuplicateBlueprintError,
	loadDataset,
	MalformedSourceError,
	MemoryGlyphSource,
	MissingGlyphError,
	renderTile,
	UnresolvedParentError,
	type GenderTable,
} from "../index.js";

const GENDERS: GenderTable = new Map();

const CREATURES = [
	"<objects>",
	'<object Name="Object" />',
	'<object Name="Creature" Inherits="Object">',
	'<part Name="Render" Tile="c.png" TileColor="&amp;r" DetailColor="y" />',
	"</object>",
	"</objects>",
].join("\n");

const SNAPJAWS = new TextEncoder().encode(
	'<objects>\r\n<object Name="Snapjaw" Inherits="Creature"><part Name="Render" DisplayName="Tom & Jerry" /></object>\r\n</objects>'
);

const PALETTE = createPalette({ r: [166, 74, 46], y: [177, 201, 195], transparent: [15, 64, 63, 0] });
const GLYPHS = new MemoryGlyphSource([["c.png", { width: 1, height: 1, data: Uint8Array.from([0, 0, 0, 255]) }]]);

function load() {
	return loadDataset(
		{
			files: [
				{ path: "Creatures.xml", content: CREATURES },
				{ path: "Snapjaws.xml", content: SNAPJAWS },
			],
			version: "1.0.0",
		},
		{ genders: GENDERS }
	);
}

suite("core/dataset.ts", () => {
	suite("loadDataset()", () => {
		test("should repair control characters from any working directory", async () => {
			const previous = process.cwd();
			const elsewhere = await mkdtemp(join(tmpdir(), "blueprint-atlas-cwd-"));
			try {
				process.chdir(elsewhere);
				const dataset = loadDataset(
					{
						files: [
							{
								path: "Lamp.xml",
								content: '<objects><object Name="Object"><part Name="Render" DisplayName="a\u0003b" /></object></objects>',
							},
						],
						version: "1.0.0",
					},
					{ genders: GENDERS }
				);
				assert.strictEqual(dataset.repairs, 1);
				assert.strictEqual(dataset.resolver.resolve(dataset.root, "displayname"), "a♥b");
			} finally {
				process.chdir(previous);
				await rm(elsewhere, { recursive: true, force: true });
			}
		});

		test("should link blueprints across files", () => {
			const dataset = load();
			assert.strictEqual(dataset.root.id, "Object");
			assert.strictEqual(dataset.index.size, 3);
			assert.strictEqual(dataset.index.get("Snapjaw")?.inheritancePath(), "Object➜Creature➜Snapjaw");
			assert.strictEqual(dataset.version, "1.0.0");
		});

		test("should summarize each source", () => {
			const dataset = load();
			assert.strictEqual(dataset.repairs, 3);
			assert.deepStrictEqual(dataset.sources, [
				{
					path: "Creatures.xml",
					repairs: 0,
					counts: { invalidCharacters: 0, lineBreaks: 0, escapedCharacters: 0 },
					blueprints: 2,
				},
				{
					path: "Snapjaws.xml",
					repairs: 3,
					counts: { invalidCharacters: 0, lineBreaks: 2, escapedCharacters: 1 },
					blueprints: 1,
				},
			]);
		});

		test("should resolve repaired values", () => {
			const dataset = load();
			const snapjaw = dataset.index.get("Snapjaw");
			assert.ok(snapjaw);
			assert.strictEqual(dataset.resolver.resolve(snapjaw, "displayname"), "Tom & Jerry");
		});

		test("should be frozen", () => {
			const dataset = load();
			assert.ok(Object.isFrozen(dataset));
			assert.ok(Object.isFrozen(dataset.sources));
		});

		test("should reject a blueprint declared in two files", () => {
			assert.throws(
				() =>
					loadDataset(
						{
							files: [
								{ path: "a.xml", content: '<objects><object Name="Object" /></objects>' },
								{ path: "b.xml", content: '<objects><object Name="Object" /></objects>' },
							],
							version: "1.0.0",
						},
						{ genders: GENDERS }
					),
				DuplicateBlueprintError
			);
		});

		test("should name the blueprint whose parent is missing", () => {
			assert.throws(
				() =>
					loadDataset(
						{
							files: [
								{
									path: "a.xml",
									content: '<objects><object Name="Object" /><object Name="Orphan" Inherits="Ghost" /></objects>',
								},
							],
							version: "1.0.0",
						},
						{ genders: GENDERS }
					),
				(error: unknown) => {
					assert.ok(error instanceof UnresolvedParentError);
					assert.strictEqual(error.message, 'Blueprint "Orphan" inherits from unknown blueprint "Ghost"');
					return true;
				}
			);
		});

		test("should abort on markup that cannot be repaired", () => {
			assert.throws(
				() =>
					loadDataset(
						{ files: [{ path: "bad.xml", content: "<objects><object Name=\"A\"></objects>" }], version: "1" },
						{ genders: GENDERS }
					),
				MalformedSourceError
			);
		});
	});

	suite("decoding", () => {
		test("should reject bytes that are not UTF-8 and point at them", () => {
			const content = Uint8Array.from([
				...new TextEncoder().encode('<objects>\n<object Name="A'),
				0xff,
				...new TextEncoder().encode('" /></objects>'),
			]);
			assert.throws(
				() => loadDataset({ files: [{ path: "latin1.xml", content }], version: "1" }, { genders: GENDERS }),
				(error: unknown) => {
					assert.ok(error instanceof MalformedSourceError);
					assert.deepStrictEqual(error.location, { source: "latin1.xml", line: 2, column: 16 });
					assert.strictEqual(error.message, "Malformed markup at latin1.xml:2:16: invalid UTF-8");
					return true;
				}
			);
		});
	});

	suite("renderTile()", () => {
		test("should composite and enlarge the tile", () => {
			const dataset = load();
			const snapjaw = dataset.index.get("Snapjaw");
			assert.ok(snapjaw);
			const result = renderTile(dataset, snapjaw, { palette: PALETTE, glyphs: GLYPHS, scale: 2 });
			assert.ok(result.complete);
			assert.strictEqual(result.image.width, 2);
			assert.strictEqual(result.image.height, 2);
			assert.deepStrictEqual(
				Array.from(result.image.data),
				[166, 74, 46, 255, 166, 74, 46, 255, 166, 74, 46, 255, 166, 74, 46, 255]
			);
		});

		test("should return a blank tile for a blueprint without a Render part", () => {
			const dataset = load();
			const result = renderTile(dataset, dataset.root, { palette: PALETTE, glyphs: GLYPHS });
			assert.strictEqual(result.complete, false);
			assert.strictEqual(result.image.width, 16);
			assert.strictEqual(result.image.height, 24);
			const [entry] = dataset.diagnostics.forBlueprint("Object");
			assert.ok(entry.error instanceof MissingGlyphError);
			assert.strictEqual(entry.error.glyph, "(no tile)");
		});
	});
});
