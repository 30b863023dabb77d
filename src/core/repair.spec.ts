import { suite, test } from "node:test";
import assert from "node:assert";
import { checkWellFormed, repairMarkup } from "./repair.js";
import { MalformedSourceError } from "./errors.js";

suite("core/repair.ts", () => {
	suite("repairMarkup()", () => {
		test("should replace control characters with their CP437 glyph", () => {
			const result = repairMarkup('<o><p RenderString="\u0003"/></o>', "test.xml");
			assert.strictEqual(result.markup, '<o><p RenderString="♥"/></o>');
			assert.strictEqual(result.counts.invalidCharacters, 1);
			assert.strictEqual(result.repairs, 1);
		});

		test("should remove NUL characters", () => {
			const result = repairMarkup('<o a="x\u0000y"/>', "test.xml");
			assert.strictEqual(result.markup, '<o a="xy"/>');
			assert.strictEqual(result.counts.invalidCharacters, 1);
		});

		test("should normalize CRLF and lone CR", () => {
			const result = repairMarkup('<objects>\r\n<object Name="A" />\r</objects>', "test.xml");
			assert.strictEqual(result.markup, '<objects>\n<object Name="A" />\n</objects>');
			assert.strictEqual(result.counts.lineBreaks, 2);
		});

		test("should escape line breaks inside attribute values", () => {
			const result = repairMarkup('<o a="x\ny"/>', "test.xml");
			assert.strictEqual(result.markup, '<o a="x&#10;y"/>');
			assert.strictEqual(result.counts.lineBreaks, 1);
		});

		test("should escape bare ampersands and angle brackets in attributes", () => {
			const result = repairMarkup('<o a="Tom & Jerry &amp; <b>"/>', "test.xml");
			assert.strictEqual(result.markup, '<o a="Tom &amp; Jerry &amp; &lt;b>"/>');
			assert.strictEqual(result.counts.escapedCharacters, 2);
			assert.strictEqual(result.repairs, 2);
		});

		test("should keep numeric character references", () => {
			const result = repairMarkup('<o a="&#65;&#x41;"/>', "test.xml");
			assert.strictEqual(result.markup, '<o a="&#65;&#x41;"/>');
			assert.strictEqual(result.repairs, 0);
		});

		test("should leave comments untouched", () => {
			const markup = '<o><!-- "a & b" --><p a="1"/></o>';
			const result = repairMarkup(markup, "test.xml");
			assert.strictEqual(result.markup, markup);
			assert.strictEqual(result.repairs, 0);
		});

		test("should count every category together", () => {
			const result = repairMarkup('<o a="&\u0001"\r\n/>', "test.xml");
			assert.deepStrictEqual(result.counts, {
				invalidCharacters: 1,
				lineBreaks: 1,
				escapedCharacters: 1,
			});
			assert.strictEqual(result.repairs, 3);
		});

		test("should throw MalformedSourceError for structural damage", () => {
			assert.throws(
				() => repairMarkup('<objects>\n<object Name="A">\n</objects>', "broken.xml"),
				(error: unknown) => {
					assert.ok(error instanceof MalformedSourceError);
					assert.strictEqual(error.location.source, "broken.xml");
					assert.strictEqual(error.severity, "load");
					return true;
				}
			);
		});
	});

	suite("checkWellFormed()", () => {
		test("should accept well-formed markup", () => {
			assert.doesNotThrow(() => checkWellFormed("<a><b/></a>", "ok.xml"));
		});

		test("should reject an unclosed element", () => {
			assert.throws(() => checkWellFormed("<a><b></a>", "bad.xml"), MalformedSourceError);
		});
	});
});
