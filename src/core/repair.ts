/**
 * Markup repair stage.
 *
 * Blueprint files ship with markup that strict XML parsers reject: raw CP437
 * control bytes, line breaks inside attribute values, and bare `&`/`<`
 * characters in display strings. {@link repairMarkup} fixes those at the
 * character level, then proves the result parses. Anything still broken is
 * structural and fails the whole load with a {@link MalformedSourceError}.
 *
 * @example
 * ```typescript
 * const { markup, repairs } = repairMarkup(raw, "ObjectBlueprints.xml");
 * ```
 *
 * @module core/repair
 */
import sax from "sax";
import type { SAXParser } from "sax";
import { cp437ToUnicode } from "./cp437.js";
import { MalformedSourceError } from "./errors.js";

export interface RepairCounts {
	/** Control characters replaced by their CP437 glyph, or removed. */
	invalidCharacters: number;
	/** CR/CRLF sequences normalized, plus line breaks escaped inside attributes. */
	lineBreaks: number;
	/** `&` and `<` escaped inside attribute values. */
	escapedCharacters: number;
}

export interface RepairResult {
	markup: string;
	/** Total number of repairs; for diagnostics only. */
	repairs: number;
	counts: RepairCounts;
}

const ILLEGAL_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/g;
const LINE_BREAKS = /\r\n?/g;
const UNSAFE_IN_ATTRIBUTE =
	/\n|<|&(?!(?:amp|lt|gt|quot|apos|#[0-9]+|#x[0-9A-Fa-f]+);)/g;

function repairInvalidCharacters(text: string, counts: RepairCounts): string {
	return text.replace(ILLEGAL_CHARACTERS, (character) => {
		counts.invalidCharacters++;
		const code = character.charCodeAt(0);
		if (code === 0 || code > 0x1f) return "";
		return cp437ToUnicode(code);
	});
}

function repairLineBreaks(text: string, counts: RepairCounts): string {
	return text.replace(LINE_BREAKS, () => {
		counts.lineBreaks++;
		return "\n";
	});
}

function repairAttributeValue(value: string, counts: RepairCounts): string {
	return value.replace(UNSAFE_IN_ATTRIBUTE, (match) => {
		if (match === "\n") {
			counts.lineBreaks++;
			return "&#10;";
		}
		counts.escapedCharacters++;
		return match === "<" ? "&lt;" : "&amp;";
	});
}

/**
 * Walks the markup and rewrites every quoted attribute value inside a tag.
 * Comments, CDATA sections, processing instructions and declarations are
 * copied through untouched.
 */
function repairAttributes(text: string, counts: RepairCounts): string {
	const parts: string[] = [];
	let copied = 0;
	let i = 0;
	while (i < text.length) {
		const open = text.indexOf("<", i);
		if (open === -1) break;

		let skipTo: string | undefined;
		if (text.startsWith("<!--", open)) skipTo = "-->";
		else if (text.startsWith("<![CDATA[", open)) skipTo = "]]>";
		else if (text.startsWith("<?", open)) skipTo = "?>";
		else if (text.startsWith("<!", open)) skipTo = ">";
		if (skipTo !== undefined) {
			const end = text.indexOf(skipTo, open);
			i = end === -1 ? text.length : end + skipTo.length;
			continue;
		}

		// inside a start or end tag
		let j = open + 1;
		while (j < text.length && text[j] !== ">") {
			const quote = text[j];
			if (quote !== '"' && quote !== "'") {
				j++;
				continue;
			}
			const close = text.indexOf(quote, j + 1);
			if (close === -1) {
				// unterminated value; leave it for the well-formedness check
				j = text.length;
				break;
			}
			const value = text.slice(j + 1, close);
			const repaired = repairAttributeValue(value, counts);
			if (repaired !== value) {
				parts.push(text.slice(copied, j + 1), repaired);
				copied = close;
			}
			j = close + 1;
		}
		i = j + 1;
	}
	parts.push(text.slice(copied));
	return parts.join("");
}

/**
 * Create a strict sax parser whose errors surface as
 * {@link MalformedSourceError}s pointing into `markup`.
 */
export function strictParser(markup: string, source: string): SAXParser {
	const parser = sax.parser(true, { position: true });
	parser.onerror = (error: Error) => {
		const position = parser.position;
		throw new MalformedSourceError(
			{ source, line: parser.line + 1, column: parser.column },
			error.message.split("\n")[0],
			markup.slice(Math.max(0, position - 40), position + 40)
		);
	};
	return parser;
}

/**
 * Throws a {@link MalformedSourceError} unless `markup` is well-formed.
 */
export function checkWellFormed(markup: string, source: string): void {
	strictParser(markup, source).write(markup).close();
}

/**
 * Repair one source file's markup.
 *
 * @param text Raw file content
 * @param source File name used in error locations
 * @throws MalformedSourceError when the repaired markup still does not parse
 */
export function repairMarkup(text: string, source: string): RepairResult {
	const counts: RepairCounts = {
		invalidCharacters: 0,
		lineBreaks: 0,
		escapedCharacters: 0,
	};
	let markup = repairInvalidCharacters(text, counts);
	markup = repairLineBreaks(markup, counts);
	markup = repairAttributes(markup, counts);
	checkWellFormed(markup, source);
	return {
		markup,
		repairs:
			counts.invalidCharacters + counts.lineBreaks + counts.escapedCharacters,
		counts,
	};
}
