/**
 * Text helpers for display strings and descriptions.
 *
 * Display strings carry two generations of color markup:
 *
 * - old style: `&X` sets the foreground and `^X` the background; `&&` and
 *   `^^` are the literal characters;
 * - new style: `{{shader|text}}`, possibly nested.
 *
 * Descriptions also carry grammar placeholders such as
 * `=pronouns.subjective=` or `=verb:are=`, filled in per blueprint by
 * {@link substitutePlaceholders}.
 *
 * @module core/text
 */

const OLDSTYLE_COLOR = /&&|\^\^|[&^][A-Za-z]/g;
const NEWSTYLE_COLOR = /\{\{[^{}|]*\|([^{}]*)\}\}/g;
const PLACEHOLDER = /=([A-Za-z][\w.:']*)=/g;

/**
 * Remove `&X` / `^X` color codes.
 * @example stripOldstyleColors("&Wiron &&steel") // "iron &steel"
 */
export function stripOldstyleColors(text: string): string {
	return text.replace(OLDSTYLE_COLOR, (code) => {
		if (code === "&&") return "&";
		if (code === "^^") return "^";
		return "";
	});
}

/**
 * Remove `{{shader|text}}` markup, innermost first.
 * @example stripNewstyleColors("{{r|blood-{{Y|stained}}}}") // "blood-stained"
 */
export function stripNewstyleColors(text: string): string {
	let previous: string;
	let current = text;
	do {
		previous = current;
		current = previous.replace(NEWSTYLE_COLOR, "$1");
	} while (current !== previous);
	return current;
}

export function stripColors(text: string): string {
	return stripNewstyleColors(stripOldstyleColors(text));
}

/**
 * Split an old style color string into its foreground and background codes.
 * @example parseColorString("&W^k") // { foreground: "W", background: "k" }
 */
export function parseColorString(colorString: string): {
	foreground?: string;
	background?: string;
} {
	const [front, back] = colorString.split("^", 2);
	const foreground = front.replace(/^&/, "");
	return {
		...(foreground ? { foreground } : {}),
		...(back ? { background: back } : {}),
	};
}

// ---------------------------------------------------------------------------
// grammar

export interface PronounSet {
	subjective: string;
	objective: string;
	possessive: string;
	substantivePossessive: string;
	reflexive: string;
	/** Whether verbs agree with the plural form. */
	plural: boolean;
}

export type PronounKey = Exclude<keyof PronounSet, "plural">;

export const PRONOUN_KEYS: ReadonlyArray<PronounKey> = Object.freeze([
	"subjective",
	"objective",
	"possessive",
	"substantivePossessive",
	"reflexive",
]);

/**
 * Gender name (as used by the `Gender` tag) to pronoun set.
 */
export type GenderTable = ReadonlyMap<string, Readonly<PronounSet>>;

function isPronounKey(key: string): key is PronounKey {
	return PRONOUN_KEYS.some((candidate) => candidate === key);
}

function capitalize(text: string): string {
	return text.charAt(0).toUpperCase() + text.slice(1);
}

function decapitalize(text: string): string {
	return text.charAt(0).toLowerCase() + text.slice(1);
}

const IRREGULAR_VERBS: Readonly<Record<string, string>> = Object.freeze({
	are: "is",
	have: "has",
	were: "was",
	do: "does",
});

/**
 * Conjugate a verb given in its plural (base) form.
 * @example conjugate("watch", false) // "watches"
 */
export function conjugate(verb: string, plural: boolean): string {
	if (plural) return verb;
	const irregular = IRREGULAR_VERBS[verb.toLowerCase()];
	if (irregular) {
		return verb.charAt(0) === verb.charAt(0).toUpperCase()
			? capitalize(irregular)
			: irregular;
	}
	if (/(?:s|sh|ch|x|z|o)$/i.test(verb)) return `${verb}es`;
	if (/[^aeiou]y$/i.test(verb)) return `${verb.slice(0, -1)}ies`;
	return `${verb}s`;
}

/**
 * Replace grammar placeholders in `text`.
 *
 * - `=pronouns.<key>=` with `<key>` one of {@link PRONOUN_KEYS}; a capitalised
 *   key capitalises the pronoun
 * - `=verb:<base form>=`
 *
 * Anything else, or any placeholder when `pronouns` is undefined, is left as
 * written and passed to `onUnresolved`.
 */
export function substitutePlaceholders(
	text: string,
	pronouns: Readonly<PronounSet> | undefined,
	onUnresolved: (placeholder: string) => void
): string {
	return text.replace(PLACEHOLDER, (placeholder: string, key: string) => {
		if (pronouns) {
			if (key.startsWith("pronouns.")) {
				const name = key.slice("pronouns.".length);
				const normalized = decapitalize(name);
				if (isPronounKey(normalized)) {
					const pronoun = pronouns[normalized];
					return name === normalized ? pronoun : capitalize(pronoun);
				}
			} else if (key.startsWith("verb:")) {
				const verb = key.slice("verb:".length);
				if (verb.length > 0) return conjugate(verb, pronouns.plural);
			}
		}
		onUnresolved(placeholder);
		return placeholder;
	});
}
