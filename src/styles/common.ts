export const MONTH_NAMES =
	/(January|February|March|April|May|June|July|August|September|October|November|December)/i;

/** Leading words that look like a name but introduce a caption or cross-reference. */
export const NON_AUTHOR_LEADS =
	/^(Table|Figure|Fig|Eds?|Vol|Suppl|Appendix|Chapter|Section|Part|between|except|UK)\b/i;

export const NAME_STOPWORDS = new Set([
	"of",
	"the",
	"and",
	"for",
	"a",
	"an",
	"in",
	"on",
	"at",
	"to",
	"from",
	"with",
	"by",
	"as",
	"et",
	"al",
	"al.",
]);

export const PAGE_REFERENCE = /\bp\.?\s*\d+/i;
export const CITATION_PREFIX = /^(see|cf\.?|e\.g\.?,?|i\.e\.?,?)\s+/i;
export const PARENTHESES = /\(([^()]+)\)/g;

const NO_DATE = /\bn\.?d\.?(?:-[a-z])?\b/i;

/** The "n.d." marker as written (including a suffix such as "n.d.-a"), if present. */
export function findNoDate(text: string): string | null {
	return text.match(NO_DATE)?.[0] ?? null;
}

export function hasInPress(text: string): boolean {
	return /\bin\s+press\b/i.test(text);
}

export function startsUppercase(word: string): boolean {
	return /^\p{Lu}/u.test(word);
}

export function startsLowercase(word: string): boolean {
	return /^\p{Ll}/u.test(word);
}
