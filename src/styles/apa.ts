import { countAuthors } from "../citations/authors.js";
import {
	MONTH_NAMES,
	NAME_STOPWORDS,
	NON_AUTHOR_LEADS,
	PARENTHESES,
	findNoDate,
	hasInPress,
	startsLowercase,
	startsUppercase,
} from "./common.js";
import type { CitationStyle, ParsedCitation, ParsedReference } from "./types.js";

const YEAR = /\b((?:19|20)\d{2}[a-z]?)\b/g;
const REFERENCE = /^(.+?)\s*\(((?:(?:19|20)\d{2}[a-z]?|n\.?d\.?(?:-[a-z])?|in press).*?)\)\.?/;
const NARRATIVE = /\b([A-Z][A-Za-z\s&.'"`’–-]{0,100}?)\s*\(([^)]+)\)/g;

const LEADING_PHRASE =
	/^(?:see, for example,|see,\s*for example|see also|for example|also|see|cf\.?|e\.g\.?,?|i\.e\.?,?)(?:,)?\s+/i;
const PAGE_NUMBERS = /,?\s*\bpp?\.?\s*\d+[-–]?\d*/gi;
const PRECEDING_AUTHOR = /([A-Z][\w.]*['’]?s?|et al\.?)\s*$/;
const SECONDARY_SOURCE = /\b(?:as cited in|in)\s+([A-Z][A-Za-z\s&]+)/;
const INSTRUMENT_NAME =
	/\b(Tool|Scale|Measure|Assessment|Instrument|Inventory|Index|Test|Battery|Questionnaire|Survey|Protocol)\b/i;
const TRAILING_ACRONYM = /\b[A-Z]{2,}s?$/;
const NARRATIVE_PREFIX = /^(According to|As cited by|As stated by|See also)\s+/i;
const NON_NAME_WORDS = new Set([
	"see",
	"date",
	"january",
	"february",
	"march",
	"april",
	"may",
	"june",
	"july",
	"august",
	"september",
	"october",
	"november",
	"december",
]);

export const MISSING_COMMA_WARNING =
	"Format Error: Missing comma between author and year (APA requires comma)";
export const PARENTHETICAL_AND_WARNING = "Format Error: Use '&' inside parentheses, not 'and'";
export const NARRATIVE_AMPERSAND_WARNING = "Format Error: Use 'and' in narrative citations, not '&'";
export const MISSING_AUTHOR_WARNING = "Warning: Missing Author";

function stripEdgePunctuation(value: string): string {
	return value
		.replace(/^[.,;: ]+/, "")
		.trim()
		.replace(/[.,;: ]+$/, "")
		.trim();
}

function pairKey(author: string, year: string): string {
	return `${author.replace(/[.,;: ]+$/, "").trim().toLowerCase()}|${year}`;
}

/** Years (or "n.d." / "in press") named in a parenthetical segment. */
function segmentYears(segment: string): string[] {
	const noDate = findNoDate(segment);
	if (noDate) return [noDate];
	if (hasInPress(segment)) return ["in press"];
	return [...segment.matchAll(YEAR)].map((m) => m[1]);
}

function removeDates(value: string): string {
	return value
		.replace(/,?\s*(?:19|20)\d{2}[a-z]?,?\s*/g, "")
		.trim()
		.replace(/,?\s*\bn\.?d\.?(?:-[a-z])?\b,?\s*/gi, "")
		.trim()
		.replace(/,?\s*\bin\s+press\b,?\s*/gi, "")
		.trim();
}

function parseParenthetical(text: string, seen: Set<string>): ParsedCitation[] {
	const results: ParsedCitation[] = [];

	for (const match of text.matchAll(PARENTHESES)) {
		const start = match.index ?? 0;
		const segments = match[1]
			.trim()
			.split(";")
			.map((s) => s.trim())
			.filter(Boolean);

		for (const segment of segments) {
			if (/^p\.?\s*\d+/i.test(segment)) continue;
			if (MONTH_NAMES.test(segment)) continue;

			const warnings: string[] = [];
			if (/^[A-Z][a-z]+\s+\d{4}$/.test(segment)) warnings.push(MISSING_COMMA_WARNING);
			if (segment.includes(" and ") && !segment.includes("&")) {
				warnings.push(PARENTHETICAL_AND_WARNING);
			}

			const years = segmentYears(segment);
			const content = segment.replace(LEADING_PHRASE, "").trim().replace(PAGE_NUMBERS, "").trim();

			let author = years.length > 0 ? removeDates(content) : content;
			author = stripEdgePunctuation(author)
				.replace(/^\d+,?\s*/, "")
				.trim();

			if (years.length > 0 && !/[A-Za-z]/.test(author)) {
				// "Smith (2020)": the narrative pass owns this one.
				if (PRECEDING_AUTHOR.test(text.slice(0, start).trim())) continue;
				author = "Unknown";
				warnings.push(MISSING_AUTHOR_WARNING);
			}

			if (author.length <= 1 || years.length === 0) continue;
			if (NON_AUTHOR_LEADS.test(author)) continue;

			const secondary = author.match(SECONDARY_SOURCE);
			if (secondary) {
				author = secondary[1].trim();
			}
			if (!/[A-Za-z]/.test(author)) continue;

			for (const year of years) {
				results.push({
					author,
					year,
					type: "parenthetical",
					warnings: [...warnings],
					raw: `(${segment})`,
				});
				seen.add(pairKey(author, year));
			}
		}
	}

	return results;
}

/** Keep only the trailing run of capitalized words: "work by Smith" -> "Smith". */
function trimToCapitalizedTail(author: string): string {
	const words = author.split(/\s+/).filter(Boolean);
	if (words.length <= 1) return author;

	let capStart: number | null = null;
	for (let i = words.length - 1; i >= 0; i--) {
		const word = words[i];
		const stop = NAME_STOPWORDS.has(word.toLowerCase());
		if (startsUppercase(word) && !stop) {
			capStart = i;
		} else if (startsLowercase(word) && !stop) {
			break;
		}
	}
	return capStart !== null && capStart > 0 ? words.slice(capStart).join(" ") : author;
}

function looksLikeName(author: string): boolean {
	if (NON_AUTHOR_LEADS.test(author)) return false;
	if (INSTRUMENT_NAME.test(author)) return false;
	if (TRAILING_ACRONYM.test(author)) return false;
	if (NON_NAME_WORDS.has(author.toLowerCase())) return false;

	const words = author.split(/\s+/).filter(Boolean);
	if (words.length > 6) return false;
	if (words.length > 2) {
		const meaningful = words.filter((w) => !NAME_STOPWORDS.has(w.toLowerCase()));
		if (meaningful.length === 0) return false;
		const capitalized = meaningful.filter(startsUppercase).length;
		if (capitalized / meaningful.length < 0.7) return false;
	}
	return true;
}

function parseNarrative(text: string, seen: Set<string>): ParsedCitation[] {
	const results: ParsedCitation[] = [];

	for (const match of text.matchAll(NARRATIVE)) {
		const parens = match[2];
		const noDate = findNoDate(parens);
		const inPress = hasInPress(parens);
		const years = noDate
			? [noDate]
			: inPress
				? ["in press"]
				: [...parens.matchAll(YEAR)].map((m) => m[1]);
		if (years.length === 0) continue;

		// "Indigenous cultures (First Nations Pedagogy Online, 2019)" is parenthetical.
		if (/[A-Za-z]{3,}/.test(removeDates(parens))) continue;

		const author = trimToCapitalizedTail(match[1].trim().replace(/['’]s?(?=\s|$)/g, "").trim())
			.replace(NARRATIVE_PREFIX, "")
			.trim();
		if (!looksLikeName(author)) continue;

		const warnings = author.includes("&") ? [NARRATIVE_AMPERSAND_WARNING] : [];
		for (const year of years) {
			if (seen.has(pairKey(author, year))) continue;
			results.push({ author, year, type: "narrative", warnings: [...warnings], raw: match[0] });
		}
	}

	return results;
}

function referenceYear(datePart: string): string {
	const year = datePart.match(/\b((?:19|20)\d{2}[a-z]?)\b/);
	if (year) return year[1];
	if (datePart.toLowerCase().includes("n.d")) return findNoDate(datePart) ?? "n.d.";
	if (datePart.toLowerCase().includes("in press")) return "in press";
	return datePart;
}

function inferAcronym(author: string): string | null {
	const words = author.split(/\s+/).filter(Boolean);
	if (author.includes(",") || words.length < 2 || !words.every(startsUppercase)) return null;
	const acronym = words.map((w) => w[0]).join("");
	return acronym.length >= 3 ? acronym : null;
}

function displayAuthor(author: string): string {
	if (author.includes("&")) {
		const surnames = author.split("&").map((part) => part.trim().split(",")[0].trim());
		if (countAuthors(author) === 2) {
			return `${surnames[0]} & ${surnames[surnames.length - 1]}`;
		}
		return surnames[0];
	}
	if (author.includes(",")) {
		return author.split(",")[0].trim();
	}
	return author.replace(/\.+$/, "").trim();
}

export const apaStyle: CitationStyle = {
	id: "apa",
	label: "APA (American Psychological Association)",

	parseCitations(text: string): ParsedCitation[] {
		const clean = text.trim();
		// Parenthetical first; the narrative pass skips pairs it already produced.
		const seen = new Set<string>();
		const parenthetical = parseParenthetical(clean, seen);
		return [...parenthetical, ...parseNarrative(clean, seen)];
	},

	parseReference(text: string): ParsedReference | null {
		const match = text.match(REFERENCE);
		if (!match) return null;

		const year = referenceYear(match[2].trim());
		const fullAuthor = match[1]
			.trim()
			.replace(/\s*\(\s*Eds?\.?\s*\)/gi, "")
			.trim()
			.replace(/,\s*$/, "");

		const abbreviations = [...fullAuthor.matchAll(/[[(]([A-Z]{2,})[\])]/g)].map((m) => m[1]);
		const author = fullAuthor.replace(/\s*[[(][^\])]+[\])]\s*/g, " ").trim();
		if (abbreviations.length === 0) {
			const inferred = inferAcronym(author);
			if (inferred) abbreviations.push(inferred);
		}

		return { author: displayAuthor(author), fullAuthor, year, abbreviations };
	},
};
