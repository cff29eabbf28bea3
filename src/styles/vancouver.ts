import { CITATION_PREFIX, MONTH_NAMES, PAGE_REFERENCE, PARENTHESES } from "./common.js";
import type { CitationStyle, ParsedCitation, ParsedReference } from "./types.js";

const YEAR = /\b((?:19|20)\d{2})[a-z]?\b/g;
const REFERENCE = /^([A-Z][^.]+?)\.\s*([^.]+?)\.\s*.*?(\d{4})/;

/**
 * Author-year citations without a comma before the year: "(Smith 2020)",
 * "(Smith and Jones 2019)". Shared with the Chicago author-date style.
 */
export function parseAuthorYearGroups(text: string): ParsedCitation[] {
	const results: ParsedCitation[] = [];

	for (const match of text.trim().matchAll(PARENTHESES)) {
		const content = match[1]
			.trim()
			.replace(/\[[^\]]+\]/g, "")
			.trim()
			.replace(CITATION_PREFIX, "")
			.trim();

		if (PAGE_REFERENCE.test(content)) continue;
		if (MONTH_NAMES.test(content)) continue;

		const years = [...content.matchAll(YEAR)].map((m) => m[1]);
		if (years.length === 0) continue;

		let author = content;
		for (const year of years) {
			author = author.replace(new RegExp(`\\b${year}[a-z]?\\b`, "g"), "");
		}
		author = author
			.trim()
			.replace(/^\d+\s*/, "")
			.trim()
			.replace(/[.,;:]+$/, "")
			.trim();

		// Long runs of words are prose that happens to end in a year.
		if (author.split(/\s+/).length > 6) continue;
		if (author.length < 2) continue;

		for (const year of years) {
			results.push({ author, year, type: "parenthetical", warnings: [], raw: `(${content})` });
		}
	}

	return results;
}

export const vancouverStyle: CitationStyle = {
	id: "vancouver",
	label: "Vancouver",

	parseCitations: parseAuthorYearGroups,

	/** "Smith J, Jones M. Title of article. Journal. 2020;10(2):123-45." */
	parseReference(text: string): ParsedReference | null {
		const match = text.match(REFERENCE);
		if (!match) return null;

		const fullAuthor = match[1].trim();
		const authors = fullAuthor.split(",").map((a) => a.trim());
		let author = fullAuthor;
		if (authors.length >= 3) {
			author = `${authors[0]} et al`;
		} else if (authors.length === 2) {
			author = `${authors[0]} and ${authors[1]}`;
		}

		return { author, fullAuthor, year: match[3], abbreviations: [] };
	},
};
